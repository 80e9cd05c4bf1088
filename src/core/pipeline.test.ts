import { describe, expect, it, vi } from 'vitest';
import { lintTree, type Rule } from './pipeline.js';
import { errorAt } from './errorBuilder.js';
import { elseIfChainOnOneLine, singleLineIf } from '../__fixtures__/java-trees.js';
import type { NodeId, SyntaxTree } from '../tree/syntax-tree.js';

describe('lintTree', () => {
  it('calls a rule once per node of a listed kind, in source order', () => {
    const seen: NodeId[] = [];
    const rule: Rule = {
      id: 'probe',
      kinds: new Set(['LITERAL_IF', 'LITERAL_ELSE']),
      check: (_tree, node) => {
        seen.push(node);
        return undefined;
      },
    };
    expect(lintTree(elseIfChainOnOneLine(), [rule])).toEqual([]);
    expect(seen).toEqual([1, 11, 12, 22]);
  });

  it('skips the walk when there are no rules', () => {
    const tree = singleLineIf();
    const kind = vi.spyOn(tree, 'kind');
    expect(lintTree(tree, [])).toEqual([]);
    expect(kind).not.toHaveBeenCalled();
  });

  it('orders diagnostics by position across rules', () => {
    const at = (tree: SyntaxTree, node: NodeId) => errorAt(tree.line(node), tree.column(node) + 1, tree.kind(node));
    const late: Rule = { id: 'late', kinds: new Set(['SEMI']), check: at };
    const early: Rule = { id: 'early', kinds: new Set(['IDENT']), check: at };
    const found = lintTree(singleLineIf(), [late, early]);
    expect(found.map((e) => `${e.line}:${e.column} ${e.message}`)).toEqual([
      '1:5 IDENT',
      '1:10 IDENT',
      '1:13 SEMI',
      '2:1 IDENT',
      '2:4 SEMI',
    ]);
  });
});
