import type { ValidationError } from './types.js';
import type { NodeKind } from '../tree/kinds.js';
import type { NodeId, SyntaxTree } from '../tree/syntax-tree.js';

/**
 * A check bound to its options. The pipeline calls `check` once for every
 * node whose kind is listed in `kinds`; rules keep no state between calls.
 */
export interface Rule {
  readonly id: string;
  readonly kinds: ReadonlySet<NodeKind>;
  check(tree: SyntaxTree, node: NodeId): ValidationError | undefined;
}

export function lintTree(tree: SyntaxTree, rules: readonly Rule[]): ValidationError[] {
  const errors: ValidationError[] = [];
  if (rules.length === 0) return errors;

  // Pre-order walk, children in source order.
  const stack: NodeId[] = [tree.root];
  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined) break;
    const kind = tree.kind(current);
    for (const rule of rules) {
      if (!rule.kinds.has(kind)) continue;
      const found = rule.check(tree, current);
      if (found) errors.push(found);
    }
    const kids = tree.children(current);
    for (let i = kids.length - 1; i >= 0; i--) {
      const child = kids[i];
      if (child !== undefined) stack.push(child);
    }
  }

  // Nested constructs are visited before the braces that close them appear,
  // so order by position; the sort is stable for equal positions.
  return errors.sort((a, b) => a.line - b.line || a.column - b.column);
}
