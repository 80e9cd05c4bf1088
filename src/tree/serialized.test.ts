import { describe, expect, it } from 'vitest';
import { loadTree, parseTreeJson } from './serialized.js';
import { TreeFormatError } from '../core/errors.js';

const sample = {
  file: 'Sample.java',
  source: 'class S {}',
  root: {
    kind: 'COMPILATION_UNIT',
    line: 1,
    column: 0,
    children: [
      {
        kind: 'CLASS_DEF',
        line: 1,
        column: 0,
        children: [
          { kind: 'IDENT', line: 1, column: 6 },
          {
            kind: 'OBJBLOCK',
            line: 1,
            column: 8,
            children: [
              { kind: 'LCURLY', line: 1, column: 8 },
              { kind: 'RCURLY', line: 1, column: 9 },
            ],
          },
        ],
      },
    ],
  },
};

describe('loadTree', () => {
  it('builds an arena tree from the interchange object', () => {
    const loaded = loadTree(sample);
    expect(loaded.file).toBe('Sample.java');
    expect(loaded.source).toBe('class S {}');
    expect(loaded.tree.size).toBe(6);
    expect(loaded.tree.kind(5)).toBe('RCURLY');
    expect(loaded.tree.column(5)).toBe(9);
  });

  it('falls back to the given name when the tree has no file', () => {
    const { file: _file, ...rest } = sample;
    expect(loadTree(rest, 'stdin.ast.json').file).toBe('stdin.ast.json');
  });

  it('rejects unknown kinds with the offending path', () => {
    const bad = { source: '', root: { kind: 'NOT_A_KIND', line: 1, column: 0 } };
    expect(() => loadTree(bad, 'bad.json')).toThrow(TreeFormatError);
    expect(() => loadTree(bad, 'bad.json')).toThrow(/^Invalid syntax tree in bad\.json: root\.kind: /);
  });

  it('rejects zero line numbers and negative columns', () => {
    expect(() => loadTree({ source: '', root: { kind: 'SLIST', line: 0, column: 0 } })).toThrow(/root\.line/);
    expect(() => loadTree({ source: '', root: { kind: 'SLIST', line: 1, column: -1 } })).toThrow(/root\.column/);
  });
});

describe('parseTreeJson', () => {
  it('parses JSON text', () => {
    expect(parseTreeJson(JSON.stringify(sample)).tree.kind(1)).toBe('CLASS_DEF');
  });

  it('reports malformed JSON as a tree format error', () => {
    expect(() => parseTreeJson('{', 'broken.json')).toThrow(/^Invalid syntax tree in broken\.json: not valid JSON/);
  });
});
