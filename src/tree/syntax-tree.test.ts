import { describe, expect, it } from 'vitest';
import { ArenaTree } from './syntax-tree.js';
import { buildTree, node as n } from './builder.js';
import { singleLineIf } from '../__fixtures__/java-trees.js';

describe('ArenaTree', () => {
  it('hands out ids in source order and links parents and siblings', () => {
    const tree = singleLineIf();
    expect(tree.size).toBe(14);
    expect(tree.root).toBe(0);
    expect(tree.kind(1)).toBe('LITERAL_IF');
    expect(tree.children(1)).toEqual([2, 3, 5, 6]);
    expect(tree.parent(6)).toBe(1);
    expect(tree.previousSibling(6)).toBe(5);
    expect(tree.nextSibling(6)).toBeUndefined();
    expect(tree.previousSibling(2)).toBeUndefined();
    expect(tree.nextSibling(1)).toBe(11);
    expect(tree.kind(10)).toBe('RCURLY');
    expect([tree.line(10), tree.column(10)]).toEqual([1, 14]);
  });

  it('has no parent or siblings at the root', () => {
    const tree = singleLineIf();
    expect(tree.parent(tree.root)).toBeUndefined();
    expect(tree.nextSibling(tree.root)).toBeUndefined();
    expect(tree.previousSibling(tree.root)).toBeUndefined();
  });

  it('returns source lines by 1-based number', () => {
    const tree = singleLineIf();
    expect(tree.sourceLineText(1)).toBe('if (x) { y(); }');
    expect(tree.sourceLineText(2)).toBe('z();');
    expect(tree.sourceLineText(3)).toBe('');
    expect(tree.sourceLineText(0)).toBe('');
  });

  it('splits CRLF sources', () => {
    const tree = buildTree('a\r\nb', n('COMPILATION_UNIT', 1, 0));
    expect(tree.sourceLineText(2)).toBe('b');
  });

  it('ends lines at a lone carriage return', () => {
    const tree = buildTree('a\rb\r\nc\nd', n('COMPILATION_UNIT', 1, 0));
    expect([1, 2, 3, 4].map((line) => tree.sourceLineText(line))).toEqual(['a', 'b', 'c', 'd']);
    expect(tree.sourceLineText(5)).toBe('');
  });

  it('rejects a second root and unknown handles', () => {
    const tree = new ArenaTree('');
    expect(() => tree.root).toThrow('Tree has no root node');
    tree.addNode('COMPILATION_UNIT', 1, 0);
    expect(() => tree.addNode('COMPILATION_UNIT', 1, 0)).toThrow('Tree already has a root node');
    expect(() => tree.kind(7)).toThrow(RangeError);
  });
});
