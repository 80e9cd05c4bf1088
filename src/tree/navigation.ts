import type { NodeKind } from './kinds.js';
import type { NodeId, SyntaxTree } from './syntax-tree.js';

export function firstChild(tree: SyntaxTree, node: NodeId): NodeId | undefined {
  return tree.children(node)[0];
}

export function lastChild(tree: SyntaxTree, node: NodeId): NodeId | undefined {
  const kids = tree.children(node);
  return kids[kids.length - 1];
}

export function findFirstChild(tree: SyntaxTree, node: NodeId, kind: NodeKind): NodeId | undefined {
  return tree.children(node).find((c) => tree.kind(c) === kind);
}

export function isKind(tree: SyntaxTree, node: NodeId | undefined, kind: NodeKind): node is NodeId {
  return node !== undefined && tree.kind(node) === kind;
}

/**
 * Earliest node of a subtree by position. Operators sit above their operands
 * in the tree, so the root of a subtree is not always its first token.
 */
export function firstNode(tree: SyntaxTree, node: NodeId): NodeId {
  let best = node;
  for (const child of tree.children(node)) {
    const candidate = firstNode(tree, child);
    const earlierLine = tree.line(candidate) < tree.line(best);
    const sameLineEarlier = tree.line(candidate) === tree.line(best) && tree.column(candidate) < tree.column(best);
    if (earlierLine || sameLineEarlier) best = candidate;
  }
  return best;
}

/**
 * First token after the whole construct: the nearest next sibling of the
 * node or one of its ancestors, narrowed to its earliest node. Undefined at
 * the end of the compilation unit.
 */
export function nextTokenAfter(tree: SyntaxTree, node: NodeId | undefined): NodeId | undefined {
  let current = node;
  while (current !== undefined) {
    const next = tree.nextSibling(current);
    if (next !== undefined) return firstNode(tree, next);
    current = tree.parent(current);
  }
  return undefined;
}

/** An absent node is never on the same line as anything. */
export function onSameLine(tree: SyntaxTree, a: NodeId | undefined, b: NodeId | undefined): boolean {
  return a !== undefined && b !== undefined && tree.line(a) === tree.line(b);
}
