import type { NodeKind } from './kinds.js';
import { ArenaTree } from './syntax-tree.js';

export interface NodeSpec {
  kind: NodeKind;
  line: number;
  column: number;
  children?: readonly NodeSpec[];
}

export function node(kind: NodeKind, line: number, column: number, ...children: NodeSpec[]): NodeSpec {
  return children.length > 0 ? { kind, line, column, children } : { kind, line, column };
}

export function buildTree(source: string, root: NodeSpec): ArenaTree {
  const tree = new ArenaTree(source);
  // Depth-first so that handles follow source order within each subtree.
  const pending: Array<{ spec: NodeSpec; parent: number | undefined }> = [{ spec: root, parent: undefined }];
  while (pending.length > 0) {
    const next = pending.pop();
    if (!next) break;
    const id = tree.addNode(next.spec.kind, next.spec.line, next.spec.column, next.parent);
    const kids = next.spec.children ?? [];
    for (let i = kids.length - 1; i >= 0; i--) {
      const child = kids[i];
      if (child) pending.push({ spec: child, parent: id });
    }
  }
  return tree;
}
