import type { NodeKind } from './kinds.js';

// CR, LF and CRLF each end a line.
export function splitLines(source: string): string[] {
  return source.split(/\r\n|\r|\n/);
}

/** Stable handle of a node inside one tree. */
export type NodeId = number;

/**
 * Read-only view of a parsed compilation unit. Lines are 1-based, columns
 * 0-based, matching the parser that produces the trees.
 */
export interface SyntaxTree {
  readonly root: NodeId;
  kind(node: NodeId): NodeKind;
  line(node: NodeId): number;
  column(node: NodeId): number;
  parent(node: NodeId): NodeId | undefined;
  children(node: NodeId): readonly NodeId[];
  previousSibling(node: NodeId): NodeId | undefined;
  nextSibling(node: NodeId): NodeId | undefined;
  /** Raw text of a 1-based source line; empty when out of range. */
  sourceLineText(line: number): string;
}

interface NodeRecord {
  kind: NodeKind;
  line: number;
  column: number;
  parent: NodeId | undefined;
  // position inside the parent's children
  index: number;
  children: NodeId[];
}

/**
 * Arena-backed tree: nodes live in one array and refer to each other by
 * index, so parent links never own anything.
 */
export class ArenaTree implements SyntaxTree {
  private readonly nodes: NodeRecord[] = [];
  private readonly lines: string[];
  private rootId: NodeId | undefined;

  constructor(source: string) {
    this.lines = splitLines(source);
  }

  /** Appends a node; without a parent it becomes the root. */
  addNode(kind: NodeKind, line: number, column: number, parent?: NodeId): NodeId {
    const id = this.nodes.length;
    if (parent === undefined) {
      if (this.rootId !== undefined) throw new Error('Tree already has a root node');
      this.rootId = id;
      this.nodes.push({ kind, line, column, parent: undefined, index: 0, children: [] });
      return id;
    }
    const siblings = this.record(parent).children;
    this.nodes.push({ kind, line, column, parent, index: siblings.length, children: [] });
    siblings.push(id);
    return id;
  }

  get root(): NodeId {
    if (this.rootId === undefined) throw new Error('Tree has no root node');
    return this.rootId;
  }

  get size(): number {
    return this.nodes.length;
  }

  kind(node: NodeId): NodeKind {
    return this.record(node).kind;
  }

  line(node: NodeId): number {
    return this.record(node).line;
  }

  column(node: NodeId): number {
    return this.record(node).column;
  }

  parent(node: NodeId): NodeId | undefined {
    return this.record(node).parent;
  }

  children(node: NodeId): readonly NodeId[] {
    return this.record(node).children;
  }

  previousSibling(node: NodeId): NodeId | undefined {
    const rec = this.record(node);
    if (rec.parent === undefined || rec.index === 0) return undefined;
    return this.record(rec.parent).children[rec.index - 1];
  }

  nextSibling(node: NodeId): NodeId | undefined {
    const rec = this.record(node);
    if (rec.parent === undefined) return undefined;
    return this.record(rec.parent).children[rec.index + 1];
  }

  sourceLineText(line: number): string {
    return this.lines[line - 1] ?? '';
  }

  private record(node: NodeId): NodeRecord {
    const rec = this.nodes[node];
    if (!rec) throw new RangeError(`Unknown node handle ${node}`);
    return rec;
  }
}
