import type { NodeId, SyntaxTree } from '../../tree/syntax-tree.js';
import { findFirstChild, firstChild, isKind, lastChild, nextTokenAfter } from '../../tree/navigation.js';
import type { ConstructKind } from './options.js';

/**
 * Landmarks of one construct. `nextToken` is undefined at the end of the
 * compilation unit; `rcurlyEndsSyntax` is false when else, catch, finally
 * or a do-while condition must follow the closing brace.
 */
export interface BraceContext {
  lcurly?: NodeId;
  rcurly?: NodeId;
  nextToken?: NodeId;
  rcurlyEndsSyntax: boolean;
}

export type BracedContext = BraceContext & { lcurly: NodeId; rcurly: NodeId };

export function hasBraces(ctx: BraceContext): ctx is BracedContext {
  return ctx.lcurly !== undefined && ctx.rcurly !== undefined;
}

export type ConstructCategory = 'try-catch-finally' | 'if-else' | 'loop' | 'type-body' | 'code-block';

export function categoryOf(kind: ConstructKind): ConstructCategory {
  switch (kind) {
    case 'LITERAL_TRY':
    case 'LITERAL_CATCH':
    case 'LITERAL_FINALLY':
      return 'try-catch-finally';
    case 'LITERAL_IF':
    case 'LITERAL_ELSE':
      return 'if-else';
    case 'LITERAL_DO':
    case 'LITERAL_WHILE':
    case 'LITERAL_FOR':
      return 'loop';
    case 'CLASS_DEF':
    case 'ANNOTATION_DEF':
      return 'type-body';
    case 'METHOD_DEF':
    case 'CTOR_DEF':
    case 'STATIC_INIT':
    case 'INSTANCE_INIT':
      return 'code-block';
  }
}

type Extractor = (tree: SyntaxTree, construct: NodeId) => BraceContext;

function lastChildOf(tree: SyntaxTree, node: NodeId | undefined): NodeId | undefined {
  return node === undefined ? undefined : lastChild(tree, node);
}

const fromTryCatchFinally: Extractor = (tree, construct) => {
  let lcurly: NodeId | undefined;
  let continuation: NodeId | undefined;
  if (tree.kind(construct) === 'LITERAL_TRY') {
    const head = firstChild(tree, construct);
    lcurly = isKind(tree, head, 'RESOURCE_SPECIFICATION') ? tree.nextSibling(head) : head;
    continuation = lcurly === undefined ? undefined : tree.nextSibling(lcurly);
  } else {
    lcurly = lastChild(tree, construct);
    continuation = tree.nextSibling(construct);
  }
  const rcurly = lastChildOf(tree, lcurly);
  if (continuation !== undefined) {
    return { lcurly, rcurly, nextToken: continuation, rcurlyEndsSyntax: false };
  }
  return { lcurly, rcurly, nextToken: nextTokenAfter(tree, construct), rcurlyEndsSyntax: true };
};

const fromIfElse: Extractor = (tree, construct) => {
  const elseBranch = findFirstChild(tree, construct, 'LITERAL_ELSE');
  const lcurly = elseBranch === undefined ? lastChild(tree, construct) : tree.previousSibling(elseBranch);
  // A branch without braces is a single statement and has nothing to check.
  const rcurly = isKind(tree, lcurly, 'SLIST') ? lastChild(tree, lcurly) : undefined;
  if (elseBranch !== undefined) {
    return { lcurly, rcurly, nextToken: elseBranch, rcurlyEndsSyntax: false };
  }
  return { lcurly, rcurly, nextToken: nextTokenAfter(tree, construct), rcurlyEndsSyntax: true };
};

const fromLoop: Extractor = (tree, construct) => {
  const lcurly = findFirstChild(tree, construct, 'SLIST');
  const rcurly = lastChildOf(tree, lcurly);
  if (tree.kind(construct) === 'LITERAL_DO') {
    return { lcurly, rcurly, nextToken: findFirstChild(tree, construct, 'DO_WHILE'), rcurlyEndsSyntax: false };
  }
  return { lcurly, rcurly, nextToken: nextTokenAfter(tree, construct), rcurlyEndsSyntax: true };
};

const fromTypeBody: Extractor = (tree, construct) => {
  const body = lastChild(tree, construct);
  return {
    lcurly: body === undefined ? undefined : firstChild(tree, body),
    rcurly: lastChildOf(tree, body),
    nextToken: nextTokenAfter(tree, construct),
    rcurlyEndsSyntax: true,
  };
};

const fromCodeBlock: Extractor = (tree, construct) => {
  // Abstract and native methods have no statement list.
  const lcurly = findFirstChild(tree, construct, 'SLIST');
  return {
    lcurly,
    rcurly: lastChildOf(tree, lcurly),
    nextToken: nextTokenAfter(tree, construct),
    rcurlyEndsSyntax: true,
  };
};

const EXTRACTORS: Record<ConstructCategory, Extractor> = {
  'try-catch-finally': fromTryCatchFinally,
  'if-else': fromIfElse,
  loop: fromLoop,
  'type-body': fromTypeBody,
  'code-block': fromCodeBlock,
};

export function extractBraceContext(tree: SyntaxTree, construct: NodeId, kind: ConstructKind): BraceContext {
  return EXTRACTORS[categoryOf(kind)](tree, construct);
}
