import type { NodeId, SyntaxTree } from '../../tree/syntax-tree.js';
import { firstChild, isKind, lastChild, nextTokenAfter, onSameLine } from '../../tree/navigation.js';
import type { BracedContext } from './context.js';
import type { BracePolicy } from './options.js';

export type Violation = 'LINE_BREAK_BEFORE' | 'LINE_SAME' | 'LINE_ALONE';

export interface PlacementInput {
  policy: BracePolicy;
  tree: SyntaxTree;
  ctx: BracedContext;
  /** Source line holding the closing brace. */
  rcurlyLine: string;
}

interface PlacementCheck {
  violation: Violation;
  applies(input: PlacementInput): boolean;
}

function hasLineBreakBefore(tree: SyntaxTree, rcurly: NodeId): boolean {
  const previous = tree.previousSibling(rcurly) ?? tree.parent(rcurly);
  return !onSameLine(tree, rcurly, previous);
}

export function hasWhitespaceBefore(column: number, line: string): boolean {
  return /^\s*$/.test(line.slice(0, column));
}

/**
 * `new Foo() {{ ... }};` ends the initializer with two braces and a
 * terminator on one line. The inner brace counts as alone when the token
 * after that terminator starts a new line.
 */
export function isDoubleBraceInitializer(tree: SyntaxTree, ctx: BracedContext): boolean {
  const { rcurly, nextToken } = ctx;
  const block = tree.parent(rcurly);
  const owner = block === undefined ? undefined : tree.parent(block);
  if (!isKind(tree, owner, 'INSTANCE_INIT') || !isKind(tree, nextToken, 'RCURLY')) return false;
  const terminator = nextTokenAfter(tree, nextToken);
  return !onSameLine(tree, rcurly, nextTokenAfter(tree, terminator));
}

export function isAloneOnLine(tree: SyntaxTree, ctx: BracedContext, rcurlyLine: string): boolean {
  const apart = !onSameLine(tree, ctx.rcurly, ctx.nextToken) || isDoubleBraceInitializer(tree, ctx);
  return apart && hasWhitespaceBefore(tree.column(ctx.rcurly), rcurlyLine);
}

export function isEmptyBlock(tree: SyntaxTree, ctx: BracedContext): boolean {
  // Type bodies keep both braces as children of the body; statement lists
  // are the opening brace themselves.
  const parent = tree.parent(ctx.lcurly);
  const emptyRcurly = isKind(tree, parent, 'OBJBLOCK') ? tree.nextSibling(ctx.lcurly) : firstChild(tree, ctx.lcurly);
  return emptyRcurly === ctx.rcurly;
}

export function isSingleLineBlock(tree: SyntaxTree, ctx: BracedContext): boolean {
  const { lcurly, rcurly } = ctx;
  let following = ctx.nextToken;
  while (isKind(tree, following, 'LITERAL_ELSE')) {
    following = nextTokenAfter(tree, following);
  }
  if (isKind(tree, following, 'DO_WHILE')) {
    const doStatement = tree.parent(following);
    following = nextTokenAfter(tree, doStatement === undefined ? undefined : lastChild(tree, doStatement));
  }
  const followedBySemi = isKind(tree, ctx.nextToken, 'SEMI');
  return onSameLine(tree, lcurly, rcurly) && (!onSameLine(tree, rcurly, following) || followedBySemi);
}

function violatesAlone({ policy, tree, ctx, rcurlyLine }: PlacementInput): boolean {
  const alone = isAloneOnLine(tree, ctx, rcurlyLine);
  switch (policy) {
    case 'ALONE':
      return !alone;
    case 'ALONE_OR_EMPTY':
      return !alone && !isEmptyBlock(tree, ctx);
    case 'ALONE_OR_SINGLELINE':
      return !alone && !isSingleLineBlock(tree, ctx);
    case 'SAME':
      return ctx.rcurlyEndsSyntax && !alone && !isSingleLineBlock(tree, ctx);
  }
}

// Evaluated in order; the first check that applies decides.
const CHECKS: readonly PlacementCheck[] = [
  {
    violation: 'LINE_BREAK_BEFORE',
    applies: ({ policy, tree, ctx }) =>
      policy === 'SAME' && !hasLineBreakBefore(tree, ctx.rcurly) && !onSameLine(tree, ctx.lcurly, ctx.rcurly),
  },
  {
    violation: 'LINE_SAME',
    applies: ({ policy, tree, ctx }) =>
      policy === 'SAME' && !ctx.rcurlyEndsSyntax && !onSameLine(tree, ctx.rcurly, ctx.nextToken),
  },
  { violation: 'LINE_ALONE', applies: violatesAlone },
];

export function validatePlacement(input: PlacementInput): Violation | undefined {
  return CHECKS.find((check) => check.applies(input))?.violation;
}
