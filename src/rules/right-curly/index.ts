export { createRightCurlyRule, analyzeRightCurly, RIGHT_CURLY_MESSAGES } from './rule.js';
export type { RightCurlyFinding } from './rule.js';
export { extractBraceContext, categoryOf, hasBraces } from './context.js';
export type { BraceContext, BracedContext, ConstructCategory } from './context.js';
export { validatePlacement } from './validate.js';
export type { Violation, PlacementInput } from './validate.js';
export {
  RIGHT_CURLY_RULE_ID,
  BRACE_POLICIES,
  ACCEPTABLE_KINDS,
  DEFAULT_KINDS,
  isConstructKind,
  resolveRightCurlyOptions,
  RightCurlyOptionsSchema,
} from './options.js';
export type { BracePolicy, ConstructKind, RightCurlyOptions, RightCurlyOptionsInput } from './options.js';
