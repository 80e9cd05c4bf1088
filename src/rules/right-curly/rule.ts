import type { Rule } from '../../core/pipeline.js';
import type { ValidationError } from '../../core/types.js';
import { diagnosticAtNode, formatMessage } from '../../core/errorBuilder.js';
import type { NodeId, SyntaxTree } from '../../tree/syntax-tree.js';
import { extractBraceContext, hasBraces } from './context.js';
import { validatePlacement, type Violation } from './validate.js';
import {
  RIGHT_CURLY_RULE_ID,
  isConstructKind,
  resolveRightCurlyOptions,
  type BracePolicy,
} from './options.js';

interface MessageSpec {
  key: string;
  code: string;
  template: string;
  hint: string;
}

export const RIGHT_CURLY_MESSAGES: Record<Violation, MessageSpec> = {
  LINE_BREAK_BEFORE: {
    key: 'line.break.before',
    code: 'RC-LINE-BREAK-BEFORE',
    template: "'{0}' at column {1} should have line break before.",
    hint: 'Start the closing brace of a multi-line block on its own line.',
  },
  LINE_SAME: {
    key: 'line.same',
    code: 'RC-LINE-SAME',
    template:
      "'{0}' at column {1} should be on the same line as the next part of a multi-block statement " +
      '(one that directly contains multiple blocks: if/else-if/else, do/while or try/catch/finally).',
    hint: 'Write it as "} else {", "} catch (...) {", "} finally {" or "} while (...);".',
  },
  LINE_ALONE: {
    key: 'line.alone',
    code: 'RC-LINE-ALONE',
    template: "'{0}' at column {1} should be alone on a line.",
    hint: 'Move any code before or after the closing brace to another line.',
  },
};

export interface RightCurlyFinding {
  violation: Violation;
  rcurly: NodeId;
  args: [string, number];
}

/**
 * Analyzes one construct. Returns undefined for kinds the rule does not
 * handle, for bodyless constructs, and for correctly placed braces.
 */
export function analyzeRightCurly(tree: SyntaxTree, construct: NodeId, policy: BracePolicy): RightCurlyFinding | undefined {
  const kind = tree.kind(construct);
  if (!isConstructKind(kind)) return undefined;
  const ctx = extractBraceContext(tree, construct, kind);
  if (!hasBraces(ctx)) return undefined;
  const violation = validatePlacement({
    policy,
    tree,
    ctx,
    rcurlyLine: tree.sourceLineText(tree.line(ctx.rcurly)),
  });
  if (!violation) return undefined;
  return { violation, rcurly: ctx.rcurly, args: ['}', tree.column(ctx.rcurly) + 1] };
}

export function createRightCurlyRule(input: unknown = {}): Rule {
  const options = resolveRightCurlyOptions(input);
  return {
    id: RIGHT_CURLY_RULE_ID,
    kinds: options.kinds,
    check(tree: SyntaxTree, node: NodeId): ValidationError | undefined {
      const finding = analyzeRightCurly(tree, node, options.policy);
      if (!finding) return undefined;
      const msg = RIGHT_CURLY_MESSAGES[finding.violation];
      return diagnosticAtNode(tree, finding.rcurly, options.severity, formatMessage(msg.template, finding.args), {
        code: msg.code,
        hint: msg.hint,
        length: 1,
        rule: RIGHT_CURLY_RULE_ID,
        messageKey: msg.key,
        args: finding.args,
      });
    },
  };
}
