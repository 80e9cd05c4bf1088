import { z } from 'zod';
import type { NodeKind } from '../../tree/kinds.js';
import type { Severity } from '../../core/types.js';
import { RuleConfigError, formatZodIssues } from '../../core/errors.js';

export const RIGHT_CURLY_RULE_ID = 'right-curly';

export const BRACE_POLICIES = ['SAME', 'ALONE', 'ALONE_OR_EMPTY', 'ALONE_OR_SINGLELINE'] as const;
export type BracePolicy = (typeof BRACE_POLICIES)[number];

export const ACCEPTABLE_KINDS = [
  'LITERAL_TRY',
  'LITERAL_CATCH',
  'LITERAL_FINALLY',
  'LITERAL_IF',
  'LITERAL_ELSE',
  'CLASS_DEF',
  'METHOD_DEF',
  'CTOR_DEF',
  'LITERAL_FOR',
  'LITERAL_WHILE',
  'LITERAL_DO',
  'STATIC_INIT',
  'INSTANCE_INIT',
  'ANNOTATION_DEF',
] as const satisfies readonly NodeKind[];
export type ConstructKind = (typeof ACCEPTABLE_KINDS)[number];

export const DEFAULT_KINDS: readonly ConstructKind[] = [
  'LITERAL_TRY',
  'LITERAL_CATCH',
  'LITERAL_FINALLY',
  'LITERAL_IF',
  'LITERAL_ELSE',
];

export interface RightCurlyOptions {
  policy: BracePolicy;
  kinds: ReadonlySet<ConstructKind>;
  severity: Severity;
}

function toPolicy(raw: string): BracePolicy | undefined {
  const wanted = raw.trim().toUpperCase();
  return BRACE_POLICIES.find((p) => p === wanted);
}

const ACCEPTABLE: ReadonlySet<string> = new Set(ACCEPTABLE_KINDS);

export function isConstructKind(kind: string): kind is ConstructKind {
  return ACCEPTABLE.has(kind);
}

const PolicySchema = z.string().transform((value, ctx): BracePolicy => {
  const policy = toPolicy(value);
  if (!policy) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `unknown option "${value}", expected one of ${BRACE_POLICIES.join(', ')}`,
    });
    return z.NEVER;
  }
  return policy;
});

// Kinds may be listed as an array or as one comma-separated string.
const KindsSchema = z
  .union([z.string(), z.array(z.string())])
  .transform((value, ctx): ConstructKind[] => {
    const names = (Array.isArray(value) ? value : value.split(','))
      .map((s) => s.trim())
      .filter((s) => s.length > 0);
    if (names.length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'at least one token kind is required' });
      return z.NEVER;
    }
    const kinds: ConstructKind[] = [];
    for (const kind of names) {
      if (!isConstructKind(kind)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `token "${kind}" is not acceptable, expected any of ${ACCEPTABLE_KINDS.join(', ')}`,
        });
        continue;
      }
      kinds.push(kind);
    }
    return kinds;
  });

export const RightCurlyOptionsSchema = z
  .object({
    option: PolicySchema.optional(),
    tokens: KindsSchema.optional(),
    severity: z.enum(['error', 'warning']).optional(),
  })
  .strict();

export type RightCurlyOptionsInput = z.input<typeof RightCurlyOptionsSchema>;

/** Validates raw options; throws RuleConfigError so bad setup fails before any tree is linted. */
export function resolveRightCurlyOptions(input: unknown = {}): RightCurlyOptions {
  const parsed = RightCurlyOptionsSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new RuleConfigError(RIGHT_CURLY_RULE_ID, formatZodIssues(parsed.error));
  }
  const { option, tokens, severity } = parsed.data;
  return {
    policy: option ?? 'SAME',
    kinds: new Set(tokens ?? DEFAULT_KINDS),
    severity: severity ?? 'error',
  };
}
