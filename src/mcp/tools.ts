import { z } from 'zod';
import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import { createRightCurlyRule } from '../rules/right-curly/rule.js';
import { lintTree } from '../core/pipeline.js';
import { loadTree, parseTreeJson, type LoadedTree } from '../tree/serialized.js';
import { formatZodIssues } from '../core/errors.js';

// Input schemas using Zod
export const CheckRightCurlySchema = z.object({
  tree: z.union([z.string(), z.record(z.string(), z.unknown())]).describe('Syntax tree in the interchange format, as an object or a JSON string'),
  option: z.string().optional().describe('Brace policy: same, alone, alone_or_empty or alone_or_singleline'),
  tokens: z.union([z.string(), z.array(z.string())]).optional().describe('Construct kinds to check'),
});

export const CHECK_RIGHT_CURLY_TOOL: Tool = {
  name: 'check_right_curly',
  description:
    'Check closing-brace placement in a Java syntax tree. Pass the tree exported by the parser front end ' +
    '({ source, root }) and optionally a brace policy and the construct kinds to check. Returns the ' +
    'diagnostics with line, 1-based column, message key and hint.',
  inputSchema: {
    type: 'object',
    properties: {
      tree: {
        description: 'Syntax tree: { "source": string, "root": { kind, line, column, children } } or the same as a JSON string',
      },
      option: {
        type: 'string',
        description: 'same | alone | alone_or_empty | alone_or_singleline (default: same)',
      },
      tokens: {
        description: 'Construct kinds, e.g. ["LITERAL_IF", "LITERAL_ELSE"] or "CLASS_DEF,METHOD_DEF"',
      },
    },
    required: ['tree'],
  },
};

export function handleCheckRightCurly(args: unknown): CallToolResult {
  const parsed = CheckRightCurlySchema.safeParse(args);
  if (!parsed.success) {
    throw new Error(`Invalid arguments: ${formatZodIssues(parsed.error)}`);
  }
  const { tree, option, tokens } = parsed.data;
  const options: Record<string, unknown> = {};
  if (option !== undefined) options.option = option;
  if (tokens !== undefined) options.tokens = tokens;
  const rule = createRightCurlyRule(options);
  const loaded: LoadedTree = typeof tree === 'string' ? parseTreeJson(tree) : loadTree(tree);
  const errors = lintTree(loaded.tree, [rule]);

  return {
    content: [
      {
        type: 'text',
        text: JSON.stringify(
          {
            file: loaded.file,
            valid: errors.every((e) => e.severity !== 'error'),
            errorCount: errors.filter((e) => e.severity === 'error').length,
            warningCount: errors.filter((e) => e.severity === 'warning').length,
            errors,
          },
          null,
          2
        ),
      },
    ],
  };
}
