import { z } from 'zod';
import { NODE_KINDS } from './kinds.js';
import { buildTree, type NodeSpec } from './builder.js';
import type { ArenaTree } from './syntax-tree.js';
import { TreeFormatError, formatErrorMessage, formatZodIssues } from '../core/errors.js';

const NodeSpecSchema: z.ZodType<NodeSpec> = z.lazy(() =>
  z.object({
    kind: z.enum(NODE_KINDS),
    line: z.number().int().positive(),
    column: z.number().int().nonnegative(),
    children: z.array(NodeSpecSchema).optional(),
  })
);

// Interchange format written by the parser front end.
export const SerializedTreeSchema = z.object({
  file: z.string().optional(),
  source: z.string(),
  root: NodeSpecSchema,
});

export type SerializedTree = z.infer<typeof SerializedTreeSchema>;

export interface LoadedTree {
  file: string;
  source: string;
  tree: ArenaTree;
}

export function loadTree(data: unknown, fallbackName = '<input>'): LoadedTree {
  const parsed = SerializedTreeSchema.safeParse(data);
  if (!parsed.success) {
    throw new TreeFormatError(fallbackName, formatZodIssues(parsed.error));
  }
  const { file, source, root } = parsed.data;
  return { file: file ?? fallbackName, source, tree: buildTree(source, root) };
}

export function parseTreeJson(text: string, fallbackName = '<input>'): LoadedTree {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (e) {
    throw new TreeFormatError(fallbackName, `not valid JSON (${formatErrorMessage(e)})`);
  }
  return loadTree(data, fallbackName);
}
