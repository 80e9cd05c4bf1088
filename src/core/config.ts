import * as fs from 'node:fs';
import { z } from 'zod';
import { RuleConfigError, formatErrorMessage, formatZodIssues } from './errors.js';

export const DEFAULT_CONFIG_FILE = 'brace-lint.config.json';

// Rule options stay opaque here; each rule validates its own.
export const LintConfigSchema = z
  .object({
    rules: z.record(z.string(), z.union([z.literal(false), z.record(z.string(), z.unknown()), z.array(z.record(z.string(), z.unknown()))])),
  })
  .strict();

export type LintConfig = z.infer<typeof LintConfigSchema>;

export const DEFAULT_CONFIG: LintConfig = { rules: { 'right-curly': {} } };

export function parseConfig(data: unknown, source = 'config'): LintConfig {
  const parsed = LintConfigSchema.safeParse(data);
  if (!parsed.success) {
    throw new RuleConfigError(source, formatZodIssues(parsed.error));
  }
  return parsed.data;
}

export function loadConfigFile(file: string): LintConfig {
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (e) {
    throw new RuleConfigError(file, `cannot read configuration (${formatErrorMessage(e)})`);
  }
  return parseConfig(data, file);
}
