import { z } from 'zod';

/** Invalid rule options or configuration file; raised when rules are built. */
export class RuleConfigError extends Error {
  readonly rule: string;

  constructor(rule: string, message: string) {
    super(`${rule}: ${message}`);
    this.name = 'RuleConfigError';
    this.rule = rule;
  }
}

/** A serialized syntax tree that does not match the interchange format. */
export class TreeFormatError extends Error {
  readonly file: string;

  constructor(file: string, message: string) {
    super(`Invalid syntax tree in ${file}: ${message}`);
    this.name = 'TreeFormatError';
    this.file = file;
  }
}

export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function formatErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
