import type { ValidationError } from './types.js';
import { splitLines } from '../tree/syntax-tree.js';

export type OutputFormat = 'text' | 'json';

export function groupErrors(errors: ValidationError[]) {
  const errs = errors.filter(e => e.severity === 'error');
  const warns = errors.filter(e => e.severity === 'warning');
  return { errs, warns };
}

export interface TextReportOptions {
  color?: boolean;
}

export function textReport(filename: string, content: string, errors: ValidationError[], options: TextReportOptions = {}): string {
  const { errs, warns } = groupErrors(errors);
  const color = options.color ?? true;
  const paint = (code: string, s: string) => (color ? `\x1b[${code}m${s}\x1b[0m` : s);
  const lines: string[] = [];
  const allLines = splitLines(content);
  const numWidth = String(allLines.length).length;
  const fmtNum = (n: number) => String(n).padStart(numWidth, ' ');

  const printBlock = (kind: 'error' | 'warning', e: ValidationError) => {
    const label = kind === 'error' ? paint('31', 'error') : paint('33', 'warning');
    const code = e.code ? `[${e.code}]` : '';
    lines.push(`${label}${code}: ${e.message}`);
    lines.push(`at ${filename}:${e.line}:${e.column}`);
    const idx = Math.max(0, Math.min(allLines.length - 1, e.line - 1));
    const prev = idx > 0 ? allLines[idx - 1] : undefined;
    const text = allLines[idx] ?? '';
    const next = idx + 1 < allLines.length ? allLines[idx + 1] : undefined;
    if (typeof prev === 'string') lines.push(`  ${fmtNum(e.line - 1)} | ${prev}`);
    lines.push(`  ${fmtNum(e.line)} | ${text}`);
    const caretPad = ' '.repeat(Math.max(0, e.column - 1));
    const caretLen = Math.max(1, e.length ?? 1);
    lines.push(`  ${' '.repeat(numWidth)} | ${caretPad}${paint('31', '^'.repeat(caretLen))}`);
    if (typeof next === 'string') lines.push(`  ${fmtNum(e.line + 1)} | ${next}`);
    if (e.hint) lines.push(`hint: ${e.hint}`);
    lines.push('');
  };

  for (const e of errs) printBlock('error', e);
  for (const w of warns) printBlock('warning', w);
  if (errs.length === 0 && warns.length === 0) return 'Valid';
  return lines.join('\n');
}

export function toJsonResult(filename: string, errors: ValidationError[]) {
  const { errs, warns } = groupErrors(errors);
  return {
    file: filename,
    valid: errs.length === 0,
    errorCount: errs.length,
    warningCount: warns.length,
    errors: errs,
    warnings: warns,
  };
}

// Single text format for humans; JSON is intended for tooling.
