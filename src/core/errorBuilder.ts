import type { Severity, ValidationError } from './types.js';
import type { NodeId, SyntaxTree } from '../tree/syntax-tree.js';

type Common = {
  code?: string;
  hint?: string;
  length?: number;
  rule?: string;
  messageKey?: string;
  args?: ReadonlyArray<string | number>;
};

export function coercePos(line?: number | null, column?: number | null, fallbackLine = 1, fallbackColumn = 1) {
  const ln = typeof line === 'number' && Number.isFinite(line) && line > 0 ? line : fallbackLine;
  const col = typeof column === 'number' && Number.isFinite(column) && column > 0 ? column : fallbackColumn;
  return { line: ln, column: col };
}

export function diagnosticAt(
  severity: Severity,
  line: number | null | undefined,
  column: number | null | undefined,
  message: string,
  extra: Common = {}
): ValidationError {
  const pos = coercePos(line ?? null, column ?? null, 1, 1);
  return { line: pos.line, column: pos.column, message, severity, ...extra };
}

export function errorAt(line: number | null | undefined, column: number | null | undefined, message: string, extra: Common = {}): ValidationError {
  return diagnosticAt('error', line, column, message, extra);
}

export function warningAt(line: number | null | undefined, column: number | null | undefined, message: string, extra: Common = {}): ValidationError {
  return diagnosticAt('warning', line, column, message, extra);
}

// Tree columns are 0-based; diagnostics use 1-based columns.
export function diagnosticAtNode(
  tree: SyntaxTree,
  node: NodeId,
  severity: Severity,
  message: string,
  extra: Common = {}
): ValidationError {
  return diagnosticAt(severity, tree.line(node), tree.column(node) + 1, message, extra);
}

/** Fills `{0}`, `{1}`, ... placeholders of a message template. */
export function formatMessage(template: string, args: ReadonlyArray<string | number>): string {
  return template.replace(/\{(\d+)\}/g, (whole, idx: string) => {
    const value = args[Number(idx)];
    return value === undefined ? whole : String(value);
  });
}
