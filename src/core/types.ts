export type Severity = 'error' | 'warning';

export interface ValidationError {
  line: number;
  column: number;
  message: string;
  severity: Severity;
  code?: string;
  hint?: string;
  length?: number;
  // Rule that produced the diagnostic, and its message key and arguments
  rule?: string;
  messageKey?: string;
  args?: ReadonlyArray<string | number>;
}

