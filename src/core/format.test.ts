import { describe, expect, it } from 'vitest';
import { textReport, toJsonResult } from './format.js';
import { errorAt, warningAt } from './errorBuilder.js';

const source = ['if (x) { y(); }', 'z();'].join('\n');
const alone = errorAt(1, 15, "'}' at column 15 should be alone on a line.", {
  code: 'RC-LINE-ALONE',
  hint: 'Move any code before or after the closing brace to another line.',
});

describe('textReport', () => {
  it('prints a caret under the offending brace', () => {
    expect(textReport('Sample.java', source, [alone], { color: false })).toBe(
      [
        "error[RC-LINE-ALONE]: '}' at column 15 should be alone on a line.",
        'at Sample.java:1:15',
        '  1 | if (x) { y(); }',
        `    | ${' '.repeat(14)}^`,
        '  2 | z();',
        'hint: Move any code before or after the closing brace to another line.',
        '',
      ].join('\n')
    );
  });

  it('quotes the same excerpt for CR-terminated sources', () => {
    const cr = ['if (x) { y(); }', 'z();'].join('\r');
    expect(textReport('Sample.java', cr, [alone], { color: false })).toBe(
      textReport('Sample.java', source, [alone], { color: false })
    );
  });

  it('lists errors before warnings', () => {
    const warn = warningAt(2, 1, 'second');
    const report = textReport('Sample.java', source, [warn, alone], { color: false });
    const headers = report.split('\n').filter((l) => l.startsWith('error') || l.startsWith('warning'));
    expect(headers).toEqual(["error[RC-LINE-ALONE]: '}' at column 15 should be alone on a line.", 'warning: second']);
  });

  it('colors the severity by default', () => {
    expect(textReport('Sample.java', source, [alone]).startsWith('\x1b[31merror\x1b[0m[RC-LINE-ALONE]')).toBe(true);
  });

  it('says Valid when there is nothing to report', () => {
    expect(textReport('Sample.java', source, [])).toBe('Valid');
  });
});

describe('toJsonResult', () => {
  it('counts errors and warnings separately', () => {
    const warn = warningAt(2, 1, 'second');
    expect(toJsonResult('Sample.java', [alone, warn])).toEqual({
      file: 'Sample.java',
      valid: false,
      errorCount: 1,
      warningCount: 1,
      errors: [alone],
      warnings: [warn],
    });
  });
});
