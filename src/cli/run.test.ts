import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import { DEFAULT_CONFIG } from '../core/config.js';
import { createRules } from '../core/router.js';
import { parseArgs } from './args.js';
import { lintText, resolveConfig, runCli } from './run.js';

const TREES = fileURLToPath(new URL('../__fixtures__/trees', import.meta.url));
const IF_ELSE = path.join(TREES, 'if-else.ast.json');
const EMPTY_CLASS = path.join(TREES, 'empty-class.ast.json');

function printed(spy: { mock: { calls: unknown[][] } }): string {
  return spy.mock.calls.map((call) => call.map(String).join(' ')).join('\n');
}

describe('resolveConfig', () => {
  it('builds a single rule instance from flags', () => {
    const config = resolveConfig(parseArgs(['x', '-o', 'alone', '-t', 'CLASS_DEF,METHOD_DEF']));
    expect(config).toEqual({ rules: { 'right-curly': { option: 'alone', tokens: 'CLASS_DEF,METHOD_DEF' } } });
  });

  it('falls back to the defaults when no configuration file exists', () => {
    expect(resolveConfig(parseArgs(['x']), TREES)).toBe(DEFAULT_CONFIG);
  });

  it('reads an explicit configuration file', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'brace-lint-'));
    const file = path.join(dir, 'custom.json');
    fs.writeFileSync(file, JSON.stringify({ rules: { 'right-curly': { option: 'alone_or_empty' } } }));
    try {
      expect(resolveConfig(parseArgs(['x', '-c', file]))).toEqual({
        rules: { 'right-curly': { option: 'alone_or_empty' } },
      });
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('picks up the implicit configuration file in the working directory', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'brace-lint-'));
    fs.writeFileSync(path.join(dir, 'brace-lint.config.json'), JSON.stringify({ rules: { 'right-curly': false } }));
    try {
      expect(resolveConfig(parseArgs(['x']), dir)).toEqual({ rules: { 'right-curly': false } });
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe('lintText', () => {
  it('reports the else placed on its own line', () => {
    const result = lintText(fs.readFileSync(IF_ELSE, 'utf8'), IF_ELSE, createRules(DEFAULT_CONFIG));
    expect(result.file).toBe('IfElse.java');
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toMatchObject({ line: 3, column: 1, code: 'RC-LINE-SAME', severity: 'error' });
  });

  it('names the input when the tree carries no file name', () => {
    const text = JSON.stringify({ source: 'x', root: { kind: 'COMPILATION_UNIT', line: 1, column: 0 } });
    const result = lintText(text, 'input.ast.json', createRules(DEFAULT_CONFIG));
    expect(result).toEqual({ file: 'input.ast.json', source: 'x', errors: [] });
  });

  it('rejects text that is not JSON', () => {
    expect(() => lintText('{', 'bad.ast.json', [])).toThrow(/^Invalid syntax tree in bad\.ast\.json: not valid JSON/);
  });
});

describe('runCli', () => {
  let log: MockInstance<typeof console.log>;
  let err: MockInstance<typeof console.error>;

  beforeEach(() => {
    log = vi.spyOn(console, 'log').mockImplementation(() => {});
    err = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints usage and fails without arguments', async () => {
    expect(await runCli([])).toBe(1);
    expect(printed(log)).toContain('Usage');
  });

  it('fails on an invalid option before reading inputs', async () => {
    expect(await runCli([IF_ELSE, '-o', 'sometimes'])).toBe(1);
    expect(printed(err)).toBe(
      'Error: right-curly: option: unknown option "sometimes", expected one of SAME, ALONE, ALONE_OR_EMPTY, ALONE_OR_SINGLELINE'
    );
  });

  it('reports violations as text and exits with 1', async () => {
    expect(await runCli([IF_ELSE, '--no-color'])).toBe(1);
    const report = printed(err);
    expect(report).toContain('error[RC-LINE-SAME]');
    expect(report).toContain('at IfElse.java:3:1');
  });

  it('scans a directory and summarizes as JSON', async () => {
    expect(await runCli([TREES, '-f', 'json'])).toBe(1);
    const payload: unknown = JSON.parse(printed(log));
    expect(payload).toMatchObject({
      valid: false,
      errorCount: 1,
      warningCount: 0,
      fileCount: 2,
      files: [
        { file: 'Empty.java', valid: true, errorCount: 0 },
        { file: 'IfElse.java', valid: false, errorCount: 1 },
      ],
    });
  });

  it('applies the policy and kinds given as flags', async () => {
    expect(await runCli([EMPTY_CLASS, '-o', 'alone', '-t', 'CLASS_DEF', '--no-color'])).toBe(1);
    expect(printed(err)).toContain('at Empty.java:1:10');

    err.mockClear();
    expect(await runCli([EMPTY_CLASS, '-o', 'alone_or_empty', '-t', 'CLASS_DEF'])).toBe(0);
    expect(printed(log)).toBe('All 1 file(s) valid.');
    expect(err).not.toHaveBeenCalled();
  });

  it('keeps going past an unreadable input and fails', async () => {
    const missing = path.join(TREES, 'missing.ast.json');
    expect(await runCli([missing, EMPTY_CLASS, '-f', 'json'])).toBe(1);
    expect(printed(err)).toMatch(/^Error: ENOENT/);
    expect(JSON.parse(printed(log))).toMatchObject({ valid: false, errorCount: 0, fileCount: 1 });
  });
});
