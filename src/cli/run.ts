import * as fs from 'node:fs';
import * as path from 'node:path';
import { globby } from 'globby';
import type { ValidationError } from '../core/types.js';
import { lintTree, type Rule } from '../core/pipeline.js';
import { createRules } from '../core/router.js';
import { DEFAULT_CONFIG, DEFAULT_CONFIG_FILE, loadConfigFile, type LintConfig } from '../core/config.js';
import { textReport, toJsonResult } from '../core/format.js';
import { formatErrorMessage } from '../core/errors.js';
import { parseTreeJson } from '../tree/serialized.js';
import { RIGHT_CURLY_RULE_ID } from '../rules/right-curly/options.js';
import { parseArgs, usage, type CliArgs } from './args.js';

const DEFAULT_INCLUDE_GLOBS = ['**/*.ast.json'];

const DEFAULT_IGNORE_DIRS = [
  '**/.git/**',
  '**/node_modules/**',
  '**/dist/**',
  '**/build/**',
  '**/coverage/**',
];

export interface FileResult {
  file: string;
  source: string;
  errors: ValidationError[];
}

function isDirectory(p: string) {
  try { return fs.statSync(p).isDirectory(); } catch { return false; }
}

async function listCandidateFiles(root: string, includes: string[], excludes: string[], useGitignore: boolean): Promise<string[]> {
  const patterns = includes.length > 0 ? includes : DEFAULT_INCLUDE_GLOBS;
  const ignore = [
    ...excludes,
    ...(useGitignore ? [] : DEFAULT_IGNORE_DIRS),
  ];
  const files = await globby(patterns, {
    cwd: path.resolve(root),
    absolute: true,
    dot: true,
    gitignore: useGitignore,
    ignore,
    followSymbolicLinks: false,
  });
  return files.sort();
}

/** Flags override the configuration file with a single rule instance. */
export function resolveConfig(args: CliArgs, cwd = process.cwd()): LintConfig {
  if (args.option !== undefined || args.tokens !== undefined) {
    const options: Record<string, unknown> = {};
    if (args.option !== undefined) options.option = args.option;
    if (args.tokens !== undefined) options.tokens = args.tokens;
    return { rules: { [RIGHT_CURLY_RULE_ID]: options } };
  }
  if (args.configPath) return loadConfigFile(args.configPath);
  const implicit = path.join(cwd, DEFAULT_CONFIG_FILE);
  if (fs.existsSync(implicit)) return loadConfigFile(implicit);
  return DEFAULT_CONFIG;
}

export function lintText(text: string, filename: string, rules: readonly Rule[]): FileResult {
  const loaded = parseTreeJson(text, filename);
  return { file: loaded.file, source: loaded.source, errors: lintTree(loaded.tree, rules) };
}

async function collectInputs(args: CliArgs): Promise<string[]> {
  const inputs: string[] = [];
  for (const target of args.targets) {
    if (target !== '-' && isDirectory(target)) {
      inputs.push(...await listCandidateFiles(target, args.includeGlobs, args.excludeGlobs, args.useGitignore));
    } else {
      inputs.push(target);
    }
  }
  return inputs;
}

function readInput(target: string): string {
  return target === '-' ? fs.readFileSync(0, 'utf8') : fs.readFileSync(target, 'utf8');
}

type Setup = { kind: 'run'; args: CliArgs; rules: Rule[] } | { kind: 'exit'; code: number };

function setup(argv: readonly string[]): Setup {
  try {
    const args = parseArgs(argv);
    if (args.help) {
      console.log(usage());
      return { kind: 'exit', code: argv.length === 0 ? 1 : 0 };
    }
    // Rule options are validated here, before any input is read.
    return { kind: 'run', args, rules: createRules(resolveConfig(args)) };
  } catch (e) {
    console.error(`Error: ${formatErrorMessage(e)}`);
    return { kind: 'exit', code: 1 };
  }
}

/** Runs the CLI and resolves to its exit code. */
export async function runCli(argv: readonly string[]): Promise<number> {
  const ready = setup(argv);
  if (ready.kind === 'exit') return ready.code;
  const { args, rules } = ready;

  const inputs = await collectInputs(args);
  const results: FileResult[] = [];
  let failed = false;
  for (const input of inputs) {
    const name = input === '-' ? '<stdin>' : input;
    try {
      results.push(lintText(readInput(input), name, rules));
    } catch (e) {
      console.error(`Error: ${formatErrorMessage(e)}`);
      failed = true;
    }
  }

  const errorCount = results.reduce((n, r) => n + r.errors.filter(e => e.severity === 'error').length, 0);
  const warningCount = results.reduce((n, r) => n + r.errors.filter(e => e.severity === 'warning').length, 0);
  const valid = !failed && errorCount === 0;

  if (args.format === 'json') {
    const payload = { valid, files: results.map(r => toJsonResult(r.file, r.errors)), errorCount, warningCount, fileCount: results.length };
    console.log(JSON.stringify(payload, null, 2));
    return valid ? 0 : 1;
  }

  if (results.length === 0 && !failed) {
    console.log('No syntax trees found.');
    return 0;
  }
  for (const r of results) {
    if (r.errors.length === 0) continue;
    const report = textReport(r.file, r.source, r.errors, { color: args.color });
    if (r.errors.some(e => e.severity === 'error')) console.error(report.trimEnd());
    else console.log(report.trimEnd());
  }
  if (valid && warningCount === 0) console.log(`All ${results.length} file(s) valid.`);
  return valid ? 0 : 1;
}
