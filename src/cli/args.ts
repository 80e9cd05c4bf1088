import type { OutputFormat } from '../core/format.js';

export interface CliArgs {
  help: boolean;
  targets: string[];
  format: OutputFormat;
  option?: string;
  tokens?: string;
  configPath?: string;
  includeGlobs: string[];
  excludeGlobs: string[];
  useGitignore: boolean;
  color: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

function splitGlobs(v: string): string[] {
  return v.split(',').map(s => s.trim()).filter(Boolean);
}

// simple arg parsing: flags with a value consume the next argument;
// anything else that is not a flag (or a lone "-") is a target.
export function parseArgs(args: readonly string[]): CliArgs {
  const out: CliArgs = {
    help: args.length === 0,
    targets: [],
    format: 'text',
    includeGlobs: [],
    excludeGlobs: [],
    useGitignore: true,
    color: true,
  };
  const valueOf = (i: number, flag: string): string => {
    const v = args[i + 1];
    if (v === undefined || (v.startsWith('-') && v !== '-')) throw new CliUsageError(`Missing value for ${flag}`);
    return v;
  };
  for (let i = 0; i < args.length; i++) {
    const a = args[i] ?? '';
    if (a === '-h' || a === '--help') { out.help = true; continue; }
    if (a === '--format' || a === '-f') {
      const v = valueOf(i, a).toLowerCase();
      if (v !== 'json' && v !== 'text') throw new CliUsageError(`Unknown format "${v}", expected text or json`);
      out.format = v;
      i++; continue;
    }
    if (a === '--option' || a === '-o') { out.option = valueOf(i, a); i++; continue; }
    if (a === '--tokens' || a === '-t') { out.tokens = valueOf(i, a); i++; continue; }
    if (a === '--config' || a === '-c') { out.configPath = valueOf(i, a); i++; continue; }
    if (a === '--include' || a === '-I') { out.includeGlobs.push(...splitGlobs(valueOf(i, a))); i++; continue; }
    if (a === '--exclude' || a === '-E') { out.excludeGlobs.push(...splitGlobs(valueOf(i, a))); i++; continue; }
    if (a === '--no-gitignore') { out.useGitignore = false; continue; }
    if (a === '--gitignore') { out.useGitignore = true; continue; }
    if (a === '--no-color') { out.color = false; continue; }
    if (a === '-' || !a.startsWith('-')) { out.targets.push(a); continue; }
    throw new CliUsageError(`Unknown flag ${a}`);
  }
  return out;
}

export function usage(): string {
  return [
    'Usage: brace-lint <file.ast.json>',
    '       cat file.ast.json | brace-lint -',
    '       brace-lint <directory>',
    '  - Checks closing-brace placement in syntax trees exported by the parser front end',
    '  - When a directory is given, scans recursively for *.ast.json',
    'Options:',
    '  --option, -o    Brace policy: same|alone|alone_or_empty|alone_or_singleline',
    '  --tokens, -t    Comma-separated construct kinds to check (e.g. LITERAL_IF,LITERAL_ELSE)',
    '  --config, -c    Configuration file (default: ./brace-lint.config.json when present)',
    '  --format, -f    Output format: text|json (default: text)',
    '  --include, -I   Glob(s) to include (repeatable or comma-separated)',
    '  --exclude, -E   Glob(s) to exclude (repeatable or comma-separated)',
    '  --no-gitignore  Do not respect .gitignore when scanning directories',
    '  --no-color      Plain text output',
  ].join('\n');
}
