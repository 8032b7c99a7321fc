#!/usr/bin/env node
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { existsSync, readFileSync, realpathSync } from 'node:fs';
import { dirname, extname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { compile } from './compile.js';
import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds } from './diagnostics/types.js';
import { Tokenizer } from './frontend/lexer.js';
import { formatAst, formatToken } from './frontend/print.js';
import { defaultFormatWriters } from './formats/index.js';
import { FORMAT_EXTENSIONS, isOutputFormat, OUTPUT_FORMATS } from './formats/types.js';
import type { OutputFormat, TrailingReturnMode } from './formats/types.js';
import type { CompileResult } from './pipeline.js';
import { runRepl } from './repl.js';

type CliExit = { code: number };

type CliOptions = {
  entryFile: string;
  outputPath?: string;
  format: OutputFormat;
  trailingReturn: TrailingReturnMode;
  printTokens: boolean;
  printAst: boolean;
  printStats: boolean;
};

function usage(): string {
  return [
    'keelc [options] <entry.keel>',
    '',
    'Options:',
    '  -o, --output <file>       Output path (default: entry path with the format extension)',
    `  -f, --format <fmt>        Output format: ${OUTPUT_FORMATS.join('|')} (default: c)`,
    '      --trailing-return <m> Final `return 0;` policy: auto|always (default: auto)',
    '      --tokens              Print the token stream instead of compiling',
    '      --ast                 Print the syntax tree after parsing',
    '      --stats               Print compilation counters to stderr',
    '  -i, --interactive         Tokenize lines read from stdin',
    '  -V, --version             Print version',
    '  -h, --help                Show help',
    '',
  ].join('\n');
}

function fail(message: string): never {
  throw Object.assign(new Error(message), { name: 'CliError' });
}

function readVersion(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  for (;;) {
    const candidate = join(dir, 'package.json');
    if (existsSync(candidate)) {
      const pkg: unknown = JSON.parse(readFileSync(candidate, 'utf8'));
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg) {
        return typeof pkg.version === 'string' ? pkg.version : '0.0.0';
      }
      return '0.0.0';
    }
    const parent = dirname(dir);
    if (parent === dir) return '0.0.0';
    dir = parent;
  }
}

/** Value of `--name=value` or of the following argument. */
function optionValue(argv: string[], i: number, a: string, long: string): [string, number] {
  if (a.startsWith(`${long}=`)) {
    const v = a.slice(long.length + 1);
    if (!v) fail(`${long} expects a value`);
    return [v, i];
  }
  const v = argv[i + 1];
  if (!v) fail(`${a} expects a value`);
  return [v, i + 1];
}

function parseArgs(argv: string[]): CliOptions | CliExit | 'interactive' {
  let outputPath: string | undefined;
  let format: OutputFormat = 'c';
  let trailingReturn: TrailingReturnMode = 'auto';
  let printTokens = false;
  let printAst = false;
  let printStats = false;
  let entryFile: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === undefined) continue;
    if (a === '-h' || a === '--help') {
      process.stdout.write(usage());
      return { code: 0 };
    }
    if (a === '-V' || a === '--version') {
      process.stdout.write(`${readVersion()}\n`);
      return { code: 0 };
    }
    if (a === '-i' || a === '--interactive') {
      return 'interactive';
    }
    if (a === '-o' || a === '--output' || a.startsWith('--output=')) {
      [outputPath, i] = optionValue(argv, i, a, '--output');
      continue;
    }
    if (a === '-f' || a === '--format' || a.startsWith('--format=')) {
      const [v, next] = optionValue(argv, i, a, '--format');
      if (!isOutputFormat(v)) {
        fail(`Unsupported --format "${v}" (expected ${OUTPUT_FORMATS.join('|')})`);
      }
      format = v;
      i = next;
      continue;
    }
    if (a === '--trailing-return' || a.startsWith('--trailing-return=')) {
      const [v, next] = optionValue(argv, i, a, '--trailing-return');
      if (v !== 'auto' && v !== 'always') {
        fail(`Unsupported --trailing-return "${v}" (expected auto|always)`);
      }
      trailingReturn = v;
      i = next;
      continue;
    }
    if (a === '--tokens') {
      printTokens = true;
      continue;
    }
    if (a === '--ast') {
      printAst = true;
      continue;
    }
    if (a === '--stats') {
      printStats = true;
      continue;
    }
    if (a.startsWith('-')) {
      fail(`Unknown option "${a}"`);
    }
    if (entryFile !== undefined) {
      fail(`Expected exactly one <entry.keel> argument`);
    }
    entryFile = a;
  }

  if (!entryFile) {
    fail(`Expected exactly one <entry.keel> argument`);
  }

  return {
    entryFile,
    ...(outputPath ? { outputPath } : {}),
    format,
    trailingReturn,
    printTokens,
    printAst,
    printStats,
  };
}

function defaultOutputPath(entryFile: string, format: OutputFormat): string {
  const entry = resolve(entryFile);
  const ext = extname(entry);
  const stem = ext.length > 0 ? entry.slice(0, -ext.length) : entry;
  return `${stem}${FORMAT_EXTENSIONS[format]}`;
}

function normalizeDiagnosticPath(file: string): string {
  const normalized = file.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function compareDiagnosticsForCli(a: Diagnostic, b: Diagnostic): number {
  const fileCmp = normalizeDiagnosticPath(a.file).localeCompare(normalizeDiagnosticPath(b.file));
  if (fileCmp !== 0) return fileCmp;

  const lineCmp = (a.line ?? Number.POSITIVE_INFINITY) - (b.line ?? Number.POSITIVE_INFINITY);
  if (lineCmp !== 0) return lineCmp;

  const colCmp = (a.column ?? Number.POSITIVE_INFINITY) - (b.column ?? Number.POSITIVE_INFINITY);
  if (colCmp !== 0) return colCmp;

  const sevRank = (severity: Diagnostic['severity']): number => {
    if (severity === 'error') return 0;
    if (severity === 'warning') return 1;
    return 2;
  };
  const sevCmp = sevRank(a.severity) - sevRank(b.severity);
  if (sevCmp !== 0) return sevCmp;

  const idCmp = a.id.localeCompare(b.id);
  if (idCmp !== 0) return idCmp;

  return a.message.localeCompare(b.message);
}

/**
 * Print diagnostics to stderr. Returns true when any of them is an error.
 */
function reportDiagnostics(diagnostics: Diagnostic[]): boolean {
  const sorted = [...diagnostics].sort(compareDiagnosticsForCli);
  for (const d of sorted) {
    const loc =
      d.line !== undefined && d.column !== undefined ? `${d.file}:${d.line}:${d.column}` : d.file;
    process.stderr.write(`${loc}: ${d.severity}: [${d.id}] ${d.message}\n`);
  }
  return sorted.some((d) => d.severity === 'error');
}

async function dumpTokens(entryFile: string): Promise<number> {
  let text: string;
  try {
    text = await readFile(entryFile, 'utf8');
  } catch (err) {
    reportDiagnostics([
      {
        id: DiagnosticIds.IoReadFailed,
        severity: 'error',
        message: `Failed to read entry file: ${String(err)}`,
        file: entryFile,
      },
    ]);
    return 1;
  }
  const tokenizer = new Tokenizer(text, entryFile);
  for (const token of tokenizer.tokenize()) {
    process.stdout.write(`${formatToken(token, tokenizer.lexeme(token))}\n`);
  }
  return reportDiagnostics(tokenizer.diagnostics) ? 1 : 0;
}

function writeStats(res: CompileResult): void {
  const { tokens, nodes, linesGenerated, arenaBytes } = res.stats;
  process.stderr.write(`tokens: ${tokens}\n`);
  process.stderr.write(`nodes: ${nodes}\n`);
  process.stderr.write(`lines: ${linesGenerated}\n`);
  process.stderr.write(`arena bytes: ${arenaBytes}\n`);
}

export async function runCli(argv: string[]): Promise<number> {
  try {
    const parsed = parseArgs(argv);
    if (parsed === 'interactive') {
      await runRepl(process.stdin, process.stdout);
      return 0;
    }
    if ('code' in parsed) return parsed.code;

    if (parsed.printTokens) return await dumpTokens(parsed.entryFile);

    const outputPath = parsed.outputPath
      ? resolve(parsed.outputPath)
      : defaultOutputPath(parsed.entryFile, parsed.format);

    const res = await compile(
      parsed.entryFile,
      { format: parsed.format, trailingReturn: parsed.trailingReturn, outputPath },
      { formats: defaultFormatWriters },
    );

    if (parsed.printAst && res.program) {
      process.stdout.write(`${formatAst(res.program)}\n`);
    }
    const failed = reportDiagnostics(res.diagnostics);
    if (parsed.printStats) writeStats(res);
    if (failed) return 1;

    for (const artifact of res.artifacts) {
      const path = artifact.path ?? outputPath;
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, artifact.text, 'utf8');
      process.stdout.write(`${path}\n`);
    }
    return 0;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`keelc: ${msg}\n`);
    process.stderr.write(`${usage()}\n`);
    return 2;
  }
}

function normalizePathForCompare(path: string): string {
  const resolved = resolve(path);
  const real = (() => {
    try {
      return realpathSync.native(resolved);
    } catch {
      return resolved;
    }
  })();
  const normalized = real.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function isDirectCliInvocation(invokedAs: string | undefined): boolean {
  if (!invokedAs) return false;
  const self = fileURLToPath(import.meta.url);
  if (normalizePathForCompare(invokedAs) === normalizePathForCompare(self)) return true;
  // npm bin shims may surface a different spelling of the built entry path.
  return (
    normalizePathForCompare(invokedAs).endsWith('/dist/src/cli.js') &&
    normalizePathForCompare(self).endsWith('/dist/src/cli.js')
  );
}

if (isDirectCliInvocation(process.argv[1])) {
  // eslint-disable-next-line no-void
  void runCli(process.argv.slice(2)).then((code) => process.exit(code));
}
