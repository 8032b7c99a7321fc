import { readFile } from 'node:fs/promises';

import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds, hasErrors, isLexicalDiagnosticId } from './diagnostics/types.js';
import type {
  CompileFn,
  CompilerOptions,
  CompileResult,
  CompileStats,
  PipelineDeps,
} from './pipeline.js';

import { Tokenizer } from './frontend/lexer.js';
import { Parser } from './frontend/parser.js';
import type { ProgramNode } from './frontend/ast.js';
import { defaultFormatWriters } from './formats/writers.js';
import { CodeGenerator } from './formats/generator.js';
import { StringSink } from './formats/sink.js';
import type { Artifact } from './formats/types.js';

function withDefaults(
  options: CompilerOptions,
): Required<
  Pick<CompilerOptions, 'format' | 'trailingReturn' | 'indent' | 'lineEnding' | 'emitNewlineTokens'>
> {
  return {
    format: options.format ?? 'c',
    trailingReturn: options.trailingReturn ?? 'auto',
    indent: options.indent ?? '    ',
    lineEnding: options.lineEnding ?? '\n',
    emitNewlineTokens: options.emitNewlineTokens ?? false,
  };
}

function internalError(diagnostics: Diagnostic[], file: string, phase: string, err: unknown): void {
  diagnostics.push({
    id: DiagnosticIds.InternalError,
    severity: 'error',
    message: `Internal error during ${phase}: ${String(err)}`,
    file,
  });
}

/**
 * Run the front end: tokenize and parse.
 *
 * Lexical errors are taken from the tokenizer, which sees every token; the parser's copies of them
 * are dropped so each is reported once.
 */
function parseSource(
  fileName: string,
  text: string,
  options: CompilerOptions,
  diagnostics: Diagnostic[],
  stats: CompileStats,
): ProgramNode | undefined {
  const tokenizer = new Tokenizer(text, fileName, {
    emitNewlines: withDefaults(options).emitNewlineTokens,
  });
  let parser: Parser;
  let program: ProgramNode;
  try {
    parser = new Parser(tokenizer, { ...(options.arena ? { arena: options.arena } : {}) });
    program = parser.parse();
  } catch (err) {
    diagnostics.push(...tokenizer.diagnostics);
    internalError(diagnostics, fileName, 'parse', err);
    return undefined;
  }

  diagnostics.push(...tokenizer.diagnostics);
  diagnostics.push(...parser.diagnostics.filter((d) => !isLexicalDiagnosticId(d.id)));
  stats.tokens = tokenizer.tokenCount;
  stats.nodes = parser.nodeCount;
  stats.arenaBytes = parser.arena.peakUsed;

  if (tokenizer.hasError || parser.hasError) return undefined;
  return program;
}

/**
 * Compile Keel source text held in memory.
 *
 * Phases run in order (tokenize + parse, then generate); generation is skipped when the front end
 * reported any error. On success exactly one artifact is returned.
 */
export function compileSource(
  fileName: string,
  text: string,
  options: CompilerOptions = {},
  deps: PipelineDeps = { formats: defaultFormatWriters },
): CompileResult {
  const diagnostics: Diagnostic[] = [];
  const stats: CompileStats = { tokens: 0, nodes: 0, linesGenerated: 0, arenaBytes: 0 };

  const program = parseSource(fileName, text, options, diagnostics, stats);
  if (!program || hasErrors(diagnostics)) return { diagnostics, artifacts: [], stats };

  const opts = withDefaults(options);
  const sink = new StringSink();
  const generator = new CodeGenerator(
    opts.format,
    sink,
    { indent: opts.indent, lineEnding: opts.lineEnding, trailingReturn: opts.trailingReturn },
    deps.formats,
  );
  try {
    generator.generate(program);
  } catch (err) {
    internalError(diagnostics, fileName, 'code generation', err);
    return { diagnostics, artifacts: [], program, stats };
  }
  diagnostics.push(...generator.diagnostics);
  stats.linesGenerated = generator.linesGenerated;
  if (generator.hasError) return { diagnostics, artifacts: [], program, stats };

  const artifact: Artifact = {
    kind: opts.format,
    ...(options.outputPath ? { path: options.outputPath } : {}),
    text: sink.text,
  };
  return { diagnostics, artifacts: [artifact], program, stats };
}

/**
 * Compile a Keel program from an entry file.
 *
 * Produces artifacts in-memory via `deps.formats`; nothing is written to disk.
 */
export const compile: CompileFn = async (
  entryFile: string,
  options: CompilerOptions,
  deps: PipelineDeps,
): Promise<CompileResult> => {
  let text: string;
  try {
    text = await readFile(entryFile, 'utf8');
  } catch (err) {
    return {
      diagnostics: [
        {
          id: DiagnosticIds.IoReadFailed,
          severity: 'error',
          message: `Failed to read entry file: ${String(err)}`,
          file: entryFile,
        },
      ],
      artifacts: [],
      stats: { tokens: 0, nodes: 0, linesGenerated: 0, arenaBytes: 0 },
    };
  }
  return compileSource(entryFile, text, options, deps);
};
