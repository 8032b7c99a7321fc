import type { Diagnostic } from './diagnostics/types.js';
import type { ArenaOptions } from './frontend/arena.js';
import type { ProgramNode } from './frontend/ast.js';
import type { Artifact, FormatWriters, OutputFormat, TrailingReturnMode } from './formats/types.js';

/**
 * Options that influence compilation behavior and which artifact is produced.
 */
export interface CompilerOptions {
  /** Output format (default `c`). */
  format?: OutputFormat;
  /** Output path recorded on the produced artifact. */
  outputPath?: string;
  /** Trailing `return 0;` policy for the generated entry point (default `auto`). */
  trailingReturn?: TrailingReturnMode;
  /** Indentation for one nesting level in generated code (default four spaces). */
  indent?: string;
  /** Line ending for generated code (default `\n`). */
  lineEnding?: '\n' | '\r\n';
  /** Arena configuration for the parser (default growable 64 KiB blocks). */
  arena?: ArenaOptions;
  /** Have the tokenizer yield newline tokens; the parser ignores them either way. */
  emitNewlineTokens?: boolean;
}

/**
 * Counters gathered while compiling, for reporting only.
 */
export interface CompileStats {
  tokens: number;
  nodes: number;
  linesGenerated: number;
  arenaBytes: number;
}

/**
 * Result of a compilation run: diagnostics plus any produced artifacts.
 */
export interface CompileResult {
  diagnostics: Diagnostic[];
  artifacts: Artifact[];
  /** The parsed program, present when parsing finished without errors. */
  program?: ProgramNode;
  stats: CompileStats;
}

/**
 * Dependency injection surface for the compiler pipeline.
 *
 * Callers provide concrete format writers so the core pipeline can be pure/in-memory.
 */
export interface PipelineDeps {
  formats: FormatWriters;
}

/**
 * Top-level compile function signature used by the pipeline contract.
 */
export type CompileFn = (
  entryFile: string,
  options: CompilerOptions,
  deps: PipelineDeps,
) => Promise<CompileResult>;
