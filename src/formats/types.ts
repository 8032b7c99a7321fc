import type { Diagnostic } from '../diagnostics/types.js';
import type { ProgramNode } from '../frontend/ast.js';

/**
 * Output formats accepted by configuration. Only `c` has a backend.
 */
export type OutputFormat = 'c' | 'javascript' | 'python' | 'bytecode';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['c', 'javascript', 'python', 'bytecode'];

/** Default file extension per format, used to derive output paths. */
export const FORMAT_EXTENSIONS: Readonly<Record<OutputFormat, string>> = {
  c: '.c',
  javascript: '.js',
  python: '.py',
  bytecode: '.kbc',
};

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((f) => f === value);
}

/**
 * Writable text destination for generated code.
 */
export interface TextSink {
  write(text: string): void;
  /** Drop everything written so far; later writes are ignored. */
  discard(): void;
  readonly text: string;
  readonly discarded: boolean;
}

/**
 * Whether the entry point gets a final `return 0;` when the program already ends in a return.
 */
export type TrailingReturnMode = 'auto' | 'always';

/**
 * Options shared by source-code writers.
 */
export interface WriteSourceOptions {
  /** Indentation for one nesting level (default four spaces). */
  indent?: string;
  /**
   * Line ending to use when emitting text formats.
   */
  lineEnding?: '\n' | '\r\n';
  trailingReturn?: TrailingReturnMode;
}

export interface GenerationStats {
  linesGenerated: number;
  variablesDeclared: number;
}

/**
 * Outcome of one writer run. `ok` is false when any error diagnostic was recorded.
 */
export interface WriteResult {
  ok: boolean;
  diagnostics: Diagnostic[];
  stats: GenerationStats;
}

export type FormatWriter = (
  program: ProgramNode,
  sink: TextSink,
  opts?: WriteSourceOptions,
) => WriteResult;

/**
 * Format writers used by the pipeline, one per output format.
 */
export type FormatWriters = Readonly<Record<OutputFormat, FormatWriter>>;

/**
 * In-memory generated source artifact.
 */
export interface SourceArtifact {
  kind: OutputFormat;
  path?: string;
  text: string;
}

/**
 * Union of all artifact kinds produced by the compiler.
 */
export type Artifact = SourceArtifact;
