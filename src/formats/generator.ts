import type { Diagnostic } from '../diagnostics/types.js';
import type { ProgramNode } from '../frontend/ast.js';
import type { FormatWriters, OutputFormat, TextSink, WriteSourceOptions } from './types.js';
import { defaultFormatWriters } from './writers.js';

export type GeneratorOptions = WriteSourceOptions;

/**
 * Backend phase object: runs the writer for one format into one sink.
 *
 * On failure the sink is discarded, so a caller never sees partial output.
 */
export class CodeGenerator {
  readonly format: OutputFormat;
  readonly diagnostics: Diagnostic[] = [];

  private readonly sink: TextSink;
  private readonly options: GeneratorOptions;
  private readonly writers: FormatWriters;
  private errored = false;
  private lines = 0;
  private variables = 0;

  constructor(
    format: OutputFormat,
    sink: TextSink,
    options: GeneratorOptions = {},
    writers: FormatWriters = defaultFormatWriters,
  ) {
    this.format = format;
    this.sink = sink;
    this.options = options;
    this.writers = writers;
  }

  get hasError(): boolean {
    return this.errored;
  }

  get lastError(): string | undefined {
    return this.diagnostics[this.diagnostics.length - 1]?.message;
  }

  get linesGenerated(): number {
    return this.lines;
  }

  get variablesDeclared(): number {
    return this.variables;
  }

  /**
   * Generate code for `program`. Returns false, with the sink discarded, on any error.
   */
  generate(program: ProgramNode): boolean {
    const result = this.writers[this.format](program, this.sink, this.options);
    this.diagnostics.push(...result.diagnostics);
    this.lines += result.stats.linesGenerated;
    this.variables += result.stats.variablesDeclared;
    if (!result.ok) {
      this.errored = true;
      this.sink.discard();
    }
    return result.ok;
  }
}
