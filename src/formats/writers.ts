import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds, hasErrors } from '../diagnostics/types.js';
import type { ProgramNode } from '../frontend/ast.js';
import { emitC } from '../lowering/emitC.js';
import type {
  FormatWriter,
  FormatWriters,
  OutputFormat,
  TextSink,
  WriteResult,
  WriteSourceOptions,
} from './types.js';

/**
 * Write `program` as a C translation unit.
 */
export function writeC(
  program: ProgramNode,
  sink: TextSink,
  opts?: WriteSourceOptions,
): WriteResult {
  const diagnostics: Diagnostic[] = [];
  const stats = emitC(program, sink, diagnostics, opts);
  return { ok: !hasErrors(diagnostics), diagnostics, stats };
}

/**
 * Writer for a format that is accepted by configuration but has no backend. It writes nothing and
 * always fails.
 */
export function notImplementedWriter(format: OutputFormat): FormatWriter {
  return (program) => ({
    ok: false,
    diagnostics: [
      {
        id: DiagnosticIds.FormatNotImplemented,
        severity: 'error',
        message: `${format} code generation not implemented`,
        file: program.span.file,
      },
    ],
    stats: { linesGenerated: 0, variablesDeclared: 0 },
  });
}

/**
 * Default in-memory writers.
 *
 * These writers implement the `FormatWriters` contract and fill a sink without touching disk.
 */
export const defaultFormatWriters: FormatWriters = {
  c: writeC,
  javascript: notImplementedWriter('javascript'),
  python: notImplementedWriter('python'),
  bytecode: notImplementedWriter('bytecode'),
};
