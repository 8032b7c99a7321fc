import { describe, expect, it } from 'vitest';

import { DiagnosticIds } from '../src/diagnostics/types.js';
import type { ProgramNode } from '../src/frontend/ast.js';
import { Tokenizer } from '../src/frontend/lexer.js';
import { Parser } from '../src/frontend/parser.js';
import { CodeGenerator, defaultFormatWriters, StringSink } from '../src/formats/index.js';
import type { FormatWriters, OutputFormat } from '../src/formats/index.js';

function program(text: string): ProgramNode {
  return new Parser(new Tokenizer(text, 'gen.keel')).parse();
}

describe('code generator', () => {
  it('writes C into the sink and reports counters', () => {
    const sink = new StringSink();
    const gen = new CodeGenerator('c', sink);
    expect(gen.generate(program('int a = 1; int b = 2;'))).toBe(true);
    expect(gen.hasError).toBe(false);
    expect(gen.lastError).toBeUndefined();
    expect(gen.linesGenerated).toBe(10);
    expect(gen.variablesDeclared).toBe(2);
    expect(sink.text.endsWith('    int b = 2;\n    return 0;\n}\n')).toBe(true);
  });

  it.each<OutputFormat>(['javascript', 'python', 'bytecode'])(
    'fails explicitly for the %s format',
    (format) => {
      const sink = new StringSink();
      const gen = new CodeGenerator(format, sink);
      expect(gen.generate(program('int a = 1;'))).toBe(false);
      expect(gen.hasError).toBe(true);
      expect(gen.lastError).toBe(`${format} code generation not implemented`);
      expect(gen.diagnostics.map((d) => d.id)).toEqual([DiagnosticIds.FormatNotImplemented]);
      expect(sink.text).toBe('');
      expect(sink.discarded).toBe(true);
    },
  );

  it('discards partial output when generation fails', () => {
    const sink = new StringSink();
    const writers: FormatWriters = {
      ...defaultFormatWriters,
      c: (_program, out) => {
        out.write('partial');
        return {
          ok: false,
          diagnostics: [
            { id: DiagnosticIds.UnsupportedNode, severity: 'error', message: 'nope', file: 'x' },
          ],
          stats: { linesGenerated: 1, variablesDeclared: 0 },
        };
      },
    };
    const gen = new CodeGenerator('c', sink, {}, writers);
    expect(gen.generate(program('x;'))).toBe(false);
    expect(sink.text).toBe('');
    expect(gen.lastError).toBe('nope');
  });

  it('ignores writes after the sink is discarded', () => {
    const sink = new StringSink();
    sink.write('a');
    sink.discard();
    sink.write('b');
    expect(sink.text).toBe('');
  });
});
