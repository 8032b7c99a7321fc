import { afterEach, describe, expect, it } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { compile, compileSource } from '../src/compile.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import { defaultFormatWriters } from '../src/formats/index.js';

const SAMPLE = 'int x = 42;\nint y = x + 10;\nint result = x * y;\nreturn result;\n';

const SAMPLE_C = [
  '#include <stdio.h>',
  '#include <stdlib.h>',
  '#include <stdbool.h>',
  '#include <string.h>',
  '',
  'int main(void) {',
  '    int x = 42;',
  '    int y = (x + 10);',
  '    int result = (x * y);',
  '    return result;',
  '}',
  '',
].join('\n');

describe('compileSource', () => {
  it('produces one C artifact and counters for a valid program', () => {
    const res = compileSource('sample.keel', SAMPLE);
    expect(res.diagnostics).toEqual([]);
    expect(res.artifacts).toEqual([{ kind: 'c', text: SAMPLE_C }]);
    expect(res.program?.statements).toHaveLength(4);
    expect(res.stats).toEqual({ tokens: 23, nodes: 13, linesGenerated: 11, arenaBytes: 856 });
  });

  it('records the output path on the artifact', () => {
    const res = compileSource('sample.keel', SAMPLE, { outputPath: '/tmp/out.c' });
    expect(res.artifacts[0]?.path).toBe('/tmp/out.c');
  });

  it('applies the trailing return policy', () => {
    const res = compileSource('sample.keel', SAMPLE, { trailingReturn: 'always' });
    expect(res.artifacts[0]?.text).toContain('    return result;\n    return 0;\n}\n');
  });

  it('stops before generation on a syntax error', () => {
    const res = compileSource('bad.keel', 'int = 1;');
    expect(res.artifacts).toEqual([]);
    expect(res.program).toBeUndefined();
    expect(res.diagnostics.map((d) => d.id)).toEqual([DiagnosticIds.MissingDelimiter]);
  });

  it('reports each lexical error once, with the tokenizer message', () => {
    const res = compileSource('lex.keel', 'int x = @;');
    expect(res.diagnostics).toEqual([
      {
        id: DiagnosticIds.UnexpectedCharacter,
        severity: 'error',
        message: "Unexpected character '@'",
        file: 'lex.keel',
        line: 1,
        column: 9,
      },
    ]);
    expect(res.artifacts).toEqual([]);
  });

  it('keeps the program but produces nothing for an unimplemented format', () => {
    const res = compileSource('sample.keel', SAMPLE, { format: 'python' });
    expect(res.program).toBeDefined();
    expect(res.artifacts).toEqual([]);
    expect(res.diagnostics.map((d) => [d.id, d.message])).toEqual([
      [DiagnosticIds.FormatNotImplemented, 'python code generation not implemented'],
    ]);
  });

  it('reports arena exhaustion from the configured arena', () => {
    const res = compileSource('tiny.keel', 'int x = 1;', {
      arena: { blockSize: 64, growable: false },
    });
    expect(res.diagnostics.map((d) => d.id)).toEqual([DiagnosticIds.ArenaCapacityExceeded]);
    expect(res.artifacts).toEqual([]);
  });

  it('turns an unexpected exception into an internal error', () => {
    const res = compileSource('cfg.keel', 'int x = 1;', { arena: { blockSize: 0 } });
    expect(res.diagnostics).toEqual([
      {
        id: DiagnosticIds.InternalError,
        severity: 'error',
        message:
          'Internal error during parse: RangeError: Arena block size must be a positive integer, got 0',
        file: 'cfg.keel',
      },
    ]);
  });

  it('reports deeply nested input as a syntax error', () => {
    const res = compileSource('deep.keel', `return ${'('.repeat(20000)}1${')'.repeat(20000)};`);
    expect(res.diagnostics.map((d) => d.id)).toEqual([DiagnosticIds.NestingTooDeep]);
    expect(res.artifacts).toEqual([]);
  });

  it('stops before writing C that would not compile', () => {
    const res = compileSource('range.keel', 'int big = 3000000000;');
    expect(res.diagnostics.map((d) => d.id)).toEqual([DiagnosticIds.UnrepresentableLiteral]);
    expect(res.artifacts).toEqual([]);
  });

  it('accepts newline tokens from the tokenizer', () => {
    const res = compileSource('nl.keel', SAMPLE, { emitNewlineTokens: true });
    expect(res.artifacts[0]?.text).toBe(SAMPLE_C);
  });
});

describe('compile', () => {
  let work: string | undefined;

  afterEach(async () => {
    if (work) await rm(work, { recursive: true, force: true });
    work = undefined;
  });

  it('reads the entry file and compiles it', async () => {
    work = await mkdtemp(join(tmpdir(), 'keel-compile-'));
    const entry = join(work, 'main.keel');
    await writeFile(entry, SAMPLE, 'utf8');
    const res = await compile(entry, {}, { formats: defaultFormatWriters });
    expect(res.diagnostics).toEqual([]);
    expect(res.artifacts[0]?.text).toBe(SAMPLE_C);
  });

  it('reports an unreadable entry file', async () => {
    work = await mkdtemp(join(tmpdir(), 'keel-compile-'));
    const entry = join(work, 'missing.keel');
    const res = await compile(entry, {}, { formats: defaultFormatWriters });
    expect(res.artifacts).toEqual([]);
    expect(res.diagnostics).toHaveLength(1);
    expect(res.diagnostics[0]?.id).toBe(DiagnosticIds.IoReadFailed);
    expect(res.diagnostics[0]?.file).toBe(entry);
  });
});
