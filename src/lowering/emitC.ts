import type { Diagnostic, DiagnosticId } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { AstNode, ExprNode, LiteralValue, ProgramNode, StmtNode } from '../frontend/ast.js';
import { decodeEscapes } from '../frontend/lexer.js';
import type { SourceSpan } from '../frontend/source.js';
import type { GenerationStats, TextSink, WriteSourceOptions } from '../formats/types.js';
import {
  C_BINARY_OPERATORS,
  C_INTEGER_RANGES,
  C_PREAMBLE,
  C_UNARY_OPERATORS,
  cIdentifier,
  cTypeFor,
} from './tables.js';

const INT32_MIN = -(2n ** 31n);
const INT32_MAX = 2n ** 31n - 1n;

function diagAt(
  diagnostics: Diagnostic[],
  id: DiagnosticId,
  span: SourceSpan,
  message: string,
): void {
  diagnostics.push({
    id,
    severity: 'error',
    message,
    file: span.file,
    line: span.start.line,
    column: span.start.column,
  });
}

function utf8Bytes(codePoint: number): number[] {
  if (codePoint < 0x80) return [codePoint];
  if (codePoint < 0x800) return [0xc0 | (codePoint >> 6), 0x80 | (codePoint & 0x3f)];
  if (codePoint < 0x10000) {
    return [
      0xe0 | (codePoint >> 12),
      0x80 | ((codePoint >> 6) & 0x3f),
      0x80 | (codePoint & 0x3f),
    ];
  }
  return [
    0xf0 | (codePoint >> 18),
    0x80 | ((codePoint >> 12) & 0x3f),
    0x80 | ((codePoint >> 6) & 0x3f),
    0x80 | (codePoint & 0x3f),
  ];
}

const C_NAMED_ESCAPES: ReadonlyMap<number, string> = new Map([
  [0x0a, '\\n'],
  [0x09, '\\t'],
  [0x0d, '\\r'],
  [0x5c, '\\\\'],
]);

/**
 * C spelling of one byte inside a literal delimited by `quote`. Anything outside printable ASCII
 * becomes a three-digit octal escape, which cannot run into the character after it.
 */
function cByte(byte: number, quote: string, previous: number | undefined): string {
  const named = C_NAMED_ESCAPES.get(byte);
  if (named !== undefined) return named;
  const ch = String.fromCharCode(byte);
  if (ch === quote) return `\\${quote}`;
  // `??` would start a trigraph.
  if (ch === '?' && previous === 0x3f) return '\\?';
  if (byte >= 0x20 && byte < 0x7f) return ch;
  return `\\${byte.toString(8).padStart(3, '0')}`;
}

/**
 * C string literal for the body of a string token. Escapes are decoded first; code points are
 * written as UTF-8 and `\x` escapes as the byte they name.
 */
export function formatCString(raw: string): string {
  const bytes = decodeEscapes(raw).flatMap((unit) =>
    unit.kind === 'byte' ? [unit.value] : utf8Bytes(unit.value),
  );
  return `"${bytes.map((b, i) => cByte(b, '"', bytes[i - 1])).join('')}"`;
}

/**
 * C character constant for the body of a char token, or `undefined` when the character does not
 * fit in one C `char` (a code point above ASCII).
 */
export function formatCChar(raw: string): string | undefined {
  const [unit, ...rest] = decodeEscapes(raw);
  if (!unit || rest.length > 0) return undefined;
  if (unit.kind === 'codepoint' && unit.value > 0x7f) return undefined;
  return `'${cByte(unit.value, "'", undefined)}'`;
}

/** Value of an integer literal, possibly negated, or `undefined` for any other expression. */
function integerConstant(node: ExprNode): bigint | undefined {
  if (node.kind === 'Literal') return node.value.type === 'int' ? node.value.value : undefined;
  if (node.kind === 'Unary' && node.operator === '-') {
    const operand = integerConstant(node.operand);
    return operand === undefined ? undefined : -operand;
  }
  return undefined;
}

/** C spelling of an integer literal; values outside `int` get an `LL` suffix. */
export function formatCInteger(value: bigint): string {
  const text = value.toString();
  return value < INT32_MIN || value > INT32_MAX ? `${text}LL` : text;
}

/** Shortest round-trip spelling that C still reads as a floating constant. */
export function formatCDouble(value: number): string | undefined {
  if (!Number.isFinite(value)) return undefined;
  const text = String(value);
  return /[.e]/.test(text) ? text : `${text}.0`;
}

/**
 * Translate a parsed program into one C translation unit whose `main` runs the top-level
 * statements in order.
 *
 * Everything is written to `sink`. The first unsupported node or unrepresentable literal stops the
 * walk; the caller is expected to discard the partial output.
 */
export function emitC(
  program: ProgramNode,
  sink: TextSink,
  diagnostics: Diagnostic[],
  options?: WriteSourceOptions,
): GenerationStats {
  const indentUnit = options?.indent ?? '    ';
  const lineEnding = options?.lineEnding ?? '\n';
  const trailingReturn = options?.trailingReturn ?? 'auto';

  const stats: GenerationStats = { linesGenerated: 0, variablesDeclared: 0 };
  let failed = false;

  const line = (depth: number, text: string): void => {
    sink.write(text.length > 0 ? `${indentUnit.repeat(depth)}${text}${lineEnding}` : lineEnding);
    stats.linesGenerated++;
  };

  const unsupported = (node: AstNode): string => {
    failed = true;
    diagAt(
      diagnostics,
      DiagnosticIds.UnsupportedNode,
      node.span,
      `Unsupported node kind "${node.kind}" in C code generation.`,
    );
    return '';
  };

  const unrepresentable = (span: SourceSpan, message: string): string => {
    failed = true;
    diagAt(diagnostics, DiagnosticIds.UnrepresentableLiteral, span, message);
    return '';
  };

  const literal = (value: LiteralValue, span: SourceSpan): string => {
    switch (value.type) {
      case 'int':
        return formatCInteger(value.value);
      case 'float': {
        const text = formatCDouble(value.value);
        return (
          text ?? unrepresentable(span, `Float literal ${String(value.value)} has no C spelling.`)
        );
      }
      case 'string':
        return formatCString(value.raw);
      case 'char':
        return (
          formatCChar(value.raw) ??
          unrepresentable(span, `Character literal '${value.raw}' does not fit in a C char.`)
        );
      case 'bool':
        return value.value ? 'true' : 'false';
      case 'null':
        return 'NULL';
    }
  };

  const expr = (node: ExprNode): string => {
    switch (node.kind) {
      case 'Literal':
        return literal(node.value, node.span);
      case 'Identifier':
        return cIdentifier(node.name);
      case 'Binary':
        return `(${expr(node.left)} ${C_BINARY_OPERATORS[node.operator]} ${expr(node.right)})`;
      case 'Unary':
        return `(${C_UNARY_OPERATORS[node.operator]}${expr(node.operand)})`;
      case 'Assignment':
        return `(${cIdentifier(node.target.name)} ${C_BINARY_OPERATORS['=']} ${expr(node.value)})`;
      case 'Call':
        return unsupported(node);
    }
  };

  const stmt = (node: StmtNode, depth: number): void => {
    switch (node.kind) {
      case 'VarDeclaration': {
        const type = cTypeFor(node.varType);
        const init = node.initializer ? ` = ${expr(node.initializer)}` : '';
        if (failed) return;
        const range = C_INTEGER_RANGES.get(type);
        const constant = node.initializer ? integerConstant(node.initializer) : undefined;
        if (node.initializer && range && constant !== undefined) {
          const [min, max] = range;
          if (constant < min || constant > max) {
            unrepresentable(
              node.initializer.span,
              `Integer literal ${constant} does not fit in C ${type}.`,
            );
            return;
          }
        }
        line(depth, `${type} ${cIdentifier(node.name)}${init};`);
        stats.variablesDeclared++;
        return;
      }
      case 'ExpressionStatement': {
        const text = expr(node.expression);
        if (!failed) line(depth, `${text};`);
        return;
      }
      case 'Return': {
        // A bare `return;` still has to give `main` its exit status.
        const text = node.value ? expr(node.value) : '0';
        if (!failed) line(depth, `return ${text};`);
        return;
      }
      case 'FunctionDeclaration':
      case 'ClassDeclaration':
      case 'If':
      case 'While':
      case 'For':
      case 'Block':
        unsupported(node);
        return;
    }
  };

  for (const text of C_PREAMBLE) line(0, text);
  for (const s of program.statements) {
    stmt(s, 1);
    if (failed) return stats;
  }

  const last = program.statements[program.statements.length - 1];
  if (trailingReturn === 'always' || last?.kind !== 'Return') line(1, 'return 0;');
  line(0, '}');
  return stats;
}
