import type { BinaryOperator, UnaryOperator } from '../frontend/ast.js';
import { TokenKinds } from '../frontend/tokens.js';
import type { TokenKind } from '../frontend/tokens.js';

/**
 * C spelling of each source operator. Every operator the parser produces has an entry.
 */
export const C_BINARY_OPERATORS: Readonly<Record<BinaryOperator | '=', string>> = {
  '||': '||',
  '&&': '&&',
  '==': '==',
  '!=': '!=',
  '<': '<',
  '<=': '<=',
  '>': '>',
  '>=': '>=',
  '+': '+',
  '-': '-',
  '*': '*',
  '/': '/',
  '%': '%',
  '=': '=',
};

export const C_UNARY_OPERATORS: Readonly<Record<UnaryOperator, string>> = {
  '!': '!',
  '-': '-',
};

export const C_TYPES: ReadonlyMap<TokenKind, string> = new Map<TokenKind, string>([
  [TokenKinds.INT, 'int'],
  [TokenKinds.FLOAT_KW, 'double'],
  [TokenKinds.STRING_KW, 'char*'],
  [TokenKinds.BOOL_KW, 'bool'],
  [TokenKinds.CHAR_KW, 'char'],
]);

/** C type for a declaration keyword; anything outside the table is `int`. */
export function cTypeFor(kind: TokenKind): string {
  return C_TYPES.get(kind) ?? 'int';
}

/** Values an integer constant may take when initializing a variable of these C types. */
export const C_INTEGER_RANGES: ReadonlyMap<string, readonly [bigint, bigint]> = new Map<
  string,
  readonly [bigint, bigint]
>([
  ['int', [-(2n ** 31n), 2n ** 31n - 1n]],
  ['char', [-128n, 127n]],
]);

/**
 * Identifiers the generated file cannot use as variable names: C keywords that are not also Keel
 * keywords, and object-like macros from the included headers. Names starting with `__` or `_` and
 * an uppercase letter are reserved as well.
 */
export const C_RESERVED_WORDS: ReadonlySet<string> = new Set([
  'auto',
  'double',
  'extern',
  'goto',
  'inline',
  'long',
  'register',
  'restrict',
  'short',
  'signed',
  'sizeof',
  'typedef',
  'union',
  'unsigned',
  'volatile',
  'NULL',
  'EOF',
  'BUFSIZ',
  'FILENAME_MAX',
  'FOPEN_MAX',
  'L_tmpnam',
  'TMP_MAX',
  'SEEK_SET',
  'SEEK_CUR',
  'SEEK_END',
  'stdin',
  'stdout',
  'stderr',
  'EXIT_SUCCESS',
  'EXIT_FAILURE',
  'RAND_MAX',
  'MB_CUR_MAX',
]);

/**
 * C spelling of a source identifier. Reserved names get a trailing `_`, and so does any reserved
 * name already followed by underscores, so two distinct source names never meet.
 */
export function cIdentifier(name: string): string {
  const reserved = C_RESERVED_WORDS.has(name.replace(/_+$/, '')) || /^_[A-Z_]/.test(name);
  return reserved ? `${name}_` : name;
}

export const C_PREAMBLE: readonly string[] = [
  '#include <stdio.h>',
  '#include <stdlib.h>',
  '#include <stdbool.h>',
  '#include <string.h>',
  '',
  'int main(void) {',
];
