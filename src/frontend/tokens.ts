import type { LexicalDiagnosticId } from '../diagnostics/types.js';
import type { SourcePosition } from './source.js';

/**
 * Closed set of token kinds produced by the tokenizer.
 */
export const TokenKinds = {
  // Literals
  INTEGER: 'INTEGER',
  FLOAT: 'FLOAT',
  STRING: 'STRING',
  CHAR: 'CHAR',
  IDENTIFIER: 'IDENTIFIER',

  // Keywords - basic types
  INT: 'INT',
  FLOAT_KW: 'FLOAT_KW',
  STRING_KW: 'STRING_KW',
  BOOL_KW: 'BOOL_KW',
  CHAR_KW: 'CHAR_KW',
  VOID_KW: 'VOID_KW',

  // Keywords - control flow
  IF: 'IF',
  ELSE: 'ELSE',
  WHILE: 'WHILE',
  FOR: 'FOR',
  DO: 'DO',
  SWITCH: 'SWITCH',
  CASE: 'CASE',
  DEFAULT: 'DEFAULT',
  BREAK: 'BREAK',
  CONTINUE: 'CONTINUE',
  RETURN: 'RETURN',

  // Keywords - functions & variables
  FUNCTION: 'FUNCTION',
  VAR: 'VAR',
  CONST: 'CONST',

  // Keywords - types & members
  CLASS: 'CLASS',
  STRUCT: 'STRUCT',
  ENUM: 'ENUM',
  INTERFACE: 'INTERFACE',
  IMPLEMENTS: 'IMPLEMENTS',
  EXTENDS: 'EXTENDS',
  PUBLIC: 'PUBLIC',
  PRIVATE: 'PRIVATE',
  PROTECTED: 'PROTECTED',
  STATIC: 'STATIC',
  FINAL: 'FINAL',
  ABSTRACT: 'ABSTRACT',
  VIRTUAL: 'VIRTUAL',
  OVERRIDE: 'OVERRIDE',

  // Keywords - error handling
  TRY: 'TRY',
  CATCH: 'CATCH',
  FINALLY: 'FINALLY',
  THROW: 'THROW',

  // Keywords - modules
  IMPORT: 'IMPORT',
  EXPORT: 'EXPORT',
  MODULE: 'MODULE',
  NAMESPACE: 'NAMESPACE',

  // Keywords - literals
  TRUE: 'TRUE',
  FALSE: 'FALSE',
  NULL: 'NULL',
  UNDEFINED: 'UNDEFINED',

  // Arithmetic operators
  PLUS: 'PLUS', // +
  MINUS: 'MINUS', // -
  MULTIPLY: 'MULTIPLY', // *
  DIVIDE: 'DIVIDE', // /
  MODULO: 'MODULO', // %
  POWER: 'POWER', // **
  INCREMENT: 'INCREMENT', // ++
  DECREMENT: 'DECREMENT', // --

  // Assignment operators
  ASSIGN: 'ASSIGN', // =
  PLUS_ASSIGN: 'PLUS_ASSIGN', // +=
  MINUS_ASSIGN: 'MINUS_ASSIGN', // -=
  MULTIPLY_ASSIGN: 'MULTIPLY_ASSIGN', // *=
  DIVIDE_ASSIGN: 'DIVIDE_ASSIGN', // /=
  MODULO_ASSIGN: 'MODULO_ASSIGN', // %=
  POWER_ASSIGN: 'POWER_ASSIGN', // **=

  // Comparison operators
  EQUAL: 'EQUAL', // ==
  NOT_EQUAL: 'NOT_EQUAL', // !=
  STRICT_EQUAL: 'STRICT_EQUAL', // ===
  LESS: 'LESS', // <
  LESS_EQUAL: 'LESS_EQUAL', // <=
  GREATER: 'GREATER', // >
  GREATER_EQUAL: 'GREATER_EQUAL', // >=

  // Logical operators
  AND: 'AND', // &&
  OR: 'OR', // ||
  NOT: 'NOT', // !

  // Bitwise operators
  BITWISE_AND: 'BITWISE_AND', // &
  BITWISE_OR: 'BITWISE_OR', // |
  XOR: 'XOR', // ^
  TILDE: 'TILDE', // ~
  LSHIFT: 'LSHIFT', // <<
  RSHIFT: 'RSHIFT', // >>
  AND_ASSIGN: 'AND_ASSIGN', // &=
  OR_ASSIGN: 'OR_ASSIGN', // |=
  XOR_ASSIGN: 'XOR_ASSIGN', // ^=
  LSHIFT_ASSIGN: 'LSHIFT_ASSIGN', // <<=
  RSHIFT_ASSIGN: 'RSHIFT_ASSIGN', // >>=

  // Delimiters
  LPAREN: 'LPAREN',
  RPAREN: 'RPAREN',
  LBRACE: 'LBRACE',
  RBRACE: 'RBRACE',
  LBRACKET: 'LBRACKET',
  RBRACKET: 'RBRACKET',
  SEMICOLON: 'SEMICOLON',
  COMMA: 'COMMA',
  DOT: 'DOT',
  COLON: 'COLON',
  SCOPE: 'SCOPE', // ::
  ARROW: 'ARROW', // ->
  QUESTION: 'QUESTION',
  ELLIPSIS: 'ELLIPSIS', // ...
  HASH: 'HASH',

  // Special
  NEWLINE: 'NEWLINE',
  EOF: 'EOF',
  ERROR: 'ERROR',
} as const;

export type TokenKind = (typeof TokenKinds)[keyof typeof TokenKinds];

/**
 * Token kinds that name a variable type in a declaration (`int x = 1;`).
 */
export type BasicTypeKind =
  | typeof TokenKinds.INT
  | typeof TokenKinds.FLOAT_KW
  | typeof TokenKinds.STRING_KW
  | typeof TokenKinds.BOOL_KW
  | typeof TokenKinds.CHAR_KW;

export const BASIC_TYPE_KINDS: ReadonlySet<TokenKind> = new Set<TokenKind>([
  TokenKinds.INT,
  TokenKinds.FLOAT_KW,
  TokenKinds.STRING_KW,
  TokenKinds.BOOL_KW,
  TokenKinds.CHAR_KW,
]);

export function isBasicTypeKind(kind: TokenKind): kind is BasicTypeKind {
  return BASIC_TYPE_KINDS.has(kind);
}

/**
 * A token produced by the tokenizer.
 *
 * The lexeme is not stored: it is the slice `[pos.offset, pos.offset + length)` of the source text
 * the token was scanned from, so anything that must outlive that text has to be copied out.
 */
export interface Token {
  kind: TokenKind;
  /** Position of the first character. */
  pos: SourcePosition;
  /** Position just past the last character. */
  end: SourcePosition;
  /** Length in UTF-16 code units. */
  length: number;
  /** Source name used for diagnostics. */
  file: string;
  /** Literal payload: `bigint` for `INTEGER`, `number` for `FLOAT`. */
  value?: bigint | number;
  /** Error description, set on `ERROR` tokens. */
  message?: string;
  /** Diagnostic ID of the lexical error, set on `ERROR` tokens. */
  errorId?: LexicalDiagnosticId;
}

/**
 * Reserved words, matched against the whole identifier spelling only.
 */
export const KEYWORDS: ReadonlyMap<string, TokenKind> = new Map<string, TokenKind>([
  ['int', TokenKinds.INT],
  ['float', TokenKinds.FLOAT_KW],
  ['string', TokenKinds.STRING_KW],
  ['bool', TokenKinds.BOOL_KW],
  ['char', TokenKinds.CHAR_KW],
  ['void', TokenKinds.VOID_KW],
  ['if', TokenKinds.IF],
  ['else', TokenKinds.ELSE],
  ['while', TokenKinds.WHILE],
  ['for', TokenKinds.FOR],
  ['do', TokenKinds.DO],
  ['switch', TokenKinds.SWITCH],
  ['case', TokenKinds.CASE],
  ['default', TokenKinds.DEFAULT],
  ['break', TokenKinds.BREAK],
  ['continue', TokenKinds.CONTINUE],
  ['return', TokenKinds.RETURN],
  ['function', TokenKinds.FUNCTION],
  ['var', TokenKinds.VAR],
  ['const', TokenKinds.CONST],
  ['class', TokenKinds.CLASS],
  ['struct', TokenKinds.STRUCT],
  ['enum', TokenKinds.ENUM],
  ['interface', TokenKinds.INTERFACE],
  ['implements', TokenKinds.IMPLEMENTS],
  ['extends', TokenKinds.EXTENDS],
  ['public', TokenKinds.PUBLIC],
  ['private', TokenKinds.PRIVATE],
  ['protected', TokenKinds.PROTECTED],
  ['static', TokenKinds.STATIC],
  ['final', TokenKinds.FINAL],
  ['abstract', TokenKinds.ABSTRACT],
  ['virtual', TokenKinds.VIRTUAL],
  ['override', TokenKinds.OVERRIDE],
  ['try', TokenKinds.TRY],
  ['catch', TokenKinds.CATCH],
  ['finally', TokenKinds.FINALLY],
  ['throw', TokenKinds.THROW],
  ['import', TokenKinds.IMPORT],
  ['export', TokenKinds.EXPORT],
  ['module', TokenKinds.MODULE],
  ['namespace', TokenKinds.NAMESPACE],
  ['true', TokenKinds.TRUE],
  ['false', TokenKinds.FALSE],
  ['null', TokenKinds.NULL],
  ['undefined', TokenKinds.UNDEFINED],
]);

export function lookupKeyword(text: string): TokenKind {
  return KEYWORDS.get(text) ?? TokenKinds.IDENTIFIER;
}
