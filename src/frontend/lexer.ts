import type { Diagnostic, LexicalDiagnosticId } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import { START_OF_INPUT } from './source.js';
import type { SourcePosition } from './source.js';
import { lookupKeyword, TokenKinds } from './tokens.js';
import type { Token, TokenKind } from './tokens.js';

export interface TokenizerOptions {
  /** Yield a `NEWLINE` token for each line break instead of skipping it as whitespace. */
  emitNewlines?: boolean;
}

const INT64_MAX = (1n << 63n) - 1n;

const RADIX_PREFIX: Record<number, string> = { 2: '0b', 8: '0o', 10: '', 16: '0x' };

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isHexDigit(ch: string): boolean {
  return isDigit(ch) || (ch >= 'a' && ch <= 'f') || (ch >= 'A' && ch <= 'F');
}

/** Hex digits read after `\x` and `\u`, at most. */
const ESCAPE_HEX_DIGITS: ReadonlyMap<string, number> = new Map([
  ['x', 2],
  ['u', 4],
]);

const SIMPLE_ESCAPES: ReadonlyMap<string, number> = new Map([
  ['n', 0x0a],
  ['t', 0x09],
  ['r', 0x0d],
  ['0', 0x00],
  ['\\', 0x5c],
  ['"', 0x22],
  ["'", 0x27],
]);

/**
 * One element of a decoded literal body. `\x` yields a raw byte; everything else, escaped or not,
 * yields a code point.
 */
export interface LiteralUnit {
  kind: 'byte' | 'codepoint';
  value: number;
}

/**
 * Decode the text between the quotes of a string or char token, reading escapes exactly as the
 * tokenizer scanned them. `\x` and `\u` with no hex digits, and any other escaped character,
 * stand for the character after the backslash.
 */
export function decodeEscapes(raw: string): LiteralUnit[] {
  const chars = Array.from(raw);
  const units: LiteralUnit[] = [];
  for (let i = 0; i < chars.length; i++) {
    const ch = chars[i] ?? '';
    const next = chars[i + 1];
    if (ch !== '\\' || next === undefined) {
      units.push({ kind: 'codepoint', value: ch.codePointAt(0) ?? 0 });
      continue;
    }
    i++;
    const maxDigits = ESCAPE_HEX_DIGITS.get(next) ?? 0;
    let digits = '';
    while (digits.length < maxDigits) {
      const d = chars[i + 1];
      if (d === undefined || !isHexDigit(d)) break;
      digits += d;
      i++;
    }
    if (digits.length > 0) {
      units.push({ kind: next === 'x' ? 'byte' : 'codepoint', value: parseInt(digits, 16) });
    } else {
      const value = SIMPLE_ESCAPES.get(next) ?? next.codePointAt(0) ?? 0;
      units.push({ kind: 'codepoint', value });
    }
  }
  return units;
}

function isAlpha(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z') || ch === '_';
}

function isRadixDigit(ch: string, radix: number): boolean {
  if (radix === 16) return isHexDigit(ch);
  if (radix === 8) return ch >= '0' && ch <= '7';
  return ch === '0' || ch === '1';
}

function radixOf(ch: string): number | undefined {
  switch (ch) {
    case 'x':
    case 'X':
      return 16;
    case 'b':
    case 'B':
      return 2;
    case 'o':
    case 'O':
      return 8;
    default:
      return undefined;
  }
}

/**
 * Pull-based tokenizer over one source text.
 *
 * Lexical problems never stop the stream: they come back as `ERROR` tokens, set the sticky
 * {@link hasError} flag and are recorded in {@link diagnostics}. Past the end of input every call to
 * {@link next} returns `EOF`.
 */
export class Tokenizer {
  readonly file: string;
  readonly diagnostics: Diagnostic[] = [];

  private readonly text: string;
  private readonly emitNewlines: boolean;
  private offset = 0;
  private line = 1;
  private column = 1;
  private start: SourcePosition = { ...START_OF_INPUT };
  private errored = false;
  private lastMessage: string | undefined;
  private produced = 0;

  constructor(text: string, fileName: string, options: TokenizerOptions = {}) {
    this.file = fileName;
    this.text = text;
    this.emitNewlines = options.emitNewlines ?? false;
  }

  get hasError(): boolean {
    return this.errored;
  }

  /** Message of the most recent lexical error. */
  get lastError(): string | undefined {
    return this.lastMessage;
  }

  /** Number of tokens returned by {@link next}, `EOF` included. */
  get tokenCount(): number {
    return this.produced;
  }

  /** Source text covered by `token`. */
  lexeme(token: Token): string {
    return this.text.slice(token.pos.offset, token.pos.offset + token.length);
  }

  next(): Token {
    this.skipTrivia();
    this.start = { line: this.line, column: this.column, offset: this.offset };
    this.produced++;

    if (this.isAtEnd()) return this.make(TokenKinds.EOF);

    const c = this.advance();
    if (isAlpha(c)) return this.identifier();
    if (isDigit(c)) return this.number(c);

    switch (c) {
      case '(':
        return this.make(TokenKinds.LPAREN);
      case ')':
        return this.make(TokenKinds.RPAREN);
      case '{':
        return this.make(TokenKinds.LBRACE);
      case '}':
        return this.make(TokenKinds.RBRACE);
      case '[':
        return this.make(TokenKinds.LBRACKET);
      case ']':
        return this.make(TokenKinds.RBRACKET);
      case ';':
        return this.make(TokenKinds.SEMICOLON);
      case ',':
        return this.make(TokenKinds.COMMA);
      case '?':
        return this.make(TokenKinds.QUESTION);
      case '~':
        return this.make(TokenKinds.TILDE);
      case '#':
        return this.make(TokenKinds.HASH);
      case '\n':
        return this.make(TokenKinds.NEWLINE);
      case '.':
        if (this.match('.')) {
          if (this.match('.')) return this.make(TokenKinds.ELLIPSIS);
          return this.error(DiagnosticIds.InvalidOperatorSequence, `Invalid token '..'`);
        }
        return this.make(TokenKinds.DOT);
      case ':':
        return this.make(this.match(':') ? TokenKinds.SCOPE : TokenKinds.COLON);
      case '^':
        return this.make(this.match('=') ? TokenKinds.XOR_ASSIGN : TokenKinds.XOR);
      case '+':
        if (this.match('+')) return this.make(TokenKinds.INCREMENT);
        if (this.match('=')) return this.make(TokenKinds.PLUS_ASSIGN);
        return this.make(TokenKinds.PLUS);
      case '-':
        if (this.match('-')) return this.make(TokenKinds.DECREMENT);
        if (this.match('=')) return this.make(TokenKinds.MINUS_ASSIGN);
        if (this.match('>')) return this.make(TokenKinds.ARROW);
        return this.make(TokenKinds.MINUS);
      case '*':
        if (this.match('=')) return this.make(TokenKinds.MULTIPLY_ASSIGN);
        if (this.match('*')) {
          return this.make(this.match('=') ? TokenKinds.POWER_ASSIGN : TokenKinds.POWER);
        }
        return this.make(TokenKinds.MULTIPLY);
      case '/':
        return this.make(this.match('=') ? TokenKinds.DIVIDE_ASSIGN : TokenKinds.DIVIDE);
      case '%':
        return this.make(this.match('=') ? TokenKinds.MODULO_ASSIGN : TokenKinds.MODULO);
      case '!':
        return this.make(this.match('=') ? TokenKinds.NOT_EQUAL : TokenKinds.NOT);
      case '=':
        if (this.match('=')) {
          return this.make(this.match('=') ? TokenKinds.STRICT_EQUAL : TokenKinds.EQUAL);
        }
        return this.make(TokenKinds.ASSIGN);
      case '<':
        if (this.match('<')) {
          return this.make(this.match('=') ? TokenKinds.LSHIFT_ASSIGN : TokenKinds.LSHIFT);
        }
        return this.make(this.match('=') ? TokenKinds.LESS_EQUAL : TokenKinds.LESS);
      case '>':
        if (this.match('>')) {
          return this.make(this.match('=') ? TokenKinds.RSHIFT_ASSIGN : TokenKinds.RSHIFT);
        }
        return this.make(this.match('=') ? TokenKinds.GREATER_EQUAL : TokenKinds.GREATER);
      case '&':
        if (this.match('&')) return this.make(TokenKinds.AND);
        if (this.match('=')) return this.make(TokenKinds.AND_ASSIGN);
        return this.make(TokenKinds.BITWISE_AND);
      case '|':
        if (this.match('|')) return this.make(TokenKinds.OR);
        if (this.match('=')) return this.make(TokenKinds.OR_ASSIGN);
        return this.make(TokenKinds.BITWISE_OR);
      case '"':
        return this.string();
      case "'":
        return this.charLiteral();
      default:
        return this.unexpected(c);
    }
  }

  /**
   * Return the token {@link next} would return, leaving position and error state untouched.
   */
  peek(): Token {
    const saved = {
      offset: this.offset,
      line: this.line,
      column: this.column,
      start: this.start,
      errored: this.errored,
      lastMessage: this.lastMessage,
      produced: this.produced,
      diagnostics: this.diagnostics.length,
    };
    const token = this.next();
    this.offset = saved.offset;
    this.line = saved.line;
    this.column = saved.column;
    this.start = saved.start;
    this.errored = saved.errored;
    this.lastMessage = saved.lastMessage;
    this.produced = saved.produced;
    this.diagnostics.length = saved.diagnostics;
    return token;
  }

  /**
   * Drain the stream. The returned list always ends with exactly one `EOF` token.
   */
  tokenize(): Token[] {
    const tokens: Token[] = [];
    for (;;) {
      const token = this.next();
      tokens.push(token);
      if (token.kind === TokenKinds.EOF) return tokens;
    }
  }

  private isAtEnd(): boolean {
    return this.offset >= this.text.length;
  }

  private peekChar(ahead = 0): string {
    return this.text[this.offset + ahead] ?? '\0';
  }

  private advance(): string {
    const ch = this.text[this.offset] ?? '\0';
    if (this.isAtEnd()) return ch;
    this.offset++;
    if (ch === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return ch;
  }

  private match(expected: string): boolean {
    if (this.isAtEnd() || this.peekChar() !== expected) return false;
    this.advance();
    return true;
  }

  private skipTrivia(): void {
    while (!this.isAtEnd()) {
      const c = this.peekChar();
      if (c === ' ' || c === '\t' || c === '\r' || (c === '\n' && !this.emitNewlines)) {
        this.advance();
      } else if (c === '/' && this.peekChar(1) === '/') {
        while (!this.isAtEnd() && this.peekChar() !== '\n') this.advance();
      } else if (c === '/' && this.peekChar(1) === '*') {
        // Block comments do not nest; an unterminated one runs to end of input.
        this.advance();
        this.advance();
        while (!this.isAtEnd()) {
          if (this.peekChar() === '*' && this.peekChar(1) === '/') {
            this.advance();
            this.advance();
            break;
          }
          this.advance();
        }
      } else {
        return;
      }
    }
  }

  private make(kind: TokenKind, value?: bigint | number): Token {
    const token: Token = {
      kind,
      pos: this.start,
      end: { line: this.line, column: this.column, offset: this.offset },
      length: this.offset - this.start.offset,
      file: this.file,
    };
    if (value !== undefined) token.value = value;
    return token;
  }

  private error(id: LexicalDiagnosticId, message: string): Token {
    this.errored = true;
    this.lastMessage = message;
    this.diagnostics.push({
      id,
      severity: 'error',
      message,
      file: this.file,
      line: this.start.line,
      column: this.start.column,
    });
    return { ...this.make(TokenKinds.ERROR), message, errorId: id };
  }

  private unexpected(ch: string): Token {
    let shown = ch;
    const code = ch.charCodeAt(0);
    if (code >= 0xd800 && code <= 0xdbff) {
      const low = this.peekChar().charCodeAt(0);
      if (low >= 0xdc00 && low <= 0xdfff) shown += this.advance();
    }
    return this.error(DiagnosticIds.UnexpectedCharacter, `Unexpected character '${shown}'`);
  }

  private identifier(): Token {
    while (isAlpha(this.peekChar()) || isDigit(this.peekChar())) this.advance();
    const text = this.text.slice(this.start.offset, this.offset);
    return this.make(lookupKeyword(text));
  }

  private number(first: string): Token {
    if (first === '0') {
      const radix = radixOf(this.peekChar());
      if (radix !== undefined) {
        this.advance();
        const digitsStart = this.offset;
        while (isRadixDigit(this.peekChar(), radix)) this.advance();
        return this.integer(this.text.slice(digitsStart, this.offset), radix);
      }
    }

    while (isDigit(this.peekChar())) this.advance();

    let isFloat = false;
    if (this.peekChar() === '.' && isDigit(this.peekChar(1))) {
      isFloat = true;
      this.advance();
      while (isDigit(this.peekChar())) this.advance();
    }

    const e = this.peekChar();
    const sign = this.peekChar(1);
    if (
      (e === 'e' || e === 'E') &&
      (isDigit(sign) || ((sign === '+' || sign === '-') && isDigit(this.peekChar(2))))
    ) {
      isFloat = true;
      this.advance();
      if (sign === '+' || sign === '-') this.advance();
      while (isDigit(this.peekChar())) this.advance();
    }

    const text = this.text.slice(this.start.offset, this.offset);
    if (isFloat) return this.make(TokenKinds.FLOAT, Number(text));
    return this.integer(text, 10);
  }

  private integer(digits: string, radix: number): Token {
    // Saturates like strtoll; a bare `0x` reads as 0.
    let value = digits.length === 0 ? 0n : BigInt(`${RADIX_PREFIX[radix] ?? ''}${digits}`);
    if (value > INT64_MAX) value = INT64_MAX;
    return this.make(TokenKinds.INTEGER, value);
  }

  /** Consume one escape sequence; the backslash has already been consumed. */
  private escape(): void {
    const maxDigits = ESCAPE_HEX_DIGITS.get(this.advance()) ?? 0;
    for (let i = 0; i < maxDigits && isHexDigit(this.peekChar()); i++) this.advance();
  }

  private string(): Token {
    while (!this.isAtEnd() && this.peekChar() !== '"') {
      if (this.advance() === '\\') {
        if (this.isAtEnd()) break;
        this.escape();
      }
    }
    if (this.isAtEnd()) {
      return this.error(DiagnosticIds.UnterminatedString, 'Unterminated string');
    }
    this.advance();
    return this.make(TokenKinds.STRING);
  }

  private charLiteral(): Token {
    const c = this.peekChar();
    if (this.isAtEnd() || c === '\n') {
      return this.error(DiagnosticIds.UnterminatedCharLiteral, 'Unterminated character literal');
    }
    if (c === "'") {
      this.advance();
      return this.error(DiagnosticIds.UnterminatedCharLiteral, 'Empty character literal');
    }
    if (this.advance() === '\\') {
      if (this.isAtEnd()) {
        return this.error(DiagnosticIds.UnterminatedCharLiteral, 'Unterminated character literal');
      }
      this.escape();
    }
    if (!this.match("'")) {
      return this.error(DiagnosticIds.UnterminatedCharLiteral, 'Unterminated character literal');
    }
    return this.make(TokenKinds.CHAR);
  }
}
