import type {
  AssignmentNode,
  BinaryNode,
  BinaryOperator,
  ExprNode,
  ExpressionStatementNode,
  IdentifierNode,
  LiteralNode,
  LiteralValue,
  ProgramNode,
  ReturnNode,
  SourceSpan,
  StmtNode,
  UnaryNode,
  UnaryOperator,
  VarDeclarationNode,
} from './ast.js';
import { Arena, ArenaCapacityError, ArenaReleasedError } from './arena.js';
import type { ArenaOptions } from './arena.js';
import type { Tokenizer } from './lexer.js';
import { spanBetween, START_OF_INPUT } from './source.js';
import { isBasicTypeKind, TokenKinds } from './tokens.js';
import type { Token, TokenKind } from './tokens.js';
import type { Diagnostic, DiagnosticId } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';

/** Bytes charged against the arena for every AST node. */
export const NODE_SIZE = 64;

/** Deepest expression nesting accepted; parentheses, prefix operators and `=` chains all count. */
export const MAX_NESTING_DEPTH = 128;

export interface ParserOptions {
  /** Arena to allocate from, or options for a parser-owned one. */
  arena?: Arena | ArenaOptions;
}

/** Unwinds the statement being parsed after its error has been recorded. */
class ParseAbort extends Error {
  constructor() {
    super('parse aborted');
    this.name = 'ParseAbort';
  }
}

const OR_OPS: ReadonlyMap<TokenKind, BinaryOperator> = new Map<TokenKind, BinaryOperator>([
  [TokenKinds.OR, '||'],
]);
const AND_OPS: ReadonlyMap<TokenKind, BinaryOperator> = new Map<TokenKind, BinaryOperator>([
  [TokenKinds.AND, '&&'],
]);
const EQUALITY_OPS: ReadonlyMap<TokenKind, BinaryOperator> = new Map<TokenKind, BinaryOperator>([
  [TokenKinds.EQUAL, '=='],
  [TokenKinds.NOT_EQUAL, '!='],
]);
const RELATIONAL_OPS: ReadonlyMap<TokenKind, BinaryOperator> = new Map<TokenKind, BinaryOperator>([
  [TokenKinds.LESS, '<'],
  [TokenKinds.LESS_EQUAL, '<='],
  [TokenKinds.GREATER, '>'],
  [TokenKinds.GREATER_EQUAL, '>='],
]);
const ADDITIVE_OPS: ReadonlyMap<TokenKind, BinaryOperator> = new Map<TokenKind, BinaryOperator>([
  [TokenKinds.PLUS, '+'],
  [TokenKinds.MINUS, '-'],
]);
const MULTIPLICATIVE_OPS: ReadonlyMap<TokenKind, BinaryOperator> = new Map<
  TokenKind,
  BinaryOperator
>([
  [TokenKinds.MULTIPLY, '*'],
  [TokenKinds.DIVIDE, '/'],
  [TokenKinds.MODULO, '%'],
]);
const UNARY_OPS: ReadonlyMap<TokenKind, UnaryOperator> = new Map<TokenKind, UnaryOperator>([
  [TokenKinds.NOT, '!'],
  [TokenKinds.MINUS, '-'],
]);

/** Tokens that begin a new statement; recovery stops in front of them. */
const SYNC_KINDS: ReadonlySet<TokenKind> = new Set<TokenKind>([
  TokenKinds.INT,
  TokenKinds.FLOAT_KW,
  TokenKinds.STRING_KW,
  TokenKinds.BOOL_KW,
  TokenKinds.CHAR_KW,
  TokenKinds.FUNCTION,
  TokenKinds.VAR,
  TokenKinds.CONST,
  TokenKinds.CLASS,
  TokenKinds.STRUCT,
  TokenKinds.ENUM,
  TokenKinds.INTERFACE,
  TokenKinds.IF,
  TokenKinds.WHILE,
  TokenKinds.FOR,
  TokenKinds.DO,
  TokenKinds.SWITCH,
  TokenKinds.RETURN,
]);

/**
 * Recursive-descent parser with one token of lookahead.
 *
 * Grammar, lowest precedence first:
 *
 * ```
 * program     := declaration* EOF
 * declaration := basicType IDENT ('=' expression)? ';' | statement
 * statement   := 'return' expression? ';' | expression ';'
 * expression  := IDENT '=' expression | or
 * or          := and ('||' and)*
 * and         := equality ('&&' equality)*
 * equality    := relational (('==' | '!=') relational)*
 * relational  := additive (('<' | '<=' | '>' | '>=') additive)*
 * additive    := term (('+' | '-') term)*
 * term        := unary (('*' | '/' | '%') unary)*
 * unary       := ('!' | '-') unary | primary
 * primary     := literal | IDENT | '(' expression ')'
 * ```
 *
 * Errors never throw out of {@link parse}. The first error in a statement is recorded and the rest
 * of it is skipped; any statement that recorded an error is left out of the program, and parsing
 * resumes at the next statement boundary. Expressions nested deeper than {@link MAX_NESTING_DEPTH}
 * are reported as errors rather than recursed into.
 */
export class Parser {
  readonly diagnostics: Diagnostic[] = [];
  readonly arena: Arena;

  private readonly tokenizer: Tokenizer;
  private current: Token;
  private previous: Token;
  private panicMode = false;
  private errored = false;
  private lastMessage: string | undefined;
  private nodes = 0;
  private depth = 0;

  constructor(tokenizer: Tokenizer, options: ParserOptions = {}) {
    this.tokenizer = tokenizer;
    this.arena = options.arena instanceof Arena ? options.arena : new Arena(options.arena);
    this.current = this.pull();
    this.previous = this.current;
  }

  /** Sticky: set by the first recorded error. */
  get hasError(): boolean {
    return this.errored;
  }

  get lastError(): string | undefined {
    return this.lastMessage;
  }

  /** Nodes allocated so far, the program root included. */
  get nodeCount(): number {
    return this.nodes;
  }

  /** Release the arena. Nodes returned by {@link parse} must not be used afterwards. */
  release(): void {
    this.arena.release();
  }

  parse(): ProgramNode {
    const file = this.tokenizer.file;
    const program: ProgramNode = {
      kind: 'Program',
      span: spanBetween(file, START_OF_INPUT, START_OF_INPUT),
      statements: [],
    };
    try {
      this.node(program);
      while (!this.check(TokenKinds.EOF)) {
        const stmt = this.declaration();
        if (stmt) program.statements.push(stmt);
      }
    } catch (err) {
      if (err instanceof ArenaCapacityError) {
        this.fatal(DiagnosticIds.ArenaCapacityExceeded, err.message);
      } else if (err instanceof ArenaReleasedError) {
        this.fatal(DiagnosticIds.ArenaReleased, err.message);
      } else {
        throw err;
      }
    }
    program.span.end = { ...this.current.end };
    return program;
  }

  private declaration(): StmtNode | undefined {
    const start = this.current;
    try {
      const stmt = isBasicTypeKind(this.current.kind) ? this.varDeclaration() : this.statement();
      if (!this.panicMode) return stmt;
    } catch (err) {
      if (!(err instanceof ParseAbort)) throw err;
    }
    this.synchronize(start);
    return undefined;
  }

  private varDeclaration(): VarDeclarationNode {
    const start = this.current;
    this.advance();
    const varType = start.kind;
    if (!isBasicTypeKind(varType)) throw this.fail(DiagnosticIds.UnexpectedToken, 'Expected type');

    const nameToken = this.consume(
      TokenKinds.IDENTIFIER,
      DiagnosticIds.MissingDelimiter,
      'Expected variable name',
    );
    const name = this.arena.intern(this.tokenizer.lexeme(nameToken));
    const initializer = this.match(TokenKinds.ASSIGN) ? this.expression() : undefined;
    this.consume(
      TokenKinds.SEMICOLON,
      DiagnosticIds.MissingDelimiter,
      "Expected ';' after variable declaration",
    );

    return this.node<VarDeclarationNode>({
      kind: 'VarDeclaration',
      span: this.spanFrom(start),
      varType,
      name,
      ...(initializer ? { initializer } : {}),
    });
  }

  private statement(): StmtNode {
    if (this.check(TokenKinds.RETURN)) return this.returnStatement();
    return this.expressionStatement();
  }

  private returnStatement(): ReturnNode {
    const start = this.current;
    this.advance();
    const value = this.check(TokenKinds.SEMICOLON) ? undefined : this.expression();
    this.consume(TokenKinds.SEMICOLON, DiagnosticIds.MissingDelimiter, "Expected ';' after return");
    return this.node<ReturnNode>({
      kind: 'Return',
      span: this.spanFrom(start),
      ...(value ? { value } : {}),
    });
  }

  private expressionStatement(): ExpressionStatementNode {
    const start = this.current;
    const expression = this.expression();
    this.consume(
      TokenKinds.SEMICOLON,
      DiagnosticIds.MissingDelimiter,
      "Expected ';' after expression",
    );
    return this.node<ExpressionStatementNode>({
      kind: 'ExpressionStatement',
      span: this.spanFrom(start),
      expression,
    });
  }

  private expression(): ExprNode {
    return this.nested(() => this.assignment());
  }

  /** Right-associative; the target must be a bare identifier. */
  private assignment(): ExprNode {
    const start = this.current;
    const target = this.logicalOr();
    if (!this.match(TokenKinds.ASSIGN)) return target;

    const value = this.nested(() => this.assignment());
    if (target.kind !== 'Identifier') {
      this.errorAt(start, DiagnosticIds.InvalidAssignmentTarget, 'Invalid assignment target');
      return target;
    }
    return this.node<AssignmentNode>({
      kind: 'Assignment',
      span: this.spanFrom(start),
      target,
      value,
    });
  }

  private logicalOr(): ExprNode {
    return this.binary(() => this.logicalAnd(), OR_OPS);
  }

  private logicalAnd(): ExprNode {
    return this.binary(() => this.equality(), AND_OPS);
  }

  private equality(): ExprNode {
    return this.binary(() => this.relational(), EQUALITY_OPS);
  }

  private relational(): ExprNode {
    return this.binary(() => this.additive(), RELATIONAL_OPS);
  }

  private additive(): ExprNode {
    return this.binary(() => this.term(), ADDITIVE_OPS);
  }

  private term(): ExprNode {
    return this.binary(() => this.unary(), MULTIPLICATIVE_OPS);
  }

  /** Left-associative chain of one precedence tier. */
  private binary(
    operand: () => ExprNode,
    operators: ReadonlyMap<TokenKind, BinaryOperator>,
  ): ExprNode {
    const start = this.current;
    let left = operand();
    for (;;) {
      const operator = operators.get(this.current.kind);
      if (operator === undefined) return left;
      this.advance();
      const right = operand();
      left = this.node<BinaryNode>({
        kind: 'Binary',
        span: this.spanFrom(start),
        operator,
        left,
        right,
      });
    }
  }

  private unary(): ExprNode {
    const operator = UNARY_OPS.get(this.current.kind);
    if (operator === undefined) return this.primary();
    const start = this.current;
    this.advance();
    const operand = this.nested(() => this.unary());
    return this.node<UnaryNode>({ kind: 'Unary', span: this.spanFrom(start), operator, operand });
  }

  private primary(): ExprNode {
    const token = this.current;
    switch (token.kind) {
      case TokenKinds.TRUE:
        return this.literal({ type: 'bool', value: true });
      case TokenKinds.FALSE:
        return this.literal({ type: 'bool', value: false });
      case TokenKinds.NULL:
        return this.literal({ type: 'null' });
      case TokenKinds.INTEGER:
        return this.literal({
          type: 'int',
          value: typeof token.value === 'bigint' ? token.value : 0n,
        });
      case TokenKinds.FLOAT:
        return this.literal({
          type: 'float',
          value: typeof token.value === 'number' ? token.value : 0,
        });
      case TokenKinds.STRING:
        return this.literal({ type: 'string', raw: this.quoted(token) });
      case TokenKinds.CHAR:
        return this.literal({ type: 'char', raw: this.quoted(token) });
      case TokenKinds.IDENTIFIER: {
        this.advance();
        const name = this.arena.intern(this.tokenizer.lexeme(token));
        return this.node<IdentifierNode>({ kind: 'Identifier', span: this.spanFrom(token), name });
      }
      case TokenKinds.LPAREN: {
        this.advance();
        const inner = this.expression();
        this.consume(
          TokenKinds.RPAREN,
          DiagnosticIds.MissingDelimiter,
          "Expected ')' after expression",
        );
        return inner;
      }
      default:
        throw this.fail(DiagnosticIds.UnexpectedToken, 'Expected expression');
    }
  }

  private nested<T>(parse: () => T): T {
    if (this.depth >= MAX_NESTING_DEPTH) {
      throw this.fail(DiagnosticIds.NestingTooDeep, 'Expression nested too deeply');
    }
    this.depth++;
    try {
      return parse();
    } finally {
      this.depth--;
    }
  }

  /** Consume the current token as a literal of the given value. */
  private literal(value: LiteralValue): LiteralNode {
    const token = this.current;
    this.advance();
    return this.node<LiteralNode>({ kind: 'Literal', span: this.spanFrom(token), value });
  }

  /** Interned text between the quotes of a string or char token. */
  private quoted(token: Token): string {
    return this.arena.intern(this.tokenizer.lexeme(token).slice(1, -1));
  }

  private node<T extends { kind: string }>(node: T): T {
    this.arena.allocate(NODE_SIZE);
    this.nodes++;
    return node;
  }

  private spanFrom(start: Token): SourceSpan {
    return spanBetween(start.file, start.pos, this.previous.end);
  }

  private pull(): Token {
    let token = this.tokenizer.next();
    while (token.kind === TokenKinds.NEWLINE) token = this.tokenizer.next();
    return token;
  }

  private advance(): void {
    this.previous = this.current;
    if (this.current.kind !== TokenKinds.EOF) this.current = this.pull();
  }

  private check(kind: TokenKind): boolean {
    return this.current.kind === kind;
  }

  private match(kind: TokenKind): boolean {
    if (!this.check(kind)) return false;
    this.advance();
    return true;
  }

  private consume(kind: TokenKind, id: DiagnosticId, message: string): Token {
    if (!this.check(kind)) throw this.fail(id, message);
    this.advance();
    return this.previous;
  }

  /**
   * Record an error at the current token and return the abort signal for the caller to throw.
   * An `ERROR` token reports its own lexical message instead.
   */
  private fail(id: DiagnosticId, message: string): ParseAbort {
    const token = this.current;
    if (token.kind === TokenKinds.ERROR) {
      this.errorAt(token, token.errorId ?? DiagnosticIds.Unknown, token.message ?? 'Invalid token');
    } else {
      this.errorAt(token, id, message);
    }
    return new ParseAbort();
  }

  private errorAt(token: Token, id: DiagnosticId, message: string): void {
    if (this.panicMode) return;
    this.panicMode = true;
    this.report(token.file, token.pos.line, token.pos.column, id, message);
  }

  /** Unrecoverable; recorded even while recovering from an earlier error. */
  private fatal(id: DiagnosticId, message: string): void {
    const { file, pos } = this.current;
    this.report(file, pos.line, pos.column, id, message);
  }

  private report(
    file: string,
    line: number,
    column: number,
    id: DiagnosticId,
    message: string,
  ): void {
    const text = `Error at line ${line}, column ${column}: ${message}`;
    this.errored = true;
    this.lastMessage = text;
    this.diagnostics.push({ id, severity: 'error', message: text, file, line, column });
  }

  /** Skip to the next statement boundary and leave panic mode. */
  private synchronize(start: Token): void {
    this.panicMode = false;
    if (this.current === start) this.advance();
    while (!this.check(TokenKinds.EOF)) {
      if (this.previous.kind === TokenKinds.SEMICOLON) return;
      if (SYNC_KINDS.has(this.current.kind)) return;
      this.advance();
    }
  }
}
