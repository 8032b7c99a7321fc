import { describe, expect, it } from 'vitest';

import { Arena } from '../src/frontend/arena.js';
import type { ExprNode, ProgramNode, StmtNode } from '../src/frontend/ast.js';
import { Tokenizer } from '../src/frontend/lexer.js';
import { MAX_NESTING_DEPTH, Parser } from '../src/frontend/parser.js';
import type { ParserOptions } from '../src/frontend/parser.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';

function parse(
  text: string,
  options: ParserOptions = {},
): { program: ProgramNode; parser: Parser } {
  const parser = new Parser(new Tokenizer(text, 'test.keel'), options);
  return { program: parser.parse(), parser };
}

/** Prefix rendering of an expression, for precedence checks. */
function show(node: ExprNode): string {
  switch (node.kind) {
    case 'Literal': {
      const v = node.value;
      if (v.type === 'int') return v.value.toString();
      if (v.type === 'float') return String(v.value);
      if (v.type === 'string') return `"${v.raw}"`;
      if (v.type === 'char') return `'${v.raw}'`;
      if (v.type === 'bool') return String(v.value);
      return 'null';
    }
    case 'Identifier':
      return node.name;
    case 'Binary':
      return `(${node.operator} ${show(node.left)} ${show(node.right)})`;
    case 'Unary':
      return `(${node.operator} ${show(node.operand)})`;
    case 'Assignment':
      return `(= ${node.target.name} ${show(node.value)})`;
    case 'Call':
      return `${node.callee}(${node.args.map(show).join(' ')})`;
  }
}

function exprOf(stmt: StmtNode | undefined): string {
  if (!stmt) return '<missing>';
  if (stmt.kind === 'ExpressionStatement') return show(stmt.expression);
  if (stmt.kind === 'VarDeclaration') return stmt.initializer ? show(stmt.initializer) : '<none>';
  if (stmt.kind === 'Return') return stmt.value ? show(stmt.value) : '<none>';
  return `<${stmt.kind}>`;
}

describe('parser declarations and statements', () => {
  it('parses the sample program', () => {
    const { program, parser } = parse(
      'int x = 42;\nint y = x + 10;\nint result = x * y;\nreturn result;\n',
    );
    expect(parser.hasError).toBe(false);
    expect(program.statements.map((s) => s.kind)).toEqual([
      'VarDeclaration',
      'VarDeclaration',
      'VarDeclaration',
      'Return',
    ]);
    expect(program.statements.map(exprOf)).toEqual(['42', '(+ x 10)', '(* x y)', 'result']);

    const first = program.statements[0];
    expect(first?.kind).toBe('VarDeclaration');
    if (!first || first.kind !== 'VarDeclaration') return;
    expect(first.varType).toBe('INT');
    expect(first.name).toBe('x');
    expect(first.span.start).toEqual({ line: 1, column: 1, offset: 0 });
    expect(first.span.end).toEqual({ line: 1, column: 12, offset: 11 });
  });

  it('takes span ends from the tokens, across lines', () => {
    const { program } = parse('string s = "a\nb";\n');
    expect(program.statements[0]?.span.end).toEqual({ line: 2, column: 4, offset: 17 });
    expect(program.span.start).toEqual({ line: 1, column: 1, offset: 0 });
    expect(program.span.end).toEqual({ line: 3, column: 1, offset: 18 });
  });

  it('accepts every basic type and declarations without initializer', () => {
    const { program, parser } = parse('float f; string s; bool b; char c; int i;');
    expect(parser.hasError).toBe(false);
    expect(
      program.statements.map((s) => (s.kind === 'VarDeclaration' ? s.varType : s.kind)),
    ).toEqual(['FLOAT_KW', 'STRING_KW', 'BOOL_KW', 'CHAR_KW', 'INT']);
    expect(program.statements.map(exprOf)).toEqual(['<none>', '<none>', '<none>', '<none>', '<none>']);
  });

  it('parses bare and valued returns', () => {
    const { program } = parse('return; return 1;');
    expect(program.statements.map(exprOf)).toEqual(['<none>', '1']);
  });

  it('parses every literal form', () => {
    const { program, parser } = parse(`true; false; null; 'c'; "s\\n"; 1.5;`);
    expect(parser.hasError).toBe(false);
    expect(program.statements.map(exprOf)).toEqual([
      'true',
      'false',
      'null',
      "'c'",
      '"s\\n"',
      '1.5',
    ]);
  });
});

describe('parser expression precedence', () => {
  it('binds multiplication tighter than addition', () => {
    const { program } = parse('a = 1 + 2 * 3;');
    expect(exprOf(program.statements[0])).toBe('(= a (+ 1 (* 2 3)))');
  });

  it('associates binary operators to the left', () => {
    const { program } = parse('1 - 2 - 3; 8 / 4 % 3;');
    expect(program.statements.map(exprOf)).toEqual(['(- (- 1 2) 3)', '(% (/ 8 4) 3)']);
  });

  it('associates assignment to the right', () => {
    const { program } = parse('a = b = 3;');
    expect(exprOf(program.statements[0])).toBe('(= a (= b 3))');
  });

  it('orders the full tier chain', () => {
    const { program } = parse('a || b && c == d < e + f * -g;');
    expect(exprOf(program.statements[0])).toBe(
      '(|| a (&& b (== c (< d (+ e (* f (- g)))))))',
    );
  });

  it('lets parentheses override precedence', () => {
    const { program } = parse('(1 + 2) * 3; !!ok;');
    expect(program.statements.map(exprOf)).toEqual(['(* (+ 1 2) 3)', '(! (! ok))']);
  });
});

describe('parser error recovery', () => {
  it('drops one malformed statement and keeps the rest', () => {
    const { program, parser } = parse('int = 5; int a = 1; int b = 2; return a;');
    expect(program.statements).toHaveLength(3);
    expect(parser.diagnostics).toEqual([
      {
        id: DiagnosticIds.MissingDelimiter,
        severity: 'error',
        message: 'Error at line 1, column 5: Expected variable name',
        file: 'test.keel',
        line: 1,
        column: 5,
      },
    ]);
    expect(parser.hasError).toBe(true);
    expect(parser.lastError).toBe('Error at line 1, column 5: Expected variable name');
  });

  it('reports an invalid assignment target without losing later statements', () => {
    const { program, parser } = parse('42 = x; int y = 1;');
    expect(parser.diagnostics.map((d) => [d.id, d.message])).toEqual([
      [DiagnosticIds.InvalidAssignmentTarget, 'Error at line 1, column 1: Invalid assignment target'],
    ]);
    expect(program.statements.map((s) => s.kind)).toEqual(['VarDeclaration']);
  });

  it('records only the first error of a statement', () => {
    const { program, parser } = parse('42 = x');
    expect(parser.diagnostics.map((d) => d.id)).toEqual([DiagnosticIds.InvalidAssignmentTarget]);
    expect(program.statements).toEqual([]);
  });

  it('resynchronizes in front of a declaration keyword', () => {
    const { program, parser } = parse('x = 1 int y = 2;');
    expect(parser.diagnostics.map((d) => d.message)).toEqual([
      "Error at line 1, column 7: Expected ';' after expression",
    ]);
    expect(program.statements.map(exprOf)).toEqual(['2']);
  });

  it('reports a missing expression and a missing closing parenthesis', () => {
    const missingExpr = parse('int a = ;');
    expect(missingExpr.parser.diagnostics.map((d) => [d.id, d.message])).toEqual([
      [DiagnosticIds.UnexpectedToken, 'Error at line 1, column 9: Expected expression'],
    ]);

    const missingParen = parse('int a = (1 + 2;');
    expect(missingParen.parser.diagnostics.map((d) => [d.id, d.message])).toEqual([
      [DiagnosticIds.MissingDelimiter, "Error at line 1, column 15: Expected ')' after expression"],
    ]);
  });

  it('reports a lexical error token with its own message and id', () => {
    const { program, parser } = parse('int x = @;');
    expect(parser.diagnostics.map((d) => [d.id, d.message])).toEqual([
      [DiagnosticIds.UnexpectedCharacter, "Error at line 1, column 9: Unexpected character '@'"],
    ]);
    expect(program.statements).toEqual([]);
  });

  it('treats a stray error token between statements as its own bad statement', () => {
    const { program, parser } = parse('int a = 1; @ int b = 2;');
    expect(parser.diagnostics).toHaveLength(1);
    expect(program.statements.map(exprOf)).toEqual(['1', '2']);
  });

  it('rejects parentheses nested past the depth limit instead of overflowing the stack', () => {
    const deep = `${'('.repeat(20000)}1${')'.repeat(20000)};\nint ok = 1;`;
    const { program, parser } = parse(deep);
    expect(MAX_NESTING_DEPTH).toBe(128);
    expect(parser.diagnostics).toEqual([
      {
        id: DiagnosticIds.NestingTooDeep,
        severity: 'error',
        message: 'Error at line 1, column 129: Expression nested too deeply',
        file: 'test.keel',
        line: 1,
        column: 129,
      },
    ]);
    expect(program.statements.map((s) => s.kind)).toEqual(['VarDeclaration']);
  });

  it('counts prefix operators toward the nesting limit', () => {
    const { parser } = parse(`return ${'-'.repeat(300)}x;`);
    expect(parser.diagnostics.map((d) => [d.id, d.column])).toEqual([
      [DiagnosticIds.NestingTooDeep, 136],
    ]);
  });

  it('accepts nesting up to the limit', () => {
    const { program, parser } = parse(`${'('.repeat(127)}1${')'.repeat(127)};`);
    expect(parser.diagnostics).toEqual([]);
    expect(program.statements).toHaveLength(1);
  });

  it('ignores newline tokens', () => {
    const tokenizer = new Tokenizer('int x =\n 1;\nreturn x;\n', 'nl.keel', { emitNewlines: true });
    const parser = new Parser(tokenizer);
    const program = parser.parse();
    expect(parser.hasError).toBe(false);
    expect(program.statements.map(exprOf)).toEqual(['1', 'x']);
  });
});

describe('parser arena use', () => {
  it('charges every node and interned name to the arena', () => {
    const { parser } = parse('int x = 1;');
    // program + literal + declaration, 64 bytes each, plus "x\0" and alignment padding
    expect(parser.nodeCount).toBe(3);
    expect(parser.arena.used).toBe(200);
  });

  it('stops with a resource error and keeps completed statements', () => {
    const { program, parser } = parse('int a = 1; int b = 2;', {
      arena: { blockSize: 256, growable: false },
    });
    expect(program.statements).toHaveLength(1);
    expect(parser.diagnostics).toEqual([
      {
        id: DiagnosticIds.ArenaCapacityExceeded,
        severity: 'error',
        message:
          'Error at line 1, column 21: Arena capacity exceeded: requested 64 bytes with 202/256 in use',
        file: 'test.keel',
        line: 1,
        column: 21,
      },
    ]);
  });

  it('allocates from a caller-provided arena', () => {
    const arena = new Arena({ blockSize: 1024 });
    const { parser } = parse('x;', { arena });
    expect(parser.arena).toBe(arena);
    expect(arena.used).toBeGreaterThan(0);
  });

  it('reports use of a released arena', () => {
    const arena = new Arena();
    arena.release();
    const { program, parser } = parse('int a = 1;', { arena });
    expect(program.statements).toEqual([]);
    expect(parser.diagnostics.map((d) => d.id)).toEqual([DiagnosticIds.ArenaReleased]);
  });

  it('releases its arena on request', () => {
    const { parser } = parse('int a = 1;');
    parser.release();
    expect(parser.arena.released).toBe(true);
  });
});
