import type { AstNode, ExprNode, LiteralValue, StmtNode } from './ast.js';
import type { Token } from './tokens.js';

/**
 * One-line token dump: `Token{type=INTEGER, lexeme='42', line=1, col=9}`.
 */
export function formatToken(token: Token, lexeme: string): string {
  const shown = token.kind === 'EOF' ? '' : lexeme;
  return `Token{type=${token.kind}, lexeme='${shown}', line=${token.pos.line}, col=${token.pos.column}}`;
}

function formatLiteral(value: LiteralValue): string {
  switch (value.type) {
    case 'int':
      return `int ${value.value.toString()}`;
    case 'float':
      return `float ${String(value.value)}`;
    case 'string':
      return `string "${value.raw}"`;
    case 'char':
      return `char '${value.raw}'`;
    case 'bool':
      return `bool ${String(value.value)}`;
    case 'null':
      return 'null';
  }
}

function children(node: AstNode): { label?: string; node: AstNode }[] {
  const out: { label?: string; node: AstNode }[] = [];
  const add = (child: AstNode | undefined, label?: string): void => {
    if (child) out.push({ ...(label ? { label } : {}), node: child });
  };
  switch (node.kind) {
    case 'Literal':
    case 'Identifier':
      break;
    case 'Binary':
      add(node.left);
      add(node.right);
      break;
    case 'Unary':
      add(node.operand);
      break;
    case 'Assignment':
      add(node.target);
      add(node.value);
      break;
    case 'Call':
      node.args.forEach((a: ExprNode) => add(a));
      break;
    case 'ExpressionStatement':
      add(node.expression);
      break;
    case 'VarDeclaration':
      add(node.initializer);
      break;
    case 'FunctionDeclaration':
      add(node.body);
      break;
    case 'ClassDeclaration':
      node.fields.forEach((f) => add(f));
      node.methods.forEach((m) => add(m));
      break;
    case 'If':
      add(node.condition, 'condition');
      add(node.then, 'then');
      add(node.else, 'else');
      break;
    case 'While':
      add(node.condition, 'condition');
      add(node.body, 'body');
      break;
    case 'For':
      add(node.init, 'init');
      add(node.condition, 'condition');
      add(node.update, 'update');
      add(node.body, 'body');
      break;
    case 'Return':
      add(node.value);
      break;
    case 'Block':
    case 'Program':
      node.statements.forEach((s: StmtNode) => add(s));
      break;
  }
  return out;
}

function headline(node: AstNode): string {
  switch (node.kind) {
    case 'Literal':
      return `Literal ${formatLiteral(node.value)}`;
    case 'Identifier':
      return `Identifier ${node.name}`;
    case 'Binary':
      return `Binary ${node.operator}`;
    case 'Unary':
      return `Unary ${node.operator}`;
    case 'Assignment':
      return 'Assignment';
    case 'Call':
      return `Call ${node.callee}`;
    case 'ExpressionStatement':
      return 'ExpressionStatement';
    case 'VarDeclaration':
      return `VarDeclaration ${node.varType} ${node.name}`;
    case 'FunctionDeclaration': {
      const params = node.params.map((p) => `${p.paramType} ${p.name}`).join(', ');
      return `FunctionDeclaration ${node.name}(${params})`;
    }
    case 'ClassDeclaration':
      return `ClassDeclaration ${node.name}`;
    case 'If':
      return 'If';
    case 'While':
      return 'While';
    case 'For':
      return 'For';
    case 'Return':
      return 'Return';
    case 'Block':
      return 'Block';
    case 'Program':
      return `Program (${node.statements.length} statements)`;
  }
}

/**
 * Indented tree dump, two spaces per level, one node per line.
 */
export function formatAst(root: AstNode): string {
  const lines: string[] = [];
  const walk = (node: AstNode, depth: number, label?: string): void => {
    const prefix = label ? `${label}: ` : '';
    lines.push(`${'  '.repeat(depth)}${prefix}${headline(node)}`);
    for (const child of children(node)) walk(child.node, depth + 1, child.label);
  };
  walk(root, 0);
  return lines.join('\n');
}
