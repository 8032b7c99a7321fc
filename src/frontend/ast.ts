/**
 * Frontend AST contracts for Keel.
 *
 * This module defines types only. The parser currently produces a subset of these nodes (variable
 * declarations, expression statements, returns and the expressions under them); the remaining
 * kinds are part of the closed set so every consumer handles them explicitly.
 */
import type { SourceSpan } from './source.js';
import type { BasicTypeKind } from './tokens.js';

export type { SourcePosition, SourceSpan } from './source.js';

/**
 * Base shape for all AST nodes.
 */
export interface BaseNode {
  kind: string;
  span: SourceSpan;
}

export type BinaryOperator =
  | '||'
  | '&&'
  | '=='
  | '!='
  | '<'
  | '<='
  | '>'
  | '>='
  | '+'
  | '-'
  | '*'
  | '/'
  | '%';

export type UnaryOperator = '!' | '-';

/**
 * Literal payloads. String and char literals keep their raw text between the quotes, escape
 * sequences untouched.
 */
export type LiteralValue =
  | { type: 'int'; value: bigint }
  | { type: 'float'; value: number }
  | { type: 'string'; raw: string }
  | { type: 'char'; raw: string }
  | { type: 'bool'; value: boolean }
  | { type: 'null' };

export interface LiteralNode extends BaseNode {
  kind: 'Literal';
  value: LiteralValue;
}

export interface IdentifierNode extends BaseNode {
  kind: 'Identifier';
  name: string;
}

export interface BinaryNode extends BaseNode {
  kind: 'Binary';
  operator: BinaryOperator;
  left: ExprNode;
  right: ExprNode;
}

export interface UnaryNode extends BaseNode {
  kind: 'Unary';
  operator: UnaryOperator;
  operand: ExprNode;
}

/**
 * `name = value`. The target is restricted to a bare identifier.
 */
export interface AssignmentNode extends BaseNode {
  kind: 'Assignment';
  target: IdentifierNode;
  value: ExprNode;
}

export interface CallNode extends BaseNode {
  kind: 'Call';
  callee: string;
  args: ExprNode[];
}

export type ExprNode =
  | LiteralNode
  | IdentifierNode
  | BinaryNode
  | UnaryNode
  | AssignmentNode
  | CallNode;

export interface ExpressionStatementNode extends BaseNode {
  kind: 'ExpressionStatement';
  expression: ExprNode;
}

/**
 * `type name [= initializer];`
 */
export interface VarDeclarationNode extends BaseNode {
  kind: 'VarDeclaration';
  varType: BasicTypeKind;
  name: string;
  initializer?: ExprNode;
}

export interface ParamNode {
  name: string;
  paramType: BasicTypeKind;
}

export interface FunctionDeclarationNode extends BaseNode {
  kind: 'FunctionDeclaration';
  name: string;
  params: ParamNode[];
  body: BlockNode;
}

export interface ClassDeclarationNode extends BaseNode {
  kind: 'ClassDeclaration';
  name: string;
  fields: VarDeclarationNode[];
  methods: FunctionDeclarationNode[];
}

export interface IfNode extends BaseNode {
  kind: 'If';
  condition: ExprNode;
  then: StmtNode;
  else?: StmtNode;
}

export interface WhileNode extends BaseNode {
  kind: 'While';
  condition: ExprNode;
  body: StmtNode;
}

export interface ForNode extends BaseNode {
  kind: 'For';
  init?: StmtNode;
  condition?: ExprNode;
  update?: ExprNode;
  body: StmtNode;
}

export interface ReturnNode extends BaseNode {
  kind: 'Return';
  value?: ExprNode;
}

export interface BlockNode extends BaseNode {
  kind: 'Block';
  statements: StmtNode[];
}

export type StmtNode =
  | ExpressionStatementNode
  | VarDeclarationNode
  | FunctionDeclarationNode
  | ClassDeclarationNode
  | IfNode
  | WhileNode
  | ForNode
  | ReturnNode
  | BlockNode;

/**
 * Root of a compilation unit.
 */
export interface ProgramNode extends BaseNode {
  kind: 'Program';
  statements: StmtNode[];
}

export type AstNode = ExprNode | StmtNode | ProgramNode;

export type AstNodeKind = AstNode['kind'];
