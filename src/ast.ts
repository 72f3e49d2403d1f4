// =============================================================================
// Tern AST (pure data; parser output and serialization input)
// =============================================================================

export interface Position {
  line: number;
  column: number;
}

export interface Span {
  start: Position;
  end: Position;
}

export interface AstNode {
  type: string;
  span?: Span;
}

// -----------------------------------------------------------------------------
// Identifiers and literals
// -----------------------------------------------------------------------------

export interface Identifier extends AstNode {
  type: 'Identifier';
  name: string;
}
export function identifier(name: string): Identifier {
  return { type: 'Identifier', name };
}

export interface StringLiteral extends AstNode { type: 'StringLiteral'; value: string; }
export interface NumberLiteral extends AstNode { type: 'NumberLiteral'; value: number; }
export interface BooleanLiteral extends AstNode { type: 'BooleanLiteral'; value: boolean; }
export interface NullLiteral extends AstNode { type: 'NullLiteral'; value: null; }
export interface ArrayLiteral extends AstNode { type: 'ArrayLiteral'; elements: Expression[]; }

export type Literal = StringLiteral | NumberLiteral | BooleanLiteral | NullLiteral | ArrayLiteral;

export function stringLiteral(value: string): StringLiteral { return { type: 'StringLiteral', value }; }
export function numberLiteral(value: number): NumberLiteral { return { type: 'NumberLiteral', value }; }
export function booleanLiteral(value: boolean): BooleanLiteral { return { type: 'BooleanLiteral', value }; }
export function nullLiteral(): NullLiteral { return { type: 'NullLiteral', value: null }; }
export function arrayLiteral(elements: Expression[]): ArrayLiteral { return { type: 'ArrayLiteral', elements }; }

// -----------------------------------------------------------------------------
// Expressions
// -----------------------------------------------------------------------------

export type UnaryOperator = '-' | '!';
export type BinaryOperator = '+' | '-' | '*' | '/' | '%' | '==' | '!=' | '<' | '<=' | '>' | '>=';
export type LogicalOperator = '&&' | '||';

export interface ThisExpression extends AstNode { type: 'ThisExpression'; }
export interface SuperExpression extends AstNode { type: 'SuperExpression'; method: Identifier; }
export interface UnaryExpression extends AstNode { type: 'UnaryExpression'; operator: UnaryOperator; operand: Expression; }
export interface BinaryExpression extends AstNode {
  type: 'BinaryExpression';
  operator: BinaryOperator;
  left: Expression;
  right: Expression;
}
export interface LogicalExpression extends AstNode {
  type: 'LogicalExpression';
  operator: LogicalOperator;
  left: Expression;
  right: Expression;
}
export interface FunctionCall extends AstNode { type: 'FunctionCall'; callee: Expression; arguments: Expression[]; }
export interface MemberAccessExpression extends AstNode { type: 'MemberAccessExpression'; object: Expression; member: Identifier; }
export interface MemberAssignmentExpression extends AstNode {
  type: 'MemberAssignmentExpression';
  object: Expression;
  member: Identifier;
  value: Expression;
}
export interface IndexExpression extends AstNode { type: 'IndexExpression'; object: Expression; index: Expression; }
export interface IndexAssignmentExpression extends AstNode {
  type: 'IndexAssignmentExpression';
  object: Expression;
  index: Expression;
  value: Expression;
}
export interface AssignmentExpression extends AstNode { type: 'AssignmentExpression'; target: Identifier; value: Expression; }

export type Expression =
  | Literal
  | Identifier
  | ThisExpression
  | SuperExpression
  | UnaryExpression
  | BinaryExpression
  | LogicalExpression
  | FunctionCall
  | MemberAccessExpression
  | MemberAssignmentExpression
  | IndexExpression
  | IndexAssignmentExpression
  | AssignmentExpression;

export function thisExpression(): ThisExpression { return { type: 'ThisExpression' }; }
export function superExpression(method: Identifier | string): SuperExpression {
  return { type: 'SuperExpression', method: typeof method === 'string' ? identifier(method) : method };
}
export function unaryExpression(operator: UnaryOperator, operand: Expression): UnaryExpression {
  return { type: 'UnaryExpression', operator, operand };
}
export function binaryExpression(operator: BinaryOperator, left: Expression, right: Expression): BinaryExpression {
  return { type: 'BinaryExpression', operator, left, right };
}
export function logicalExpression(operator: LogicalOperator, left: Expression, right: Expression): LogicalExpression {
  return { type: 'LogicalExpression', operator, left, right };
}
export function functionCall(callee: Expression, args: Expression[]): FunctionCall {
  return { type: 'FunctionCall', callee, arguments: args };
}
export function memberAccessExpression(object: Expression, member: Identifier | string): MemberAccessExpression {
  return { type: 'MemberAccessExpression', object, member: typeof member === 'string' ? identifier(member) : member };
}
export function memberAssignmentExpression(object: Expression, member: Identifier | string, value: Expression): MemberAssignmentExpression {
  return { type: 'MemberAssignmentExpression', object, member: typeof member === 'string' ? identifier(member) : member, value };
}
export function indexExpression(object: Expression, index: Expression): IndexExpression {
  return { type: 'IndexExpression', object, index };
}
export function indexAssignmentExpression(object: Expression, index: Expression, value: Expression): IndexAssignmentExpression {
  return { type: 'IndexAssignmentExpression', object, index, value };
}
export function assignmentExpression(target: Identifier | string, value: Expression): AssignmentExpression {
  return { type: 'AssignmentExpression', target: typeof target === 'string' ? identifier(target) : target, value };
}

// -----------------------------------------------------------------------------
// Statements
// -----------------------------------------------------------------------------

export interface VarDeclaration extends AstNode { type: 'VarDeclaration'; id: Identifier; initializer: Expression | null; }
export interface ConstDeclaration extends AstNode { type: 'ConstDeclaration'; id: Identifier; initializer: Expression; }
export interface FunctionDefinition extends AstNode {
  type: 'FunctionDefinition';
  id: Identifier;
  params: Identifier[];
  body: BlockStatement;
}
export interface ClassDefinition extends AstNode {
  type: 'ClassDefinition';
  id: Identifier;
  superclass: Identifier | null;
  methods: FunctionDefinition[];
}
export interface BlockStatement extends AstNode { type: 'BlockStatement'; body: Statement[]; }
export interface ElifClause extends AstNode { type: 'ElifClause'; condition: Expression; body: BlockStatement; }
export interface IfStatement extends AstNode {
  type: 'IfStatement';
  ifCondition: Expression;
  ifBody: BlockStatement;
  elifClauses: ElifClause[];
  elseBody: BlockStatement | null;
}
export interface WhileLoop extends AstNode { type: 'WhileLoop'; condition: Expression; body: BlockStatement; }
export interface ForLoop extends AstNode {
  type: 'ForLoop';
  initializer: VarDeclaration | ConstDeclaration | ExpressionStatement | null;
  condition: Expression | null;
  update: Expression | null;
  body: BlockStatement;
}
export interface BreakStatement extends AstNode { type: 'BreakStatement'; }
export interface ContinueStatement extends AstNode { type: 'ContinueStatement'; }
export interface ReturnStatement extends AstNode { type: 'ReturnStatement'; argument: Expression | null; }
export interface TryStatement extends AstNode {
  type: 'TryStatement';
  tryBody: BlockStatement;
  catchParam: Identifier;
  catchBody: BlockStatement;
}
export interface ThrowStatement extends AstNode { type: 'ThrowStatement'; expression: Expression; }
export interface ExpressionStatement extends AstNode { type: 'ExpressionStatement'; expression: Expression; }

export type Statement =
  | VarDeclaration
  | ConstDeclaration
  | FunctionDefinition
  | ClassDefinition
  | BlockStatement
  | IfStatement
  | WhileLoop
  | ForLoop
  | BreakStatement
  | ContinueStatement
  | ReturnStatement
  | TryStatement
  | ThrowStatement
  | ExpressionStatement;

export interface Program extends AstNode { type: 'Program'; body: Statement[]; }

export function varDeclaration(id: Identifier | string, initializer: Expression | null = null): VarDeclaration {
  return { type: 'VarDeclaration', id: typeof id === 'string' ? identifier(id) : id, initializer };
}
export function constDeclaration(id: Identifier | string, initializer: Expression): ConstDeclaration {
  return { type: 'ConstDeclaration', id: typeof id === 'string' ? identifier(id) : id, initializer };
}
export function functionDefinition(id: Identifier | string, params: (Identifier | string)[], body: BlockStatement): FunctionDefinition {
  return {
    type: 'FunctionDefinition',
    id: typeof id === 'string' ? identifier(id) : id,
    params: params.map(p => (typeof p === 'string' ? identifier(p) : p)),
    body,
  };
}
export function classDefinition(
  id: Identifier | string,
  methods: FunctionDefinition[],
  superclass?: Identifier | string | null,
): ClassDefinition {
  return {
    type: 'ClassDefinition',
    id: typeof id === 'string' ? identifier(id) : id,
    superclass: superclass ? (typeof superclass === 'string' ? identifier(superclass) : superclass) : null,
    methods,
  };
}
export function blockStatement(body: Statement[]): BlockStatement { return { type: 'BlockStatement', body }; }
export function elifClause(condition: Expression, body: BlockStatement): ElifClause {
  return { type: 'ElifClause', condition, body };
}
export function ifStatement(
  ifCondition: Expression,
  ifBody: BlockStatement,
  elifClauses: ElifClause[] = [],
  elseBody: BlockStatement | null = null,
): IfStatement {
  return { type: 'IfStatement', ifCondition, ifBody, elifClauses, elseBody };
}
export function whileLoop(condition: Expression, body: BlockStatement): WhileLoop {
  return { type: 'WhileLoop', condition, body };
}
export function forLoop(
  initializer: ForLoop['initializer'],
  condition: Expression | null,
  update: Expression | null,
  body: BlockStatement,
): ForLoop {
  return { type: 'ForLoop', initializer, condition, update, body };
}
export function breakStatement(): BreakStatement { return { type: 'BreakStatement' }; }
export function continueStatement(): ContinueStatement { return { type: 'ContinueStatement' }; }
export function returnStatement(argument: Expression | null = null): ReturnStatement {
  return { type: 'ReturnStatement', argument };
}
export function tryStatement(tryBody: BlockStatement, catchParam: Identifier | string, catchBody: BlockStatement): TryStatement {
  return { type: 'TryStatement', tryBody, catchParam: typeof catchParam === 'string' ? identifier(catchParam) : catchParam, catchBody };
}
export function throwStatement(expression: Expression): ThrowStatement { return { type: 'ThrowStatement', expression }; }
export function expressionStatement(expression: Expression): ExpressionStatement {
  return { type: 'ExpressionStatement', expression };
}
export function program(body: Statement[]): Program { return { type: 'Program', body }; }

export type Node = Program | Statement | Expression | ElifClause;
