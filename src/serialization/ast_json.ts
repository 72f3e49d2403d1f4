import * as AST from "../ast";
import { AstFormatError } from "../errors";
import { parse } from "../parser/index";

export const AST_FORMAT = "tern-ast";
export const AST_FORMAT_VERSION = 1;

export type AstMetadata = Record<string, string>;

export type AstDocument = {
  format: typeof AST_FORMAT;
  version: number;
  metadata: AstMetadata;
  program: AST.Program;
};

export function serializeProgram(program: AST.Program, metadata: AstMetadata = {}): string {
  const doc: AstDocument = { format: AST_FORMAT, version: AST_FORMAT_VERSION, metadata, program };
  return JSON.stringify(doc, null, 2);
}

export function compileSource(source: string, metadata: AstMetadata = {}): string {
  return serializeProgram(parse(source), metadata);
}

export function deserializeDocument(text: string): AstDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new AstFormatError(`invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  const doc = expectObject(raw, "document");
  if (doc.format !== AST_FORMAT) {
    throw new AstFormatError(`unsupported format ${JSON.stringify(doc.format)}; expected "${AST_FORMAT}"`);
  }
  if (doc.version !== AST_FORMAT_VERSION) {
    throw new AstFormatError(`unsupported version ${JSON.stringify(doc.version)}; expected ${AST_FORMAT_VERSION}`);
  }
  const metadata: AstMetadata = {};
  if (doc.metadata !== undefined) {
    for (const [key, value] of Object.entries(expectObject(doc.metadata, "metadata"))) {
      metadata[key] = expectString(value, `metadata.${key}`);
    }
  }
  let program: AST.Program;
  try {
    program = readProgram(doc.program);
  } catch (error) {
    if (error instanceof RangeError) throw new AstFormatError("program is nested too deeply to load");
    throw error;
  }
  return { format: AST_FORMAT, version: AST_FORMAT_VERSION, metadata, program };
}

export function deserializeProgram(text: string): AST.Program {
  return deserializeDocument(text).program;
}

// -----------------------------------------------------------------------------
// Node readers
// -----------------------------------------------------------------------------

type RawNode = Record<string, unknown> & { type: string };

function readProgram(raw: unknown): AST.Program {
  const node = expectNode(raw, "program");
  if (node.type !== "Program") throw mismatch("program", "Program", node.type);
  return withSpan(AST.program(readList(node.body, "Program.body", readStatement)), node);
}

function readStatement(raw: unknown, where: string): AST.Statement {
  const node = expectNode(raw, where);
  switch (node.type) {
    case "VarDeclaration":
      return withSpan(
        AST.varDeclaration(readIdentifier(node.id, `${where}.id`), readOptional(node.initializer, `${where}.initializer`, readExpression)),
        node,
      );
    case "ConstDeclaration":
      return withSpan(
        AST.constDeclaration(readIdentifier(node.id, `${where}.id`), readExpression(node.initializer, `${where}.initializer`)),
        node,
      );
    case "FunctionDefinition":
      return readFunctionDefinition(node, where);
    case "ClassDefinition":
      return withSpan(
        AST.classDefinition(
          readIdentifier(node.id, `${where}.id`),
          readList(node.methods, `${where}.methods`, (m, w) => readFunctionDefinition(expectNode(m, w), w)),
          readOptional(node.superclass, `${where}.superclass`, readIdentifier),
        ),
        node,
      );
    case "BlockStatement":
      return readBlock(node, where);
    case "IfStatement":
      return withSpan(
        AST.ifStatement(
          readExpression(node.ifCondition, `${where}.ifCondition`),
          readBlock(node.ifBody, `${where}.ifBody`),
          readList(node.elifClauses, `${where}.elifClauses`, readElifClause),
          readOptional(node.elseBody, `${where}.elseBody`, readBlock),
        ),
        node,
      );
    case "WhileLoop":
      return withSpan(
        AST.whileLoop(readExpression(node.condition, `${where}.condition`), readBlock(node.body, `${where}.body`)),
        node,
      );
    case "ForLoop":
      return withSpan(
        AST.forLoop(
          readOptional(node.initializer, `${where}.initializer`, readForInitializer),
          readOptional(node.condition, `${where}.condition`, readExpression),
          readOptional(node.update, `${where}.update`, readExpression),
          readBlock(node.body, `${where}.body`),
        ),
        node,
      );
    case "BreakStatement":
      return withSpan(AST.breakStatement(), node);
    case "ContinueStatement":
      return withSpan(AST.continueStatement(), node);
    case "ReturnStatement":
      return withSpan(AST.returnStatement(readOptional(node.argument, `${where}.argument`, readExpression)), node);
    case "TryStatement":
      return withSpan(
        AST.tryStatement(
          readBlock(node.tryBody, `${where}.tryBody`),
          readIdentifier(node.catchParam, `${where}.catchParam`),
          readBlock(node.catchBody, `${where}.catchBody`),
        ),
        node,
      );
    case "ThrowStatement":
      return withSpan(AST.throwStatement(readExpression(node.expression, `${where}.expression`)), node);
    case "ExpressionStatement":
      return withSpan(AST.expressionStatement(readExpression(node.expression, `${where}.expression`)), node);
    default:
      throw new AstFormatError(`${where}: unknown statement type "${node.type}"`);
  }
}

function readForInitializer(raw: unknown, where: string): AST.ForLoop["initializer"] {
  const statement = readStatement(raw, where);
  if (statement.type === "VarDeclaration" || statement.type === "ConstDeclaration" || statement.type === "ExpressionStatement") {
    return statement;
  }
  throw new AstFormatError(`${where}: ${statement.type} cannot initialise a for loop`);
}

function readFunctionDefinition(node: RawNode, where: string): AST.FunctionDefinition {
  if (node.type !== "FunctionDefinition") throw mismatch(where, "FunctionDefinition", node.type);
  return withSpan(
    AST.functionDefinition(
      readIdentifier(node.id, `${where}.id`),
      readList(node.params, `${where}.params`, readIdentifier),
      readBlock(node.body, `${where}.body`),
    ),
    node,
  );
}

function readBlock(raw: unknown, where: string): AST.BlockStatement {
  const node = expectNode(raw, where);
  if (node.type !== "BlockStatement") throw mismatch(where, "BlockStatement", node.type);
  return withSpan(AST.blockStatement(readList(node.body, `${where}.body`, readStatement)), node);
}

function readElifClause(raw: unknown, where: string): AST.ElifClause {
  const node = expectNode(raw, where);
  if (node.type !== "ElifClause") throw mismatch(where, "ElifClause", node.type);
  return withSpan(AST.elifClause(readExpression(node.condition, `${where}.condition`), readBlock(node.body, `${where}.body`)), node);
}

function readIdentifier(raw: unknown, where: string): AST.Identifier {
  const node = expectNode(raw, where);
  if (node.type !== "Identifier") throw mismatch(where, "Identifier", node.type);
  return withSpan(AST.identifier(expectString(node.name, `${where}.name`)), node);
}

const UNARY_OPERATORS: readonly AST.UnaryOperator[] = ["-", "!"];
const BINARY_OPERATORS: readonly AST.BinaryOperator[] = ["+", "-", "*", "/", "%", "==", "!=", "<", "<=", ">", ">="];
const LOGICAL_OPERATORS: readonly AST.LogicalOperator[] = ["&&", "||"];

function readExpression(raw: unknown, where: string): AST.Expression {
  const node = expectNode(raw, where);
  switch (node.type) {
    case "Identifier":
      return readIdentifier(node, where);
    case "StringLiteral":
      return withSpan(AST.stringLiteral(expectString(node.value, `${where}.value`)), node);
    case "NumberLiteral":
      if (typeof node.value !== "number") throw new AstFormatError(`${where}.value: expected a number`);
      return withSpan(AST.numberLiteral(node.value), node);
    case "BooleanLiteral":
      if (typeof node.value !== "boolean") throw new AstFormatError(`${where}.value: expected a boolean`);
      return withSpan(AST.booleanLiteral(node.value), node);
    case "NullLiteral":
      return withSpan(AST.nullLiteral(), node);
    case "ArrayLiteral":
      return withSpan(AST.arrayLiteral(readList(node.elements, `${where}.elements`, readExpression)), node);
    case "ThisExpression":
      return withSpan(AST.thisExpression(), node);
    case "SuperExpression":
      return withSpan(AST.superExpression(readIdentifier(node.method, `${where}.method`)), node);
    case "UnaryExpression":
      return withSpan(
        AST.unaryExpression(
          expectOneOf(node.operator, UNARY_OPERATORS, `${where}.operator`),
          readExpression(node.operand, `${where}.operand`),
        ),
        node,
      );
    case "BinaryExpression":
      return withSpan(
        AST.binaryExpression(
          expectOneOf(node.operator, BINARY_OPERATORS, `${where}.operator`),
          readExpression(node.left, `${where}.left`),
          readExpression(node.right, `${where}.right`),
        ),
        node,
      );
    case "LogicalExpression":
      return withSpan(
        AST.logicalExpression(
          expectOneOf(node.operator, LOGICAL_OPERATORS, `${where}.operator`),
          readExpression(node.left, `${where}.left`),
          readExpression(node.right, `${where}.right`),
        ),
        node,
      );
    case "FunctionCall":
      return withSpan(
        AST.functionCall(readExpression(node.callee, `${where}.callee`), readList(node.arguments, `${where}.arguments`, readExpression)),
        node,
      );
    case "MemberAccessExpression":
      return withSpan(
        AST.memberAccessExpression(readExpression(node.object, `${where}.object`), readIdentifier(node.member, `${where}.member`)),
        node,
      );
    case "MemberAssignmentExpression":
      return withSpan(
        AST.memberAssignmentExpression(
          readExpression(node.object, `${where}.object`),
          readIdentifier(node.member, `${where}.member`),
          readExpression(node.value, `${where}.value`),
        ),
        node,
      );
    case "IndexExpression":
      return withSpan(
        AST.indexExpression(readExpression(node.object, `${where}.object`), readExpression(node.index, `${where}.index`)),
        node,
      );
    case "IndexAssignmentExpression":
      return withSpan(
        AST.indexAssignmentExpression(
          readExpression(node.object, `${where}.object`),
          readExpression(node.index, `${where}.index`),
          readExpression(node.value, `${where}.value`),
        ),
        node,
      );
    case "AssignmentExpression":
      return withSpan(
        AST.assignmentExpression(readIdentifier(node.target, `${where}.target`), readExpression(node.value, `${where}.value`)),
        node,
      );
    default:
      throw new AstFormatError(`${where}: unknown expression type "${node.type}"`);
  }
}

// -----------------------------------------------------------------------------
// Shape helpers
// -----------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function expectObject(raw: unknown, where: string): Record<string, unknown> {
  if (!isRecord(raw)) {
    throw new AstFormatError(`${where}: expected an object`);
  }
  return raw;
}

function expectNode(raw: unknown, where: string): RawNode {
  const obj = expectObject(raw, where);
  const type = obj.type;
  if (typeof type !== "string") {
    throw new AstFormatError(`${where}: node has no "type"`);
  }
  return { ...obj, type };
}

function expectString(raw: unknown, where: string): string {
  if (typeof raw !== "string") throw new AstFormatError(`${where}: expected a string`);
  return raw;
}

function expectOneOf<T extends string>(raw: unknown, allowed: readonly T[], where: string): T {
  const match = allowed.find(candidate => candidate === raw);
  if (match === undefined) {
    throw new AstFormatError(`${where}: expected one of ${allowed.join(" ")}`);
  }
  return match;
}

function readList<T>(raw: unknown, where: string, read: (item: unknown, where: string) => T): T[] {
  if (!Array.isArray(raw)) throw new AstFormatError(`${where}: expected an array`);
  return raw.map((item: unknown, i) => read(item, `${where}[${i}]`));
}

function readOptional<T>(raw: unknown, where: string, read: (item: unknown, where: string) => T): T | null {
  if (raw === null || raw === undefined) return null;
  return read(raw, where);
}

function readPosition(raw: unknown, where: string): AST.Position {
  const obj = expectObject(raw, where);
  const { line, column } = obj;
  if (!isPositiveInteger(line) || !isPositiveInteger(column)) {
    throw new AstFormatError(`${where}: line and column must be positive integers`);
  }
  return { line, column };
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 1;
}

function withSpan<T extends AST.AstNode>(node: T, raw: RawNode): T {
  if (raw.span === undefined) return node;
  const span = expectObject(raw.span, `${raw.type}.span`);
  node.span = {
    start: readPosition(span.start, `${raw.type}.span.start`),
    end: readPosition(span.end, `${raw.type}.span.end`),
  };
  return node;
}

function mismatch(where: string, expected: string, found: string): AstFormatError {
  return new AstFormatError(`${where}: expected ${expected} but found ${found}`);
}
