import type * as AST from "../ast";
import { RuntimeError } from "../errors";
import type { Environment } from "./environment";
import type { Interpreter } from "./index";
import { valueToString } from "./stringify";
import { valuesEqual } from "./value_equals";
import { makeBool, makeNumber, makeString, typeNameOf, type RuntimeValue } from "./values";

export function evaluateUnaryExpression(ctx: Interpreter, node: AST.UnaryExpression, env: Environment): RuntimeValue {
  const operand = ctx.evaluate(node.operand, env);
  if (node.operator === "!") return makeBool(!ctx.isTruthy(operand));
  if (operand.kind !== "number") {
    throw new RuntimeError("TypeError", `Operand of unary '-' must be a number (got ${typeNameOf(operand)})`);
  }
  return makeNumber(-operand.value);
}

export function evaluateBinaryExpression(ctx: Interpreter, node: AST.BinaryExpression, env: Environment): RuntimeValue {
  const left = ctx.evaluate(node.left, env);
  const right = ctx.evaluate(node.right, env);
  return applyBinaryOperator(node.operator, left, right);
}

export function evaluateLogicalExpression(ctx: Interpreter, node: AST.LogicalExpression, env: Environment): RuntimeValue {
  const left = ctx.isTruthy(ctx.evaluate(node.left, env));
  if (node.operator === "&&") {
    if (!left) return makeBool(false);
  } else if (left) {
    return makeBool(true);
  }
  return makeBool(ctx.isTruthy(ctx.evaluate(node.right, env)));
}

export function applyBinaryOperator(op: AST.BinaryOperator, left: RuntimeValue, right: RuntimeValue): RuntimeValue {
  switch (op) {
    case "==":
      return makeBool(valuesEqual(left, right));
    case "!=":
      return makeBool(!valuesEqual(left, right));
    case "+":
      if (left.kind === "number" && right.kind === "number") return makeNumber(left.value + right.value);
      if (left.kind === "string" || right.kind === "string") {
        return makeString(valueToString(left) + valueToString(right));
      }
      throw operandError(op, left, right);
    case "-":
    case "*":
    case "/":
    case "%": {
      if (left.kind !== "number" || right.kind !== "number") throw operandError(op, left, right);
      return makeNumber(arithmetic(op, left.value, right.value));
    }
    case "<":
    case "<=":
    case ">":
    case ">=": {
      if (left.kind === "number" && right.kind === "number") return makeBool(compareNumbers(op, left.value, right.value));
      if (left.kind === "string" && right.kind === "string") return makeBool(compareStrings(op, left.value, right.value));
      throw operandError(op, left, right);
    }
  }
}

function arithmetic(op: "-" | "*" | "/" | "%", a: number, b: number): number {
  switch (op) {
    case "-": return a - b;
    case "*": return a * b;
    case "/": return a / b;
    case "%": return a % b;
  }
}

type RelationalOperator = "<" | "<=" | ">" | ">=";

function compareNumbers(op: RelationalOperator, a: number, b: number): boolean {
  switch (op) {
    case "<": return a < b;
    case "<=": return a <= b;
    case ">": return a > b;
    case ">=": return a >= b;
  }
}

function compareStrings(op: RelationalOperator, a: string, b: string): boolean {
  switch (op) {
    case "<": return a < b;
    case "<=": return a <= b;
    case ">": return a > b;
    case ">=": return a >= b;
  }
}

function operandError(op: AST.BinaryOperator, left: RuntimeValue, right: RuntimeValue): RuntimeError {
  return new RuntimeError(
    "TypeError",
    `Unsupported operand types for '${op}': ${typeNameOf(left)} and ${typeNameOf(right)}`,
  );
}
