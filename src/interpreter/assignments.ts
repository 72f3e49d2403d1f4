import type * as AST from "../ast";
import type { Environment } from "./environment";
import type { Interpreter } from "./index";
import { NORMAL, type Completion } from "./signals";
import { NULL, type RuntimeValue } from "./values";

export function evaluateAssignmentExpression(ctx: Interpreter, node: AST.AssignmentExpression, env: Environment): RuntimeValue {
  const value = ctx.evaluate(node.value, env);
  env.assign(node.target.name, value);
  return value;
}

export function executeVarDeclaration(ctx: Interpreter, node: AST.VarDeclaration, env: Environment): Completion {
  const value = node.initializer ? ctx.evaluate(node.initializer, env) : NULL;
  env.declare(node.id.name, value, false);
  return NORMAL;
}

export function executeConstDeclaration(ctx: Interpreter, node: AST.ConstDeclaration, env: Environment): Completion {
  const value = ctx.evaluate(node.initializer, env);
  env.declare(node.id.name, value, true);
  return NORMAL;
}
