import type * as AST from "../ast";
import { Environment } from "./environment";
import type { Interpreter } from "./index";
import { BREAK, CONTINUE, NORMAL, type Completion } from "./signals";
import { NULL } from "./values";

export function executeBlockStatement(ctx: Interpreter, node: AST.BlockStatement, env: Environment): Completion {
  return ctx.executeStatements(node.body, new Environment(env));
}

export function executeIfStatement(ctx: Interpreter, node: AST.IfStatement, env: Environment): Completion {
  if (ctx.isTruthy(ctx.evaluate(node.ifCondition, env))) {
    return executeBlockStatement(ctx, node.ifBody, env);
  }
  for (const clause of node.elifClauses) {
    if (ctx.isTruthy(ctx.evaluate(clause.condition, env))) {
      return executeBlockStatement(ctx, clause.body, env);
    }
  }
  return node.elseBody ? executeBlockStatement(ctx, node.elseBody, env) : NORMAL;
}

export function executeWhileLoop(ctx: Interpreter, node: AST.WhileLoop, env: Environment): Completion {
  while (ctx.isTruthy(ctx.evaluate(node.condition, env))) {
    const completion = executeBlockStatement(ctx, node.body, env);
    if (completion.kind === "break") break;
    if (completion.kind === "return" || completion.kind === "throw") return completion;
  }
  return NORMAL;
}

/**
 * The initializer runs in a scope owned by the loop; the body gets a fresh
 * child of that scope on every iteration. `continue` still runs the update.
 */
export function executeForLoop(ctx: Interpreter, node: AST.ForLoop, env: Environment): Completion {
  const loopEnv = new Environment(env);
  if (node.initializer) {
    const init = ctx.execute(node.initializer, loopEnv);
    if (init.kind !== "normal") return init;
  }
  while (!node.condition || ctx.isTruthy(ctx.evaluate(node.condition, loopEnv))) {
    const completion = executeBlockStatement(ctx, node.body, loopEnv);
    if (completion.kind === "break") break;
    if (completion.kind === "return" || completion.kind === "throw") return completion;
    if (node.update) ctx.evaluate(node.update, loopEnv);
  }
  return NORMAL;
}

export function executeBreakStatement(): Completion {
  return BREAK;
}

export function executeContinueStatement(): Completion {
  return CONTINUE;
}

export function executeReturnStatement(ctx: Interpreter, node: AST.ReturnStatement, env: Environment): Completion {
  const value = node.argument ? ctx.evaluate(node.argument, env) : NULL;
  return { kind: "return", value };
}
