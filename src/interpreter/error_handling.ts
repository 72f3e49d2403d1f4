import type * as AST from "../ast";
import { Environment } from "./environment";
import type { Interpreter } from "./index";
import { executeBlockStatement } from "./control_flow";
import type { Completion } from "./signals";

export function executeTryStatement(ctx: Interpreter, node: AST.TryStatement, env: Environment): Completion {
  const completion = executeBlockStatement(ctx, node.tryBody, env);
  if (completion.kind !== "throw") return completion;
  ctx.logger.debug(`caught ${ctx.valueToString(completion.value)} in '${node.catchParam.name}'`);
  const catchEnv = new Environment(env);
  catchEnv.declare(node.catchParam.name, completion.value, false);
  return ctx.executeStatements(node.catchBody.body, catchEnv);
}

export function executeThrowStatement(ctx: Interpreter, node: AST.ThrowStatement, env: Environment): Completion {
  const value = ctx.evaluate(node.expression, env);
  return { kind: "throw", value, span: node.span };
}
