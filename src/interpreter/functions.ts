import type * as AST from "../ast";
import { RuntimeError } from "../errors";
import { Environment } from "./environment";
import type { Interpreter } from "./index";
import { instantiateClass } from "./classes";
import { resolveMethodForCall } from "./members";
import { NORMAL, ThrowSignal, type Completion } from "./signals";
import { NULL, typeNameOf, type FunctionValue, type InstanceValue, type RuntimeValue } from "./values";

export function executeFunctionDefinition(ctx: Interpreter, node: AST.FunctionDefinition, env: Environment): Completion {
  const fn: FunctionValue = { kind: "function", node, closureEnv: env, isInitializer: false };
  env.declare(node.id.name, fn, false);
  return NORMAL;
}

export function evaluateFunctionCall(ctx: Interpreter, node: AST.FunctionCall, env: Environment): RuntimeValue {
  let callee: RuntimeValue;
  if (node.callee.type === "MemberAccessExpression") {
    const receiver = ctx.evaluate(node.callee.object, env);
    callee = resolveMethodForCall(receiver, node.callee.member.name);
  } else {
    callee = ctx.evaluate(node.callee, env);
  }
  const args = node.arguments.map(arg => ctx.evaluate(arg, env));
  return callCallableValue(ctx, callee, args);
}

export function callCallableValue(ctx: Interpreter, callee: RuntimeValue, args: RuntimeValue[]): RuntimeValue {
  switch (callee.kind) {
    case "function":
      return callFunction(ctx, callee, args, null);
    case "bound_method":
      return callFunction(ctx, callee.func, args, callee.self);
    case "class":
      return instantiateClass(ctx, callee, args);
    case "native_function":
      if (callee.arity !== null && callee.arity !== args.length) {
        throw arityError(callee.name, callee.arity, args.length);
      }
      return callee.impl(ctx, args);
    default:
      throw new RuntimeError("NotCallableError", `Can only call functions and classes (got ${typeNameOf(callee)})`);
  }
}

/**
 * Runs a user function body in a fresh parameter scope. Methods get an extra
 * scope holding `this` between the closure and the parameters. A throw
 * completion leaving the body is raised as a ThrowSignal so it can cross the
 * calling expression.
 */
export function callFunction(ctx: Interpreter, fn: FunctionValue, args: RuntimeValue[], self: InstanceValue | null): RuntimeValue {
  const params = fn.node.params;
  if (params.length !== args.length) {
    throw arityError(fn.node.id.name, params.length, args.length);
  }
  if (ctx.callDepth >= ctx.maxCallDepth) {
    throw new RuntimeError("StackOverflowError", `Maximum call depth of ${ctx.maxCallDepth} exceeded`);
  }

  let scope = fn.closureEnv;
  if (self) {
    scope = new Environment(scope);
    scope.declare("this", self, true);
  }
  const callEnv = new Environment(scope);
  params.forEach((param, i) => {
    callEnv.declare(param.name, args[i] ?? NULL, false);
  });

  const completion = withCallDepth(ctx, () => ctx.executeStatements(fn.node.body.body, callEnv));
  switch (completion.kind) {
    case "return":
      return fn.isInitializer ? NULL : completion.value;
    case "throw":
      throw new ThrowSignal(completion);
    default:
      return NULL;
  }
}

function withCallDepth(ctx: Interpreter, run: () => Completion): Completion {
  ctx.callDepth++;
  try {
    return run();
  } finally {
    ctx.callDepth--;
  }
}

function arityError(name: string, expected: number, received: number): RuntimeError {
  const noun = expected === 1 ? "argument" : "arguments";
  return new RuntimeError("ArityError", `Expected ${expected} ${noun} but got ${received} calling '${name}'`);
}
