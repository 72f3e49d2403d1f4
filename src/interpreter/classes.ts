import type * as AST from "../ast";
import { RuntimeError } from "../errors";
import { Environment } from "./environment";
import type { Interpreter } from "./index";
import { callFunction } from "./functions";
import { NORMAL, type Completion } from "./signals";
import { typeNameOf, type BoundMethodValue, type ClassValue, type FunctionValue, type InstanceValue, type RuntimeValue } from "./values";

export function executeClassDefinition(ctx: Interpreter, node: AST.ClassDefinition, env: Environment): Completion {
  let superclass: ClassValue | null = null;
  if (node.superclass) {
    const candidate = env.get(node.superclass.name);
    if (candidate.kind !== "class") {
      throw new RuntimeError("TypeError", `Superclass of '${node.id.name}' must be a class (got ${typeNameOf(candidate)})`);
    }
    superclass = candidate;
  }

  let methodEnv = env;
  if (superclass) {
    methodEnv = new Environment(env);
    methodEnv.declare("super", superclass, true);
  }

  const methods = new Map<string, FunctionValue>();
  for (const method of node.methods) {
    methods.set(method.id.name, {
      kind: "function",
      node: method,
      closureEnv: methodEnv,
      isInitializer: method.id.name === "init",
    });
  }

  const cls: ClassValue = { kind: "class", name: node.id.name, superclass, methods };
  env.declare(node.id.name, cls, false);
  return NORMAL;
}

export function findMethod(cls: ClassValue, name: string): FunctionValue | null {
  let current: ClassValue | null = cls;
  while (current) {
    const method = current.methods.get(name);
    if (method) return method;
    current = current.superclass;
  }
  return null;
}

export function bindMethod(func: FunctionValue, self: InstanceValue): BoundMethodValue {
  return { kind: "bound_method", func, self };
}

export function instantiateClass(ctx: Interpreter, cls: ClassValue, args: RuntimeValue[]): InstanceValue {
  const instance: InstanceValue = { kind: "instance", cls, fields: new Map() };
  const init = findMethod(cls, "init");
  if (init) {
    callFunction(ctx, init, args, instance);
  } else if (args.length > 0) {
    throw new RuntimeError("ArityError", `Expected 0 arguments but got ${args.length} calling '${cls.name}'`);
  }
  return instance;
}

export function evaluateThisExpression(ctx: Interpreter, node: AST.ThisExpression, env: Environment): RuntimeValue {
  return env.get("this");
}

export function evaluateSuperExpression(ctx: Interpreter, node: AST.SuperExpression, env: Environment): RuntimeValue {
  const superclass = env.get("super");
  const self = env.get("this");
  if (superclass.kind !== "class" || self.kind !== "instance") {
    throw new RuntimeError("TypeError", "'super' used outside of a subclass method");
  }
  const method = findMethod(superclass, node.method.name);
  if (!method) {
    throw new RuntimeError("UndefinedMethodError", `Undefined method '${node.method.name}' on superclass ${superclass.name}`);
  }
  return bindMethod(method, self);
}
