import type * as AST from "../ast";
import { RuntimeError } from "../errors";
import type { Environment } from "./environment";
import type { Interpreter } from "./index";
import { bindMethod, findMethod } from "./classes";
import { NULL, typeNameOf, type RuntimeValue } from "./values";

export function evaluateMemberAccess(ctx: Interpreter, node: AST.MemberAccessExpression, env: Environment): RuntimeValue {
  const object = ctx.evaluate(node.object, env);
  if (object.kind !== "instance") {
    throw new RuntimeError("TypeError", `Only instances have properties (cannot read '${node.member.name}' of ${typeNameOf(object)})`);
  }
  const name = node.member.name;
  const field = object.fields.get(name);
  if (field) return field;
  const method = findMethod(object.cls, name);
  return method ? bindMethod(method, object) : NULL;
}

export function evaluateMemberAssignment(ctx: Interpreter, node: AST.MemberAssignmentExpression, env: Environment): RuntimeValue {
  const object = ctx.evaluate(node.object, env);
  if (object.kind !== "instance") {
    throw new RuntimeError("TypeError", `Only instances have fields (cannot set '${node.member.name}' on ${typeNameOf(object)})`);
  }
  const value = ctx.evaluate(node.value, env);
  object.fields.set(node.member.name, value);
  return value;
}

/** Member lookup for `recv.name(...)`: unlike a plain read, a missing member is an error. */
export function resolveMethodForCall(receiver: RuntimeValue, name: string): RuntimeValue {
  if (receiver.kind !== "instance") {
    throw new RuntimeError("TypeError", `Only instances have methods (cannot call '${name}' on ${typeNameOf(receiver)})`);
  }
  const field = receiver.fields.get(name);
  if (field) return field;
  const method = findMethod(receiver.cls, name);
  if (!method) {
    throw new RuntimeError("UndefinedMethodError", `Undefined method '${name}' on ${receiver.cls.name}`);
  }
  return bindMethod(method, receiver);
}

export function evaluateIndexExpression(ctx: Interpreter, node: AST.IndexExpression, env: Environment): RuntimeValue {
  const object = ctx.evaluate(node.object, env);
  const index = ctx.evaluate(node.index, env);
  if (object.kind === "array") {
    const element = object.elements[checkIndex(index, object.elements.length)];
    return element ?? NULL;
  }
  if (object.kind === "string") {
    const chars = Array.from(object.value);
    return { kind: "string", value: chars[checkIndex(index, chars.length)] ?? "" };
  }
  throw new RuntimeError("TypeError", `Only arrays and strings can be indexed (got ${typeNameOf(object)})`);
}

export function evaluateIndexAssignment(ctx: Interpreter, node: AST.IndexAssignmentExpression, env: Environment): RuntimeValue {
  const object = ctx.evaluate(node.object, env);
  const index = ctx.evaluate(node.index, env);
  if (object.kind !== "array") {
    throw new RuntimeError("TypeError", `Only arrays support index assignment (got ${typeNameOf(object)})`);
  }
  const position = checkIndex(index, object.elements.length);
  const value = ctx.evaluate(node.value, env);
  object.elements[position] = value;
  return value;
}

function checkIndex(index: RuntimeValue, length: number): number {
  if (index.kind !== "number" || !Number.isInteger(index.value)) {
    throw new RuntimeError("IndexError", `Index must be an integer (got ${typeNameOf(index)})`);
  }
  if (index.value < 0 || index.value >= length) {
    throw new RuntimeError("IndexError", `Index ${index.value} out of range for length ${length}`);
  }
  return index.value;
}
