import type * as AST from "../ast";
import type { Environment } from "./environment";
import type { Interpreter } from "./index";

export type FunctionValue = {
  kind: "function";
  node: AST.FunctionDefinition;
  closureEnv: Environment;
  isInitializer: boolean;
};

export type NativeFunctionValue = {
  kind: "native_function";
  name: string;
  /** Exact argument count, or null for variadic natives. */
  arity: number | null;
  impl: (interpreter: Interpreter, args: RuntimeValue[]) => RuntimeValue;
};

export type ClassValue = {
  kind: "class";
  name: string;
  superclass: ClassValue | null;
  methods: Map<string, FunctionValue>;
};

export type InstanceValue = {
  kind: "instance";
  cls: ClassValue;
  fields: Map<string, RuntimeValue>;
};

export type BoundMethodValue = {
  kind: "bound_method";
  func: FunctionValue;
  self: InstanceValue;
};

export type RuntimeValue =
  | { kind: "null"; value: null }
  | { kind: "bool"; value: boolean }
  | { kind: "number"; value: number }
  | { kind: "string"; value: string }
  | { kind: "array"; elements: RuntimeValue[] }
  | FunctionValue
  | NativeFunctionValue
  | ClassValue
  | InstanceValue
  | BoundMethodValue;

export type CallableValue = FunctionValue | NativeFunctionValue | ClassValue | BoundMethodValue;

export const NULL: RuntimeValue = { kind: "null", value: null };
export const TRUE: RuntimeValue = { kind: "bool", value: true };
export const FALSE: RuntimeValue = { kind: "bool", value: false };

export function makeBool(value: boolean): RuntimeValue {
  return value ? TRUE : FALSE;
}

export function makeNumber(value: number): RuntimeValue {
  return { kind: "number", value };
}

export function makeString(value: string): RuntimeValue {
  return { kind: "string", value };
}

export function makeArray(elements: RuntimeValue[]): RuntimeValue {
  return { kind: "array", elements };
}

export function isCallable(value: RuntimeValue): value is CallableValue {
  return value.kind === "function" || value.kind === "native_function" || value.kind === "class" || value.kind === "bound_method";
}

/** Kind names exposed to scripts through `type(value)`. */
export function typeNameOf(value: RuntimeValue): string {
  switch (value.kind) {
    case "null": return "null";
    case "bool": return "boolean";
    case "number": return "number";
    case "string": return "string";
    case "array": return "array";
    case "function":
    case "bound_method":
      return "function";
    case "native_function": return "native_function";
    case "class": return "class";
    case "instance": return "instance";
  }
}
