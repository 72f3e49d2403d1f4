import { RuntimeError } from "../errors";
import type { Interpreter } from "../interpreter/index";
import { valueToString } from "../interpreter/stringify";
import { makeNumber, makeString, NULL, typeNameOf, type NativeFunctionValue, type RuntimeValue } from "../interpreter/values";

type NativeImpl = (interpreter: Interpreter, args: RuntimeValue[]) => RuntimeValue;

/** `arity` null accepts any number of arguments. */
export function makeNativeFunction(name: string, arity: number | null, impl: NativeImpl): NativeFunctionValue {
  return { kind: "native_function", name, arity, impl };
}

const NUMERIC_TEXT = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

export function parseNumber(text: string): number | null {
  const trimmed = text.trim();
  if (!NUMERIC_TEXT.test(trimmed)) return null;
  return Number(trimmed);
}

function argumentAt(args: RuntimeValue[], index: number): RuntimeValue {
  return args[index] ?? NULL;
}

export function createStandardLibrary(): NativeFunctionValue[] {
  return [
    makeNativeFunction("print", null, (interp, args) => {
      interp.io.write(`${args.map(arg => valueToString(arg)).join(" ")}\n`);
      return NULL;
    }),

    makeNativeFunction("input", 1, (interp, args) => {
      interp.io.write(valueToString(argumentAt(args, 0)));
      return makeString(interp.io.readLine() ?? "");
    }),

    makeNativeFunction("type", 1, (_interp, args) => makeString(typeNameOf(argumentAt(args, 0)))),

    makeNativeFunction("str", 1, (_interp, args) => makeString(valueToString(argumentAt(args, 0)))),

    makeNativeFunction("num", 1, (_interp, args) => {
      const value = argumentAt(args, 0);
      if (value.kind === "number") return value;
      if (value.kind === "string") {
        const parsed = parseNumber(value.value);
        if (parsed !== null) return makeNumber(parsed);
        throw new RuntimeError("ConversionError", `Cannot convert "${value.value}" to a number`);
      }
      throw new RuntimeError("ConversionError", `Cannot convert ${typeNameOf(value)} to a number`);
    }),

    makeNativeFunction("len", 1, (_interp, args) => {
      const value = argumentAt(args, 0);
      if (value.kind === "string") return makeNumber(Array.from(value.value).length);
      if (value.kind === "array") return makeNumber(value.elements.length);
      throw new RuntimeError("TypeError", `len() expects a string or an array (got ${typeNameOf(value)})`);
    }),
  ];
}
