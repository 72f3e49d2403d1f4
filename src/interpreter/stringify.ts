import type { Interpreter } from "./index";
import type { RuntimeValue } from "./values";

declare module "./index" {
  interface Interpreter {
    valueToString(v: RuntimeValue): string;
  }
}

export function formatNumber(value: number): string {
  return String(value);
}

/** String conversion shared by `print`, `str` and string concatenation. */
export function valueToString(v: RuntimeValue, seen: Set<RuntimeValue> = new Set()): string {
  switch (v.kind) {
    case "null": return "null";
    case "bool": return v.value ? "true" : "false";
    case "number": return formatNumber(v.value);
    case "string": return v.value;
    case "array": {
      if (seen.has(v)) return "[...]";
      seen.add(v);
      const inner = v.elements.map(e => valueToString(e, seen)).join(", ");
      seen.delete(v);
      return `[${inner}]`;
    }
    case "function": return `<func ${v.node.id.name}>`;
    case "bound_method": return `<func ${v.func.node.id.name}>`;
    case "native_function": return `<native ${v.name}>`;
    case "class": return `<class ${v.name}>`;
    case "instance": return `<${v.cls.name} instance>`;
  }
}

export function applyStringifyAugmentations(cls: typeof Interpreter): void {
  cls.prototype.valueToString = function (this: Interpreter, v: RuntimeValue): string {
    return valueToString(v);
  };
}
