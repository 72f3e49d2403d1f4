import type { RuntimeValue } from "./values";

type ArrayPairs = Map<RuntimeValue[], Set<RuntimeValue[]>>;

/**
 * Equality behind `==` and `!=`. Never throws: values of different kinds are
 * unequal, arrays compare element-wise and reference values by identity.
 * A pair of arrays met again while it is still being compared counts as
 * equal, so cyclic arrays terminate.
 */
export function valuesEqual(a: RuntimeValue, b: RuntimeValue, comparing: ArrayPairs = new Map()): boolean {
  if (a === b) return true;
  switch (a.kind) {
    case "null":
      return b.kind === "null";
    case "bool":
    case "number":
    case "string":
      return b.kind === a.kind && a.value === b.value;
    case "array": {
      if (b.kind !== "array" || a.elements.length !== b.elements.length) return false;
      let partners = comparing.get(a.elements);
      if (partners?.has(b.elements)) return true;
      if (!partners) {
        partners = new Set();
        comparing.set(a.elements, partners);
      }
      partners.add(b.elements);
      for (let i = 0; i < a.elements.length; i++) {
        const left = a.elements[i];
        const right = b.elements[i];
        if (left === undefined || right === undefined || !valuesEqual(left, right, comparing)) return false;
      }
      return true;
    }
    case "bound_method":
      return b.kind === "bound_method" && a.func === b.func && a.self === b.self;
    default:
      return false;
  }
}
