import type { Interpreter } from "./index";
import type { RuntimeValue } from "./values";

declare module "./index" {
  interface Interpreter {
    isTruthy(v: RuntimeValue): boolean;
  }
}

export function applyHelperAugmentations(cls: typeof Interpreter): void {
  cls.prototype.isTruthy = function isTruthy(this: Interpreter, v: RuntimeValue): boolean {
    switch (v.kind) {
      case "null":
        return false;
      case "bool":
        return v.value;
      default:
        return true;
    }
  };
}
