import { RuntimeError } from "../errors";
import type { RuntimeValue } from "./values";

type Binding = {
  value: RuntimeValue;
  constant: boolean;
};

/**
 * One lexical scope. Lookups walk the enclosing chain outward; closures keep
 * a reference to the scope they were declared in.
 */
export class Environment {
  private bindings: Map<string, Binding> = new Map();

  constructor(private enclosing: Environment | null = null) {}

  declare(name: string, value: RuntimeValue, constant = false): void {
    const existing = this.bindings.get(name);
    if (existing?.constant) {
      throw new RuntimeError("RedeclarationError", `Cannot redeclare constant '${name}'`);
    }
    this.bindings.set(name, { value, constant });
  }

  assign(name: string, value: RuntimeValue): void {
    const binding = this.resolve(name);
    if (!binding) {
      throw new RuntimeError("UndefinedVariableError", `Undefined variable '${name}'`);
    }
    if (binding.constant) {
      throw new RuntimeError("ConstAssignmentError", `Cannot assign to constant '${name}'`);
    }
    binding.value = value;
  }

  get(name: string): RuntimeValue {
    const binding = this.resolve(name);
    if (!binding) {
      throw new RuntimeError("UndefinedVariableError", `Undefined variable '${name}'`);
    }
    return binding.value;
  }

  hasInCurrentScope(name: string): boolean {
    return this.bindings.has(name);
  }

  isConstant(name: string): boolean {
    return this.resolve(name)?.constant ?? false;
  }

  private resolve(name: string): Binding | undefined {
    let scope: Environment | null = this;
    while (scope) {
      const binding = scope.bindings.get(name);
      if (binding) return binding;
      scope = scope.enclosing;
    }
    return undefined;
  }
}
