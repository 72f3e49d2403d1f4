import type { RuntimeError } from "../errors";
import type * as AST from "../ast";
import type { RuntimeValue } from "./values";

/**
 * Outcome of executing one statement. Anything other than "normal" is a
 * non-local exit that every statement call site hands back to its caller
 * until a loop, a function call or a try statement absorbs it.
 */
export type Completion =
  | { kind: "normal" }
  | { kind: "break" }
  | { kind: "continue" }
  | { kind: "return"; value: RuntimeValue }
  | ThrowCompletion;

export type ThrowCompletion = {
  kind: "throw";
  value: RuntimeValue;
  /** Set when the thrown value came from a runtime error rather than `throw`. */
  error?: RuntimeError;
  span?: AST.Span;
};

export const NORMAL: Completion = { kind: "normal" };
export const BREAK: Completion = { kind: "break" };
export const CONTINUE: Completion = { kind: "continue" };

/**
 * Carries a throw completion out of a function body across the expression
 * that called it. Statement execution turns it back into a completion.
 */
export class ThrowSignal extends Error {
  constructor(public completion: ThrowCompletion) {
    super("ThrowSignal");
  }
}
