import type * as AST from "./ast";
import { diagnosticFromError, diagnosticFromThrow, type Diagnostic } from "./diagnostics";
import { LexError, ParseError, TernError } from "./errors";
import { Interpreter, type InterpreterOptions } from "./interpreter/index";
import type { Environment } from "./interpreter/environment";
import type { RuntimeValue } from "./interpreter/values";
import { parse } from "./parser/index";

export type RunResult =
  | { ok: true; value: RuntimeValue }
  | { ok: false; error: Diagnostic };

/**
 * One interpreter and its root scope, kept alive across runs. Definitions
 * made by one call are visible to the next, which is what the REPL builds on.
 */
export class Session {
  readonly interpreter: Interpreter;

  constructor(options: InterpreterOptions = {}) {
    this.interpreter = new Interpreter(options);
  }

  get globals(): Environment {
    return this.interpreter.globals;
  }

  run(source: string, path?: string): RunResult {
    let program: AST.Program;
    try {
      program = parse(source);
    } catch (err) {
      return this.fail(err, path);
    }
    return this.runProgram(program, path);
  }

  runProgram(program: AST.Program, path?: string): RunResult {
    this.interpreter.logger.debug(`executing ${program.body.length} top-level statement(s)${path ? ` from ${path}` : ""}`);
    try {
      const result = this.interpreter.interpret(program);
      if (result.status === "uncaught") {
        return { ok: false, error: diagnosticFromThrow(result.completion, path) };
      }
      return { ok: true, value: result.value };
    } catch (err) {
      return this.fail(err, path);
    }
  }

  /** One REPL entry: a statement or a bare expression, trailing `;` optional. */
  evaluateLine(line: string): RunResult {
    return this.run(line);
  }

  display(value: RuntimeValue): string {
    return this.interpreter.valueToString(value);
  }

  private fail(err: unknown, path?: string): RunResult {
    if (!(err instanceof TernError)) throw err;
    const error = diagnosticFromError(err, path);
    this.interpreter.logger.debug(`${error.phase} failure: ${error.kind}`);
    return { ok: false, error };
  }
}

/** True when `source` only fails because it stops early, e.g. an open block. */
export function isIncompleteInput(source: string): boolean {
  try {
    parse(source);
    return false;
  } catch (err) {
    if (err instanceof ParseError) return err.found === "end of input";
    if (err instanceof LexError) return err.message.startsWith("Unterminated");
    throw err;
  }
}
