import type * as AST from "../ast";
import { ExecutionHaltedError } from "../errors";
import type { Environment } from "./environment";
import type { Interpreter } from "./index";
import { NORMAL, type Completion, type ThrowCompletion } from "./signals";
import { NULL, type RuntimeValue } from "./values";

export type ProgramResult =
  | { status: "completed"; value: RuntimeValue }
  | { status: "uncaught"; completion: ThrowCompletion };

declare module "./index" {
  interface Interpreter {
    interpret(program: AST.Program, env?: Environment): ProgramResult;
  }
}

export function applyProgramAugmentations(cls: typeof Interpreter): void {
  /**
   * Runs top-level statements in order. The result value is that of the last
   * statement when it is an expression statement, otherwise null.
   */
  cls.prototype.interpret = function interpret(this: Interpreter, program: AST.Program, env: Environment = this.globals): ProgramResult {
    let value: RuntimeValue = NULL;
    for (const statement of program.body) {
      if (this.shouldHalt?.(this.executedStatements)) {
        throw new ExecutionHaltedError(this.executedStatements);
      }
      value = NULL;
      let completion: Completion;
      if (statement.type === "ExpressionStatement") {
        completion = this.guardStatement(statement, () => {
          value = this.evaluate(statement.expression, env);
          return NORMAL;
        });
      } else {
        completion = this.execute(statement, env);
      }
      this.executedStatements++;

      switch (completion.kind) {
        case "normal":
          continue;
        case "throw":
          this.logger.debug(`uncaught throw at top level: ${this.valueToString(completion.value)}`);
          return { status: "uncaught", completion };
        case "return":
          return { status: "completed", value: completion.value };
        default:
          return { status: "completed", value };
      }
    }
    return { status: "completed", value };
  };
}
