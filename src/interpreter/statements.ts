import type * as AST from "../ast";
import { RuntimeError } from "../errors";
import type { Environment } from "./environment";
import type { Interpreter } from "./index";
import { executeConstDeclaration, executeVarDeclaration } from "./assignments";
import { executeClassDefinition } from "./classes";
import {
  executeBlockStatement,
  executeBreakStatement,
  executeContinueStatement,
  executeForLoop,
  executeIfStatement,
  executeReturnStatement,
  executeWhileLoop,
} from "./control_flow";
import { executeThrowStatement, executeTryStatement } from "./error_handling";
import { executeFunctionDefinition } from "./functions";
import { NORMAL, ThrowSignal, type Completion, type ThrowCompletion } from "./signals";
import { makeString } from "./values";

declare module "./index" {
  interface Interpreter {
    execute(node: AST.Statement, env: Environment): Completion;
    executeStatements(statements: AST.Statement[], env: Environment): Completion;
    guardStatement(node: AST.AstNode, run: () => Completion): Completion;
  }
}

/**
 * Converts an error escaping a statement into a throw completion. Returns
 * null for errors that are not failures of the running program.
 *
 * A host RangeError is the engine's stack overflow. Building the replacement
 * error can overflow again at that depth; the new RangeError then reaches the
 * next enclosing statement, which retries with more stack to spare.
 */
export function completionFromError(err: unknown, span?: AST.Span): ThrowCompletion | null {
  if (err instanceof ThrowSignal) return err.completion;
  let error: RuntimeError | null = null;
  if (err instanceof RuntimeError) {
    error = err;
  } else if (err instanceof RangeError) {
    error = new RuntimeError("StackOverflowError", "Maximum call stack size exceeded");
  }
  if (!error) return null;
  if (span) error.attachSpan(span);
  return { kind: "throw", value: makeString(error.message), error, span: error.span };
}

export function applyStatementAugmentations(cls: typeof Interpreter): void {
  cls.prototype.guardStatement = function guardStatement(this: Interpreter, node: AST.AstNode, run: () => Completion): Completion {
    try {
      return run();
    } catch (err) {
      const completion = completionFromError(err, node.span);
      if (completion) return completion;
      throw err;
    }
  };

  cls.prototype.executeStatements = function executeStatements(this: Interpreter, statements: AST.Statement[], env: Environment): Completion {
    for (const statement of statements) {
      const completion = this.execute(statement, env);
      if (completion.kind !== "normal") return completion;
    }
    return NORMAL;
  };

  cls.prototype.execute = function execute(this: Interpreter, node: AST.Statement, env: Environment): Completion {
    return this.guardStatement(node, () => {
      switch (node.type) {
        case "VarDeclaration":
          return executeVarDeclaration(this, node, env);
        case "ConstDeclaration":
          return executeConstDeclaration(this, node, env);
        case "FunctionDefinition":
          return executeFunctionDefinition(this, node, env);
        case "ClassDefinition":
          return executeClassDefinition(this, node, env);
        case "BlockStatement":
          return executeBlockStatement(this, node, env);
        case "IfStatement":
          return executeIfStatement(this, node, env);
        case "WhileLoop":
          return executeWhileLoop(this, node, env);
        case "ForLoop":
          return executeForLoop(this, node, env);
        case "BreakStatement":
          return executeBreakStatement();
        case "ContinueStatement":
          return executeContinueStatement();
        case "ReturnStatement":
          return executeReturnStatement(this, node, env);
        case "TryStatement":
          return executeTryStatement(this, node, env);
        case "ThrowStatement":
          return executeThrowStatement(this, node, env);
        case "ExpressionStatement":
          this.evaluate(node.expression, env);
          return NORMAL;
      }
    });
  };
}
