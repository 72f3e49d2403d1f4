import type * as AST from "../ast";
import { RuntimeError } from "../errors";
import type { Environment } from "./environment";
import type { Interpreter } from "./index";
import { evaluateAssignmentExpression } from "./assignments";
import { evaluateSuperExpression, evaluateThisExpression } from "./classes";
import { evaluateFunctionCall } from "./functions";
import { evaluateLiteral } from "./literals";
import {
  evaluateIndexAssignment,
  evaluateIndexExpression,
  evaluateMemberAccess,
  evaluateMemberAssignment,
} from "./members";
import { evaluateBinaryExpression, evaluateLogicalExpression, evaluateUnaryExpression } from "./operations";
import type { RuntimeValue } from "./values";

declare module "./index" {
  interface Interpreter {
    evaluate(node: AST.Expression, env?: Environment): RuntimeValue;
  }
}

export function applyEvaluationAugmentations(cls: typeof Interpreter): void {
  cls.prototype.evaluate = function evaluate(this: Interpreter, node: AST.Expression, env: Environment = this.globals): RuntimeValue {
    try {
      return evaluateNode(this, node, env);
    } catch (err) {
      if (err instanceof RuntimeError && node.span) err.attachSpan(node.span);
      throw err;
    }
  };
}

function evaluateNode(ctx: Interpreter, node: AST.Expression, env: Environment): RuntimeValue {
  switch (node.type) {
    case "StringLiteral":
    case "NumberLiteral":
    case "BooleanLiteral":
    case "NullLiteral":
    case "ArrayLiteral":
      return evaluateLiteral(ctx, node, env);
    case "Identifier":
      return env.get(node.name);
    case "ThisExpression":
      return evaluateThisExpression(ctx, node, env);
    case "SuperExpression":
      return evaluateSuperExpression(ctx, node, env);
    case "UnaryExpression":
      return evaluateUnaryExpression(ctx, node, env);
    case "BinaryExpression":
      return evaluateBinaryExpression(ctx, node, env);
    case "LogicalExpression":
      return evaluateLogicalExpression(ctx, node, env);
    case "FunctionCall":
      return evaluateFunctionCall(ctx, node, env);
    case "MemberAccessExpression":
      return evaluateMemberAccess(ctx, node, env);
    case "MemberAssignmentExpression":
      return evaluateMemberAssignment(ctx, node, env);
    case "IndexExpression":
      return evaluateIndexExpression(ctx, node, env);
    case "IndexAssignmentExpression":
      return evaluateIndexAssignment(ctx, node, env);
    case "AssignmentExpression":
      return evaluateAssignmentExpression(ctx, node, env);
  }
}
