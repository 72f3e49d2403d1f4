import type * as AST from "../ast";
import type { Environment } from "./environment";
import type { Interpreter } from "./index";
import { makeArray, makeBool, makeNumber, makeString, NULL, type RuntimeValue } from "./values";

export function evaluateLiteral(ctx: Interpreter, node: AST.Literal, env: Environment): RuntimeValue {
  switch (node.type) {
    case "StringLiteral":
      return makeString(node.value);
    case "NumberLiteral":
      return makeNumber(node.value);
    case "BooleanLiteral":
      return makeBool(node.value);
    case "NullLiteral":
      return NULL;
    case "ArrayLiteral":
      return makeArray(node.elements.map(el => ctx.evaluate(el, env)));
  }
}
