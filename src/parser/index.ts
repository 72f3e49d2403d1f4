import type * as AST from "../ast";
import { Lexer } from "../lexer/lexer";
import { Parser } from "./parser";

export { Parser } from "./parser";

export function parse(source: string): AST.Program {
  return new Parser(new Lexer(source).tokens()).parse();
}
