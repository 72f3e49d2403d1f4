export { Lexer, tokenize } from "./lexer";
export { TokenType, KEYWORDS, describeToken } from "./tokens";
export type { Token } from "./tokens";
