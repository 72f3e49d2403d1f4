export enum TokenType {
  // Single-character tokens
  LEFT_PAREN = "(",
  RIGHT_PAREN = ")",
  LEFT_BRACE = "{",
  RIGHT_BRACE = "}",
  LEFT_BRACKET = "[",
  RIGHT_BRACKET = "]",
  COMMA = ",",
  DOT = ".",
  SEMICOLON = ";",
  MINUS = "-",
  PLUS = "+",
  SLASH = "/",
  STAR = "*",
  PERCENT = "%",
  BANG = "!",
  EQUAL = "=",
  LESS = "<",
  GREATER = ">",

  // One or two character tokens
  BANG_EQUAL = "!=",
  EQUAL_EQUAL = "==",
  LESS_EQUAL = "<=",
  GREATER_EQUAL = ">=",
  AND_AND = "&&",
  PIPE_PIPE = "||",

  // Literals
  IDENTIFIER = "identifier",
  STRING = "string",
  NUMBER = "number",

  // Keywords
  VAR = "var",
  CONST = "const",
  FUNC = "func",
  IF = "if",
  ELIF = "elif",
  ELSE = "else",
  WHILE = "while",
  FOR = "for",
  BREAK = "break",
  CONTINUE = "continue",
  RETURN = "return",
  CLASS = "class",
  TRY = "try",
  CATCH = "catch",
  THROW = "throw",
  THIS = "this",
  SUPER = "super",
  TRUE = "true",
  FALSE = "false",
  NULL = "null",

  EOF = "end of input",
}

export interface Token {
  readonly kind: TokenType;
  readonly lexeme: string;
  readonly literal?: number | string;
  readonly line: number;
  readonly column: number;
}

export const KEYWORDS: ReadonlyMap<string, TokenType> = new Map([
  ["var", TokenType.VAR],
  ["const", TokenType.CONST],
  ["func", TokenType.FUNC],
  ["if", TokenType.IF],
  ["elif", TokenType.ELIF],
  ["else", TokenType.ELSE],
  ["while", TokenType.WHILE],
  ["for", TokenType.FOR],
  ["break", TokenType.BREAK],
  ["continue", TokenType.CONTINUE],
  ["return", TokenType.RETURN],
  ["class", TokenType.CLASS],
  ["try", TokenType.TRY],
  ["catch", TokenType.CATCH],
  ["throw", TokenType.THROW],
  ["this", TokenType.THIS],
  ["super", TokenType.SUPER],
  ["true", TokenType.TRUE],
  ["false", TokenType.FALSE],
  ["null", TokenType.NULL],
]);

export function describeToken(token: Token): string {
  switch (token.kind) {
    case TokenType.EOF:
      return "end of input";
    case TokenType.IDENTIFIER:
      return `identifier '${token.lexeme}'`;
    case TokenType.NUMBER:
      return `number ${token.lexeme}`;
    case TokenType.STRING:
      return `string ${token.lexeme}`;
    default:
      return `'${token.lexeme}'`;
  }
}
