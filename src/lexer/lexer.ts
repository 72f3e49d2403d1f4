import { LexError } from "../errors";
import { KEYWORDS, TokenType, type Token } from "./tokens";

export class Lexer {
  private readonly source: string;
  private start = 0;
  private current = 0;
  private line = 1;
  private lineStart = 0;
  private startLine = 1;
  private startColumn = 1;

  constructor(source: string) {
    this.source = source;
  }

  /**
   * Lazily scans the source. The sequence always ends with a single EOF
   * token; scanning again requires a new Lexer over the same source.
   */
  *tokens(): Generator<Token, void, undefined> {
    while (true) {
      this.skipTrivia();
      this.start = this.current;
      this.startLine = this.line;
      this.startColumn = this.current - this.lineStart + 1;
      if (this.isAtEnd()) {
        yield this.makeToken(TokenType.EOF, "");
        return;
      }
      yield this.scanToken();
    }
  }

  private scanToken(): Token {
    const c = this.advance();
    switch (c) {
      case "(": return this.addToken(TokenType.LEFT_PAREN);
      case ")": return this.addToken(TokenType.RIGHT_PAREN);
      case "{": return this.addToken(TokenType.LEFT_BRACE);
      case "}": return this.addToken(TokenType.RIGHT_BRACE);
      case "[": return this.addToken(TokenType.LEFT_BRACKET);
      case "]": return this.addToken(TokenType.RIGHT_BRACKET);
      case ",": return this.addToken(TokenType.COMMA);
      case ".": return this.addToken(TokenType.DOT);
      case ";": return this.addToken(TokenType.SEMICOLON);
      case "-": return this.addToken(TokenType.MINUS);
      case "+": return this.addToken(TokenType.PLUS);
      case "*": return this.addToken(TokenType.STAR);
      case "/": return this.addToken(TokenType.SLASH);
      case "%": return this.addToken(TokenType.PERCENT);
      case "!": return this.addToken(this.match("=") ? TokenType.BANG_EQUAL : TokenType.BANG);
      case "=": return this.addToken(this.match("=") ? TokenType.EQUAL_EQUAL : TokenType.EQUAL);
      case "<": return this.addToken(this.match("=") ? TokenType.LESS_EQUAL : TokenType.LESS);
      case ">": return this.addToken(this.match("=") ? TokenType.GREATER_EQUAL : TokenType.GREATER);
      case "&":
        if (this.match("&")) return this.addToken(TokenType.AND_AND);
        break;
      case "|":
        if (this.match("|")) return this.addToken(TokenType.PIPE_PIPE);
        break;
      case "\"":
        return this.string();
      default:
        if (isDigit(c)) return this.number();
        if (isAlpha(c)) return this.identifier();
        break;
    }
    throw new LexError(`Unexpected character '${c}'`, c, this.startLine, this.startColumn);
  }

  private skipTrivia(): void {
    while (!this.isAtEnd()) {
      const c = this.peek();
      if (c === " " || c === "\t" || c === "\r") {
        this.current++;
      } else if (c === "\n") {
        this.newline();
      } else if (c === "/" && this.peekNext() === "/") {
        while (!this.isAtEnd() && this.peek() !== "\n") this.current++;
      } else if (c === "/" && this.peekNext() === "*") {
        this.blockComment();
      } else {
        return;
      }
    }
  }

  private blockComment(): void {
    const line = this.line;
    const column = this.current - this.lineStart + 1;
    this.current += 2;
    while (!this.isAtEnd()) {
      if (this.peek() === "*" && this.peekNext() === "/") {
        this.current += 2;
        return;
      }
      if (this.peek() === "\n") this.newline();
      else this.current++;
    }
    throw new LexError("Unterminated block comment", "/", line, column);
  }

  private string(): Token {
    while (!this.isAtEnd() && this.peek() !== "\"") {
      if (this.peek() === "\n") this.newline();
      else this.current++;
    }
    if (this.isAtEnd()) {
      throw new LexError("Unterminated string literal", "\"", this.startLine, this.startColumn);
    }
    this.current++;
    const value = this.source.substring(this.start + 1, this.current - 1);
    return this.addToken(TokenType.STRING, value);
  }

  private number(): Token {
    while (isDigit(this.peek())) this.current++;
    if (this.peek() === "." && isDigit(this.peekNext())) {
      this.current++;
      while (isDigit(this.peek())) this.current++;
    }
    const text = this.source.substring(this.start, this.current);
    return this.addToken(TokenType.NUMBER, Number(text));
  }

  private identifier(): Token {
    while (isAlphaNumeric(this.peek())) this.current++;
    const text = this.source.substring(this.start, this.current);
    return this.addToken(KEYWORDS.get(text) ?? TokenType.IDENTIFIER);
  }

  private addToken(kind: TokenType, literal?: number | string): Token {
    return this.makeToken(kind, this.source.substring(this.start, this.current), literal);
  }

  private makeToken(kind: TokenType, lexeme: string, literal?: number | string): Token {
    const token: Token = literal === undefined
      ? { kind, lexeme, line: this.startLine, column: this.startColumn }
      : { kind, lexeme, literal, line: this.startLine, column: this.startColumn };
    return Object.freeze(token);
  }

  private newline(): void {
    this.current++;
    this.line++;
    this.lineStart = this.current;
  }

  private isAtEnd(): boolean {
    return this.current >= this.source.length;
  }

  private advance(): string {
    return this.source.charAt(this.current++);
  }

  private match(expected: string): boolean {
    if (this.isAtEnd() || this.source.charAt(this.current) !== expected) return false;
    this.current++;
    return true;
  }

  private peek(): string {
    return this.isAtEnd() ? "\0" : this.source.charAt(this.current);
  }

  private peekNext(): string {
    return this.current + 1 >= this.source.length ? "\0" : this.source.charAt(this.current + 1);
  }
}

function isDigit(c: string): boolean {
  return c >= "0" && c <= "9";
}

function isAlpha(c: string): boolean {
  return (c >= "a" && c <= "z") || (c >= "A" && c <= "Z") || c === "_";
}

function isAlphaNumeric(c: string): boolean {
  return isAlpha(c) || isDigit(c);
}

export function tokenize(source: string): Token[] {
  return Array.from(new Lexer(source).tokens());
}
