import * as AST from "../ast";
import { ParseError } from "../errors";
import { describeToken, TokenType, type Token } from "../lexer/tokens";

type ClassContext = { hasSuperclass: boolean };

/** Combined depth of nested declarations and expressions the parser accepts. */
export const MAX_NESTING_DEPTH = 200;

/**
 * Recursive-descent parser over a lazily pulled token stream. Parsing is
 * fail-fast: the first malformed construct raises a ParseError.
 */
export class Parser {
  private readonly source: Iterator<Token>;
  private lookahead: Token | null = null;
  private last: Token | null = null;
  private nesting = 0;
  private functionDepth = 0;
  private loopDepth = 0;
  private readonly classStack: ClassContext[] = [];

  constructor(tokens: Iterable<Token>) {
    this.source = tokens[Symbol.iterator]();
  }

  // program -> declaration* EOF ;
  parse(): AST.Program {
    const start = this.peek();
    const body: AST.Statement[] = [];
    while (!this.isAtEnd()) {
      body.push(this.declaration());
    }
    const program = AST.program(body);
    program.span = {
      start: { line: start.line, column: start.column },
      end: { line: this.peek().line, column: this.peek().column },
    };
    return program;
  }

  // --- Declarations ---

  // declaration -> classDecl | funcDecl | varDecl | constDecl | statement ;
  private declaration(): AST.Statement {
    return this.nested(() => this.declarationInner());
  }

  private declarationInner(): AST.Statement {
    if (this.check(TokenType.CLASS)) return this.classDeclaration();
    if (this.check(TokenType.FUNC)) return this.functionDeclaration("function");
    if (this.check(TokenType.VAR)) return this.terminated(this.varDeclaration());
    if (this.check(TokenType.CONST)) return this.terminated(this.constDeclaration());
    return this.statement();
  }

  // classDecl -> "class" IDENTIFIER ( "<" IDENTIFIER )? "{" funcDecl* "}" ;
  private classDeclaration(): AST.ClassDefinition {
    const keyword = this.advance();
    const name = this.identifierNode("class name");
    let superclass: AST.Identifier | null = null;
    if (this.match(TokenType.LESS)) {
      superclass = this.identifierNode("superclass name");
      if (superclass.name === name.name) {
        throw this.errorAt(this.previous(), "a different superclass", `A class can't inherit from itself ('${name.name}')`);
      }
    }
    this.consume(TokenType.LEFT_BRACE, "'{' before class body");
    const methods: AST.FunctionDefinition[] = [];
    this.classStack.push({ hasSuperclass: superclass !== null });
    try {
      while (!this.check(TokenType.RIGHT_BRACE) && !this.isAtEnd()) {
        if (!this.check(TokenType.FUNC)) {
          throw this.errorAt(this.peek(), "method declaration");
        }
        methods.push(this.functionDeclaration("method"));
      }
    } finally {
      this.classStack.pop();
    }
    this.consume(TokenType.RIGHT_BRACE, "'}' after class body");
    return this.finish(AST.classDefinition(name, methods, superclass), keyword);
  }

  // funcDecl -> "func" IDENTIFIER "(" parameters? ")" block ;
  private functionDeclaration(kind: "function" | "method"): AST.FunctionDefinition {
    const keyword = this.advance();
    const name = this.identifierNode(`${kind} name`);
    this.consume(TokenType.LEFT_PAREN, `'(' after ${kind} name`);
    const params: AST.Identifier[] = [];
    if (!this.check(TokenType.RIGHT_PAREN)) {
      do {
        const param = this.identifierNode("parameter name");
        if (params.some(existing => existing.name === param.name)) {
          throw this.errorAt(this.previous(), "a unique parameter name", `Duplicate parameter '${param.name}'`);
        }
        params.push(param);
      } while (this.match(TokenType.COMMA));
    }
    this.consume(TokenType.RIGHT_PAREN, "')' after parameters");

    const savedLoopDepth = this.loopDepth;
    this.functionDepth++;
    this.loopDepth = 0;
    try {
      const body = this.block(`${kind} body`);
      return this.finish(AST.functionDefinition(name, params, body), keyword);
    } finally {
      this.functionDepth--;
      this.loopDepth = savedLoopDepth;
    }
  }

  // varDecl -> "var" IDENTIFIER ( "=" expression )? ;
  private varDeclaration(): AST.VarDeclaration {
    const keyword = this.advance();
    const name = this.identifierNode("variable name");
    const initializer = this.match(TokenType.EQUAL) ? this.expression() : null;
    return this.finish(AST.varDeclaration(name, initializer), keyword);
  }

  // constDecl -> "const" IDENTIFIER "=" expression ;
  private constDeclaration(): AST.ConstDeclaration {
    const keyword = this.advance();
    const name = this.identifierNode("constant name");
    this.consume(TokenType.EQUAL, `'=' after constant name '${name.name}'`);
    const initializer = this.expression();
    return this.finish(AST.constDeclaration(name, initializer), keyword);
  }

  // --- Statements ---

  // statement -> ifStmt | whileStmt | forStmt | breakStmt | continueStmt
  //            | returnStmt | tryStmt | throwStmt | block | exprStmt ;
  private statement(): AST.Statement {
    switch (this.peek().kind) {
      case TokenType.IF: return this.ifStatement();
      case TokenType.WHILE: return this.whileStatement();
      case TokenType.FOR: return this.forStatement();
      case TokenType.BREAK: return this.breakStatement();
      case TokenType.CONTINUE: return this.continueStatement();
      case TokenType.RETURN: return this.returnStatement();
      case TokenType.TRY: return this.tryStatement();
      case TokenType.THROW: return this.throwStatement();
      case TokenType.LEFT_BRACE: return this.block("block");
      default: return this.terminated(this.expressionStatement());
    }
  }

  // ifStmt -> "if" "(" expression ")" block ( "elif" "(" expression ")" block )* ( "else" block )? ;
  private ifStatement(): AST.IfStatement {
    const keyword = this.advance();
    const condition = this.parenthesized("if");
    const body = this.block("if body");
    const elifClauses: AST.ElifClause[] = [];
    while (this.check(TokenType.ELIF)) {
      const elifKeyword = this.advance();
      const elifCondition = this.parenthesized("elif");
      const elifBody = this.block("elif body");
      elifClauses.push(this.finish(AST.elifClause(elifCondition, elifBody), elifKeyword));
    }
    const elseBody = this.match(TokenType.ELSE) ? this.block("else body") : null;
    return this.finish(AST.ifStatement(condition, body, elifClauses, elseBody), keyword);
  }

  // whileStmt -> "while" "(" expression ")" block ;
  private whileStatement(): AST.WhileLoop {
    const keyword = this.advance();
    const condition = this.parenthesized("while");
    const body = this.loopBody("while body");
    return this.finish(AST.whileLoop(condition, body), keyword);
  }

  // forStmt -> "for" "(" ( varDecl | constDecl | expression )? ";" expression? ";" expression? ")" block ;
  private forStatement(): AST.ForLoop {
    const keyword = this.advance();
    this.consume(TokenType.LEFT_PAREN, "'(' after 'for'");
    let initializer: AST.ForLoop["initializer"] = null;
    if (this.check(TokenType.VAR)) {
      initializer = this.varDeclaration();
    } else if (this.check(TokenType.CONST)) {
      initializer = this.constDeclaration();
    } else if (!this.check(TokenType.SEMICOLON)) {
      initializer = this.expressionStatement();
    }
    this.consume(TokenType.SEMICOLON, "';' after for-loop initializer");
    const condition = this.check(TokenType.SEMICOLON) ? null : this.expression();
    this.consume(TokenType.SEMICOLON, "';' after for-loop condition");
    const update = this.check(TokenType.RIGHT_PAREN) ? null : this.expression();
    this.consume(TokenType.RIGHT_PAREN, "')' after for-loop clauses");
    const body = this.loopBody("for body");
    return this.finish(AST.forLoop(initializer, condition, update, body), keyword);
  }

  private breakStatement(): AST.BreakStatement {
    const keyword = this.advance();
    if (this.loopDepth === 0) {
      throw this.errorAt(keyword, "'break' inside a loop", "'break' outside of a loop");
    }
    return this.terminated(this.finish(AST.breakStatement(), keyword));
  }

  private continueStatement(): AST.ContinueStatement {
    const keyword = this.advance();
    if (this.loopDepth === 0) {
      throw this.errorAt(keyword, "'continue' inside a loop", "'continue' outside of a loop");
    }
    return this.terminated(this.finish(AST.continueStatement(), keyword));
  }

  // returnStmt -> "return" expression? ";" ;
  private returnStatement(): AST.ReturnStatement {
    const keyword = this.advance();
    if (this.functionDepth === 0) {
      throw this.errorAt(keyword, "'return' inside a function", "'return' outside of a function");
    }
    const argument = this.atTerminator() ? null : this.expression();
    return this.terminated(this.finish(AST.returnStatement(argument), keyword));
  }

  // tryStmt -> "try" block "catch" "(" IDENTIFIER ")" block ;
  private tryStatement(): AST.TryStatement {
    const keyword = this.advance();
    const tryBody = this.block("try body");
    this.consume(TokenType.CATCH, "'catch' after try block");
    this.consume(TokenType.LEFT_PAREN, "'(' after 'catch'");
    const param = this.identifierNode("catch variable name");
    this.consume(TokenType.RIGHT_PAREN, "')' after catch variable");
    const catchBody = this.block("catch body");
    return this.finish(AST.tryStatement(tryBody, param, catchBody), keyword);
  }

  // throwStmt -> "throw" expression ";" ;
  private throwStatement(): AST.ThrowStatement {
    const keyword = this.advance();
    const expression = this.expression();
    return this.terminated(this.finish(AST.throwStatement(expression), keyword));
  }

  // block -> "{" declaration* "}" ;
  private block(what: string): AST.BlockStatement {
    const open = this.consume(TokenType.LEFT_BRACE, `'{' before ${what}`);
    const body: AST.Statement[] = [];
    while (!this.check(TokenType.RIGHT_BRACE) && !this.isAtEnd()) {
      body.push(this.declaration());
    }
    this.consume(TokenType.RIGHT_BRACE, `'}' after ${what}`);
    return this.finish(AST.blockStatement(body), open);
  }

  private loopBody(what: string): AST.BlockStatement {
    this.loopDepth++;
    try {
      return this.block(what);
    } finally {
      this.loopDepth--;
    }
  }

  private expressionStatement(): AST.ExpressionStatement {
    const start = this.peek();
    const expression = this.expression();
    return this.finish(AST.expressionStatement(expression), start);
  }

  // --- Expressions ---

  private expression(): AST.Expression {
    return this.nested(() => this.assignment());
  }

  // assignment -> ( call "." IDENTIFIER | call "[" expression "]" | IDENTIFIER ) "=" assignment | logicOr ;
  private assignment(): AST.Expression {
    const start = this.peek();
    const target = this.logicOr();
    if (!this.check(TokenType.EQUAL)) return target;

    const equals = this.advance();
    const value = this.nested(() => this.assignment());
    switch (target.type) {
      case "Identifier":
        return this.finish(AST.assignmentExpression(target, value), start);
      case "MemberAccessExpression":
        return this.finish(AST.memberAssignmentExpression(target.object, target.member, value), start);
      case "IndexExpression":
        return this.finish(AST.indexAssignmentExpression(target.object, target.index, value), start);
      default:
        throw this.errorAt(equals, "assignable target", "Invalid assignment target");
    }
  }

  // logicOr -> logicAnd ( "||" logicAnd )* ;
  private logicOr(): AST.Expression {
    const start = this.peek();
    let expr = this.logicAnd();
    while (this.match(TokenType.PIPE_PIPE)) {
      const right = this.logicAnd();
      expr = this.finish(AST.logicalExpression("||", expr, right), start);
    }
    return expr;
  }

  // logicAnd -> equality ( "&&" equality )* ;
  private logicAnd(): AST.Expression {
    const start = this.peek();
    let expr = this.equality();
    while (this.match(TokenType.AND_AND)) {
      const right = this.equality();
      expr = this.finish(AST.logicalExpression("&&", expr, right), start);
    }
    return expr;
  }

  // equality -> comparison ( ( "==" | "!=" ) comparison )* ;
  private equality(): AST.Expression {
    return this.binaryLevel(() => this.comparison(), [TokenType.EQUAL_EQUAL, TokenType.BANG_EQUAL]);
  }

  // comparison -> term ( ( "<" | "<=" | ">" | ">=" ) term )* ;
  private comparison(): AST.Expression {
    return this.binaryLevel(() => this.term(), [TokenType.LESS, TokenType.LESS_EQUAL, TokenType.GREATER, TokenType.GREATER_EQUAL]);
  }

  // term -> factor ( ( "+" | "-" ) factor )* ;
  private term(): AST.Expression {
    return this.binaryLevel(() => this.factor(), [TokenType.PLUS, TokenType.MINUS]);
  }

  // factor -> unary ( ( "*" | "/" | "%" ) unary )* ;
  private factor(): AST.Expression {
    return this.binaryLevel(() => this.unary(), [TokenType.STAR, TokenType.SLASH, TokenType.PERCENT]);
  }

  private binaryLevel(operand: () => AST.Expression, operators: TokenType[]): AST.Expression {
    const start = this.peek();
    let expr = operand();
    while (this.match(...operators)) {
      const operator = toBinaryOperator(this.previous().kind);
      const right = operand();
      expr = this.finish(AST.binaryExpression(operator, expr, right), start);
    }
    return expr;
  }

  // unary -> ( "!" | "-" ) unary | call ;
  private unary(): AST.Expression {
    if (this.check(TokenType.BANG) || this.check(TokenType.MINUS)) {
      const operator = this.advance();
      const operand = this.nested(() => this.unary());
      return this.finish(AST.unaryExpression(operator.kind === TokenType.BANG ? "!" : "-", operand), operator);
    }
    return this.call();
  }

  // call -> primary ( "(" arguments? ")" | "." IDENTIFIER | "[" expression "]" )* ;
  private call(): AST.Expression {
    const start = this.peek();
    let expr = this.primary();
    while (true) {
      if (this.match(TokenType.LEFT_PAREN)) {
        const args: AST.Expression[] = [];
        if (!this.check(TokenType.RIGHT_PAREN)) {
          do {
            args.push(this.expression());
          } while (this.match(TokenType.COMMA));
        }
        this.consume(TokenType.RIGHT_PAREN, "')' after arguments");
        expr = this.finish(AST.functionCall(expr, args), start);
      } else if (this.match(TokenType.DOT)) {
        const member = this.identifierNode("property name after '.'");
        expr = this.finish(AST.memberAccessExpression(expr, member), start);
      } else if (this.match(TokenType.LEFT_BRACKET)) {
        const index = this.expression();
        this.consume(TokenType.RIGHT_BRACKET, "']' after index");
        expr = this.finish(AST.indexExpression(expr, index), start);
      } else {
        return expr;
      }
    }
  }

  // primary -> NUMBER | STRING | "true" | "false" | "null" | "this" | "super" "." IDENTIFIER
  //          | IDENTIFIER | "(" expression ")" | "[" ( expression ( "," expression )* )? "]" ;
  private primary(): AST.Expression {
    const token = this.peek();
    switch (token.kind) {
      case TokenType.NUMBER:
        this.advance();
        return this.finish(AST.numberLiteral(Number(token.literal)), token);
      case TokenType.STRING:
        this.advance();
        return this.finish(AST.stringLiteral(String(token.literal)), token);
      case TokenType.TRUE:
      case TokenType.FALSE:
        this.advance();
        return this.finish(AST.booleanLiteral(token.kind === TokenType.TRUE), token);
      case TokenType.NULL:
        this.advance();
        return this.finish(AST.nullLiteral(), token);
      case TokenType.THIS:
        this.advance();
        if (this.classStack.length === 0) {
          throw this.errorAt(token, "'this' inside a method", "'this' outside of a class method");
        }
        return this.finish(AST.thisExpression(), token);
      case TokenType.SUPER: {
        this.advance();
        const context = this.classStack[this.classStack.length - 1];
        if (!context) {
          throw this.errorAt(token, "'super' inside a method", "'super' outside of a class method");
        }
        if (!context.hasSuperclass) {
          throw this.errorAt(token, "'super' in a subclass", "'super' used in a class with no superclass");
        }
        this.consume(TokenType.DOT, "'.' after 'super'");
        const method = this.identifierNode("superclass method name");
        return this.finish(AST.superExpression(method), token);
      }
      case TokenType.IDENTIFIER:
        this.advance();
        return this.finish(AST.identifier(token.lexeme), token);
      case TokenType.LEFT_PAREN: {
        this.advance();
        const expr = this.expression();
        this.consume(TokenType.RIGHT_PAREN, "')' after expression");
        return expr;
      }
      case TokenType.LEFT_BRACKET: {
        this.advance();
        const elements: AST.Expression[] = [];
        if (!this.check(TokenType.RIGHT_BRACKET)) {
          do {
            elements.push(this.expression());
          } while (this.match(TokenType.COMMA));
        }
        this.consume(TokenType.RIGHT_BRACKET, "']' after array elements");
        return this.finish(AST.arrayLiteral(elements), token);
      }
      default:
        throw this.errorAt(token, "expression");
    }
  }

  // --- Token plumbing ---

  private parenthesized(keyword: string): AST.Expression {
    this.consume(TokenType.LEFT_PAREN, `'(' after '${keyword}'`);
    const condition = this.expression();
    this.consume(TokenType.RIGHT_PAREN, `')' after ${keyword} condition`);
    return condition;
  }

  private identifierNode(what: string): AST.Identifier {
    const token = this.consume(TokenType.IDENTIFIER, what);
    return this.finish(AST.identifier(token.lexeme), token);
  }

  /** Simple statements end with ';', which may be left out before '}' or end of input. */
  private terminated<T extends AST.Statement>(node: T): T {
    if (this.match(TokenType.SEMICOLON)) return node;
    if (this.check(TokenType.RIGHT_BRACE) || this.isAtEnd()) return node;
    throw this.errorAt(this.peek(), "';'");
  }

  private atTerminator(): boolean {
    return this.check(TokenType.SEMICOLON) || this.check(TokenType.RIGHT_BRACE) || this.isAtEnd();
  }

  private finish<T extends AST.AstNode>(node: T, startToken: Token): T {
    const endToken = this.last ?? startToken;
    node.span = {
      start: { line: startToken.line, column: startToken.column },
      end: { line: endToken.line, column: endToken.column + endToken.lexeme.length },
    };
    return node;
  }

  private peek(): Token {
    if (!this.lookahead) {
      const next = this.source.next();
      if (next.done) {
        const line = this.last?.line ?? 1;
        const column = this.last ? this.last.column + this.last.lexeme.length : 1;
        this.lookahead = { kind: TokenType.EOF, lexeme: "", line, column };
      } else {
        this.lookahead = next.value;
      }
    }
    return this.lookahead;
  }

  private previous(): Token {
    return this.last ?? this.peek();
  }

  private advance(): Token {
    const token = this.peek();
    if (token.kind !== TokenType.EOF) {
      this.lookahead = null;
      this.last = token;
    }
    return token;
  }

  private isAtEnd(): boolean {
    return this.peek().kind === TokenType.EOF;
  }

  private check(kind: TokenType): boolean {
    return this.peek().kind === kind;
  }

  private match(...kinds: TokenType[]): boolean {
    for (const kind of kinds) {
      if (this.check(kind)) {
        this.advance();
        return true;
      }
    }
    return false;
  }

  private nested<T>(parse: () => T): T {
    if (this.nesting >= MAX_NESTING_DEPTH) {
      throw this.errorAt(this.peek(), "shallower nesting", `Nesting exceeds ${MAX_NESTING_DEPTH} levels`);
    }
    this.nesting++;
    try {
      return parse();
    } finally {
      this.nesting--;
    }
  }

  private consume(kind: TokenType, expected: string): Token {
    if (this.check(kind)) return this.advance();
    throw this.errorAt(this.peek(), expected);
  }

  private errorAt(token: Token, expected: string, message?: string): ParseError {
    const found = describeToken(token);
    return new ParseError(expected, found, token.line, token.column, message ?? `Expected ${expected} but found ${found}`);
  }
}

function toBinaryOperator(kind: TokenType): AST.BinaryOperator {
  switch (kind) {
    case TokenType.PLUS: return "+";
    case TokenType.MINUS: return "-";
    case TokenType.STAR: return "*";
    case TokenType.SLASH: return "/";
    case TokenType.PERCENT: return "%";
    case TokenType.EQUAL_EQUAL: return "==";
    case TokenType.BANG_EQUAL: return "!=";
    case TokenType.LESS: return "<";
    case TokenType.LESS_EQUAL: return "<=";
    case TokenType.GREATER: return ">";
    case TokenType.GREATER_EQUAL: return ">=";
    default:
      throw new Error(`Token ${kind} is not a binary operator`);
  }
}
