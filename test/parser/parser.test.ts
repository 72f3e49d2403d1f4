import { describe, expect, test } from "vitest";
import * as AST from "../../src/ast";
import { LexError, ParseError } from "../../src/errors";
import { parse } from "../../src/parser/index";
import { MAX_NESTING_DEPTH } from "../../src/parser/parser";

function firstExpression(source: string): AST.Expression {
  const statement = parse(source).body[0];
  if (!statement || statement.type !== "ExpressionStatement") {
    throw new Error("expected an expression statement");
  }
  return statement.expression;
}

function parseError(source: string): ParseError {
  try {
    parse(source);
  } catch (err) {
    if (err instanceof ParseError) return err;
    throw err;
  }
  throw new Error(`expected ${JSON.stringify(source)} to fail`);
}

describe("parser - expressions", () => {
  test("multiplication binds tighter than addition", () => {
    expect(firstExpression("1 + 2 * 3;")).toMatchObject({
      type: "BinaryExpression",
      operator: "+",
      left: { type: "NumberLiteral", value: 1 },
      right: { type: "BinaryExpression", operator: "*" },
    });
  });

  test("equal precedence associates left", () => {
    expect(firstExpression("8 - 4 - 2;")).toMatchObject({
      operator: "-",
      left: { type: "BinaryExpression", operator: "-" },
      right: { type: "NumberLiteral", value: 2 },
    });
  });

  test("&& binds tighter than ||", () => {
    expect(firstExpression("a || b && c;")).toMatchObject({
      type: "LogicalExpression",
      operator: "||",
      right: { type: "LogicalExpression", operator: "&&" },
    });
  });

  test("assignment is right associative", () => {
    expect(firstExpression("a = b = 1;")).toMatchObject({
      type: "AssignmentExpression",
      target: { name: "a" },
      value: { type: "AssignmentExpression", target: { name: "b" }, value: { value: 1 } },
    });
  });

  test("member and index targets become Set nodes", () => {
    expect(firstExpression("p.x = 3;")).toMatchObject({
      type: "MemberAssignmentExpression",
      object: { type: "Identifier", name: "p" },
      member: { name: "x" },
    });
    expect(firstExpression("xs[0] = 3;")).toMatchObject({ type: "IndexAssignmentExpression" });
  });

  test("calls, member access and indexing chain left to right", () => {
    expect(firstExpression("a.b(1)[2];")).toMatchObject({
      type: "IndexExpression",
      object: {
        type: "FunctionCall",
        callee: { type: "MemberAccessExpression", member: { name: "b" } },
        arguments: [{ type: "NumberLiteral", value: 1 }],
      },
      index: { value: 2 },
    });
  });

  test("rejects invalid assignment targets", () => {
    const err = parseError("1 = 2;");
    expect(err.message).toBe("Invalid assignment target");
    expect(err.column).toBe(3);
  });
});

describe("parser - statements", () => {
  test("var initialiser is optional, const initialiser is not", () => {
    expect(parse("var y;").body[0]).toMatchObject({ type: "VarDeclaration", id: { name: "y" }, initializer: null });
    expect(parseError("const z;").message).toBe("Expected '=' after constant name 'z' but found ';'");
  });

  test("if with elif and else", () => {
    expect(parse("if (a) { } elif (b) { } elif (c) { } else { }").body[0]).toMatchObject({
      type: "IfStatement",
      elifClauses: [{ condition: { name: "b" } }, { condition: { name: "c" } }],
      elseBody: { type: "BlockStatement", body: [] },
    });
  });

  test("for clauses may all be empty", () => {
    expect(parse("for (;;) { break; }").body[0]).toMatchObject({
      type: "ForLoop",
      initializer: null,
      condition: null,
      update: null,
    });
  });

  test("class with superclass and methods", () => {
    expect(parse("class Dog < Animal { func speak() { return 1; } }").body[0]).toMatchObject({
      type: "ClassDefinition",
      id: { name: "Dog" },
      superclass: { name: "Animal" },
      methods: [{ type: "FunctionDefinition", id: { name: "speak" }, params: [] }],
    });
  });

  test("semicolon may be omitted before '}' and at end of input", () => {
    expect(parse("{ var a = 1 }\nprint(a)").body).toHaveLength(2);
  });

  test("missing semicolon between statements is reported", () => {
    const err = parseError("var a = 1 var b = 2;");
    expect(err.message).toBe("Expected ';' but found 'var'");
    expect(err.expected).toBe("';'");
    expect(err.found).toBe("'var'");
    expect([err.line, err.column]).toEqual([1, 11]);
  });

  test("unclosed block fails at end of input", () => {
    const err = parseError("func f() {");
    expect(err.found).toBe("end of input");
  });

  test("duplicate parameters are rejected", () => {
    expect(parseError("func f(a, a) { }").message).toBe("Duplicate parameter 'a'");
  });

  test("lexical errors surface while parsing", () => {
    expect(() => parse("var x = #;")).toThrow(LexError);
  });
});

describe("parser - context checks", () => {
  test("break and continue need an enclosing loop", () => {
    expect(parseError("break;").message).toBe("'break' outside of a loop");
    expect(parseError("if (true) { continue; }").message).toBe("'continue' outside of a loop");
    expect(parseError("while (true) { func f() { break; } }").message).toBe("'break' outside of a loop");
  });

  test("return needs an enclosing function", () => {
    expect(parseError("return 1;").message).toBe("'return' outside of a function");
  });

  test("this and super need a method", () => {
    expect(parseError("print(this);").message).toBe("'this' outside of a class method");
    expect(parseError("class A { func f() { return super.f(); } }").message).toBe(
      "'super' used in a class with no superclass",
    );
  });

  test("a class cannot inherit from itself", () => {
    expect(parseError("class A < A { }").message).toBe("A class can't inherit from itself ('A')");
  });
});

describe("parser - nesting limit", () => {
  test("deeply nested groups, operators and blocks fail with a ParseError", () => {
    const groups = parseError("print(" + "(".repeat(3000) + "1" + ")".repeat(3000) + ");");
    expect(groups.message).toBe(`Nesting exceeds ${MAX_NESTING_DEPTH} levels`);
    expect(groups.line).toBe(1);
    expect(parseError("-".repeat(3000) + "1;").message).toBe(`Nesting exceeds ${MAX_NESTING_DEPTH} levels`);
    expect(parseError("{".repeat(3000) + "}".repeat(3000)).message).toBe(`Nesting exceeds ${MAX_NESTING_DEPTH} levels`);
  });

  test("moderate nesting parses", () => {
    expect(firstExpression("(".repeat(50) + "1" + ")".repeat(50) + ";")).toMatchObject({ type: "NumberLiteral", value: 1 });
    expect(parse("{".repeat(50) + "}".repeat(50)).body).toHaveLength(1);
  });
});

describe("parser - spans", () => {
  test("nodes record the lines and columns of their first and last tokens", () => {
    const program = parse("var x = 1;\nprint(x);");
    expect(program.body[1]?.span).toEqual({ start: { line: 2, column: 1 }, end: { line: 2, column: 9 } });
    expect(program.body[0]?.span).toEqual({ start: { line: 1, column: 1 }, end: { line: 1, column: 10 } });
  });

  test("multi-line constructs span their lines", () => {
    const program = parse("while (x) {\n  x = x - 1;\n}");
    expect(program.body[0]?.span).toEqual({ start: { line: 1, column: 1 }, end: { line: 3, column: 2 } });
  });
});
