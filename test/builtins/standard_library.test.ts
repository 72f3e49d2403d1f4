import { describe, expect, test } from "vitest";
import { createStandardLibrary, makeNativeFunction, parseNumber } from "../../src/builtins/standard_library";
import { makeNumber } from "../../src/interpreter/values";
import { runFailing, runSource } from "../support/run";

describe("builtins - print and input", () => {
  test("print joins its arguments with spaces", () => {
    expect(runSource('print("a", 1, true, null); print();').output).toEqual(["a 1 true null", ""]);
  });

  test("input writes the prompt and reads a line", () => {
    const { io } = runSource('var name = input("Name? "); print("Hello " + name);', { input: ["Ada"] });
    expect(io.output).toBe("Name? Hello Ada\n");
  });

  test("input returns an empty string at end of input", () => {
    expect(runSource('print(len(input("")));').output).toEqual(["0"]);
  });
});

describe("builtins - conversions", () => {
  test("type names every kind of value", () => {
    const source = "func f() { } print(type(null), type(true), type(1), type(\"s\"), type([]), type(f), type(print));";
    expect(runSource(source).output).toEqual(["null boolean number string array function native_function"]);
  });

  test("str converts like print", () => {
    expect(runSource('print(str(3) + str(4), str([1, "a"]), str(null) == "null");').output).toEqual(["34 [1, a] true"]);
  });

  test("num parses decimal text and passes numbers through", () => {
    expect(runSource('print(num(" 42 "), num("-1.5e2"), num(".5"), num(7));').output).toEqual(["42 -150 0.5 7"]);
  });

  test("num rejects anything else", () => {
    expect(runFailing('num("abc");').error).toMatchObject({
      kind: "ConversionError",
      message: 'Cannot convert "abc" to a number',
    });
    expect(runFailing("num(null);").error.message).toBe("Cannot convert null to a number");
    expect(runFailing('num("");').error.kind).toBe("ConversionError");
  });

  test("conversion failures can be caught", () => {
    expect(runSource('try { num("x1"); } catch (e) { print("bad: " + e); }').output).toEqual([
      'bad: Cannot convert "x1" to a number',
    ]);
  });

  test("parseNumber follows the decimal grammar", () => {
    expect(parseNumber("1e3")).toBe(1000);
    expect(parseNumber("1.")).toBe(1);
    expect(parseNumber("+2")).toBe(2);
    expect(parseNumber("0x10")).toBeNull();
    expect(parseNumber("1 2")).toBeNull();
  });

  test("len counts characters and elements", () => {
    expect(runSource('print(len("héllo"), len([1, 2]), len(""));').output).toEqual(["5 2 0"]);
    expect(runFailing("len(5);").error.message).toBe("len() expects a string or an array (got number)");
  });
});

describe("builtins - registry", () => {
  test("the standard library registers each native once", () => {
    expect(createStandardLibrary().map(n => n.name)).toEqual(["print", "input", "type", "str", "num", "len"]);
  });

  test("a custom registry replaces the defaults", () => {
    const twice = makeNativeFunction("twice", 1, (_interp, args) => {
      const [value] = args;
      return value && value.kind === "number" ? makeNumber(value.value * 2) : makeNumber(0);
    });
    const { result } = runSource("twice(21);", { natives: [twice] });
    expect(result).toEqual({ ok: true, value: { kind: "number", value: 42 } });
    expect(runFailing("print(1);", { natives: [twice] }).error.message).toBe("Undefined variable 'print'");
  });

  test("variadic natives accept any argument count", () => {
    const count = makeNativeFunction("count", null, (_interp, args) => makeNumber(args.length));
    const { result } = runSource("count(1, 2, 3);", { natives: [count] });
    expect(result).toEqual({ ok: true, value: { kind: "number", value: 3 } });
  });

  test("natives can be shadowed by user definitions", () => {
    expect(runSource('func str(x) { return "custom"; } print(str(1));').output).toEqual(["custom"]);
  });
});
