import { describe, expect, test } from "vitest";
import { BufferedIO } from "../../src/builtins/host_io";
import { isIncompleteInput, Session } from "../../src/session";

describe("session", () => {
  test("definitions persist between lines", () => {
    const session = new Session({ io: new BufferedIO() });
    expect(session.evaluateLine("var x = 10").ok).toBe(true);
    expect(session.evaluateLine("func double(n) { return n * 2; }").ok).toBe(true);
    expect(session.evaluateLine("double(x)")).toEqual({ ok: true, value: { kind: "number", value: 20 } });
    expect(session.globals.hasInCurrentScope("double")).toBe(true);
  });

  test("an error does not end the session", () => {
    const session = new Session({ io: new BufferedIO() });
    session.evaluateLine("var x = 1;");
    const failed = session.evaluateLine("undefinedName");
    expect(failed.ok).toBe(false);
    expect(session.evaluateLine("x + 1")).toEqual({ ok: true, value: { kind: "number", value: 2 } });
  });

  test("overly nested input is reported as a parse error", () => {
    const session = new Session({ io: new BufferedIO() });
    const result = session.run("print(" + "(".repeat(3000) + "1" + ")".repeat(3000) + ");");
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toMatchObject({ phase: "parser", kind: "ParseError", message: "Nesting exceeds 200 levels" });
  });

  test("statements yield null and expressions their value", () => {
    const session = new Session({ io: new BufferedIO() });
    const declared = session.evaluateLine("var s = \"hi\";");
    expect(declared).toEqual({ ok: true, value: { kind: "null", value: null } });
    const read = session.evaluateLine("s + \"!\"");
    if (!read.ok) throw new Error("expected success");
    expect(session.display(read.value)).toBe("hi!");
  });

  test("output from several runs accumulates on one host", () => {
    const io = new BufferedIO();
    const session = new Session({ io });
    session.run("print(1);");
    session.run("print(2);");
    expect(io.outputLines()).toEqual(["1", "2"]);
  });

  test("detects input that stops early", () => {
    expect(isIncompleteInput("func f() {")).toBe(true);
    expect(isIncompleteInput('print("abc')).toBe(true);
    expect(isIncompleteInput("/* open comment")).toBe(true);
    expect(isIncompleteInput("print(1)")).toBe(false);
    expect(isIncompleteInput("var = 1")).toBe(false);
  });
});
