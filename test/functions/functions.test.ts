import { describe, expect, test } from "vitest";
import { MAX_CALL_DEPTH_LIMIT } from "../../src/interpreter/index";
import { runFailing, runSource } from "../support/run";

describe("functions", () => {
  test("closures keep independent state per factory call", () => {
    const source = `
      func makeCounter() {
        var count = 0;
        func inc() {
          count = count + 1;
          return count;
        }
        return inc;
      }
      var c1 = makeCounter();
      var c2 = makeCounter();
      print(c1(), c1(), c2());
    `;
    expect(runSource(source).output).toEqual(["1 2 1"]);
  });

  test("closures from one call share the captured scope", () => {
    const source = `
      func makeCounter() {
        var count = 0;
        func increment() { count = count + 1; }
        func read() { return count; }
        return [increment, read];
      }
      var counter = makeCounter();
      var increment = counter[0];
      var read = counter[1];
      print(read());
      increment();
      increment();
      print(read());
    `;
    expect(runSource(source).output).toEqual(["0", "2"]);
  });

  test("closures see later assignments to captured variables", () => {
    const source = "var x = 1; func show() { return x; } x = 2; print(show());";
    expect(runSource(source).output).toEqual(["2"]);
  });

  test("recursion", () => {
    const source = `
      func fib(n) {
        if (n < 2) { return n; }
        return fib(n - 1) + fib(n - 2);
      }
      print(fib(15));
    `;
    expect(runSource(source).output).toEqual(["610"]);
  });

  test("a function without return yields null", () => {
    expect(runSource("func noop() { } print(noop());").output).toEqual(["null"]);
  });

  test("functions are values with readable descriptions", () => {
    const source = "func twice(f, x) { return f(f(x)); } func inc(n) { return n + 1; } print(twice(inc, 5), twice, print);";
    expect(runSource(source).output).toEqual(["7 <func twice> <native print>"]);
  });

  test("parameters do not leak out of the call", () => {
    expect(runFailing("func f(p) { return p; } f(1); p;").error.message).toBe("Undefined variable 'p'");
  });

  test("argument count must match", () => {
    expect(runFailing("func f(a, b) { return a; } f(1);").error).toMatchObject({
      kind: "ArityError",
      message: "Expected 2 arguments but got 1 calling 'f'",
    });
    expect(runFailing("len();").error.message).toBe("Expected 1 argument but got 0 calling 'len'");
  });

  test("calling a non-callable value", () => {
    expect(runFailing("var n = 3; n();").error).toMatchObject({
      kind: "NotCallableError",
      message: "Can only call functions and classes (got number)",
    });
  });

  test("the call depth limit raises StackOverflowError", () => {
    const { error } = runFailing("func r(n) { return r(n + 1); }\nr(0);", { maxCallDepth: 50 });
    expect(error.kind).toBe("StackOverflowError");
    expect(error.message).toBe("Maximum call depth of 50 exceeded");
  });

  test("deep recursion under the default limit is reported, not crashed", () => {
    const { error } = runFailing("func r(n) { return r(n + 1); } r(0);");
    expect(error.kind).toBe("StackOverflowError");
  });

  test("an oversized depth limit is clamped and unbounded recursion is still reported", () => {
    const { result, session } = runSource("func r(n) { return r(n + 1); } r(0);", { maxCallDepth: 1_000_000 });
    expect(session.interpreter.maxCallDepth).toBe(MAX_CALL_DEPTH_LIMIT);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe("StackOverflowError");
    expect(session.run("print(1 + 1);").ok).toBe(true);
  });

  test("stack overflow is catchable and resets the depth", () => {
    const source = `
      func r(n) { return r(n + 1); }
      try { r(0); } catch (e) { print("overflow: " + e); }
      func ok(n) { if (n == 0) { return "done"; } return ok(n - 1); }
      print(ok(20));
    `;
    const { output, session } = runSource(source, { maxCallDepth: 40 });
    expect(output).toEqual(["overflow: Maximum call depth of 40 exceeded", "done"]);
    expect(session.interpreter.callDepth).toBe(0);
  });
});
