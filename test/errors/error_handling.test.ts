import { describe, expect, test } from "vitest";
import { formatDiagnostic } from "../../src/diagnostics";
import { completionFromError } from "../../src/interpreter/statements";
import { createLogger } from "../../src/logger";
import { runFailing, runSource } from "../support/run";

describe("error handling - try/catch", () => {
  test("catches a thrown value", () => {
    expect(runSource('try { throw "boom"; } catch (e) { print("caught " + e); }').output).toEqual(["caught boom"]);
  });

  test("runtime errors are caught as their message", () => {
    expect(runSource("try { undefinedThing; } catch (e) { print(e); }").output).toEqual([
      "Undefined variable 'undefinedThing'",
    ]);
  });

  test("a throw inside a call crosses the calling expression", () => {
    const source = `
      func fail() { throw 42; }
      try {
        var x = 1 + fail();
        print("unreachable");
      } catch (e) {
        print(e + 1);
      }
    `;
    expect(runSource(source).output).toEqual(["43"]);
  });

  test("return from a catch block returns from the function", () => {
    const source = `
      func recover() {
        try { throw "x"; } catch (e) { return "recovered " + e; }
        return "not reached";
      }
      print(recover());
    `;
    expect(runSource(source).output).toEqual(["recovered x"]);
  });

  test("the catch variable is scoped to the catch block", () => {
    expect(runFailing("try { throw 1; } catch (err) { } print(err);").error.message).toBe("Undefined variable 'err'");
  });

  test("a throw from a catch block propagates", () => {
    const { error } = runFailing("try { throw 1; } catch (e) { throw e + 1; }");
    expect(error.message).toBe("uncaught exception: 2");
  });

  test("catch debug output goes through the logger", () => {
    const lines: string[] = [];
    const logger = createLogger("tern", { debug: true, sink: line => lines.push(line) });
    runSource('try { throw "boom"; } catch (e) { }', { logger });
    expect(lines).toContain("[tern:debug] caught boom in 'e'");
  });
});

describe("error handling - uncaught failures", () => {
  test("an uncaught throw stops the program and reports its line", () => {
    const { error, output } = runFailing('print(1);\nthrow "bad";\nprint(2);');
    expect(output).toEqual(["1"]);
    expect(error.kind).toBe("UncaughtException");
    expect(formatDiagnostic(error)).toBe("runtime error: uncaught exception: bad (line 2)");
  });

  test("runtime errors report the innermost failing expression", () => {
    const { error } = runFailing("var a = 1;\nvar b = a + missing;");
    expect(formatDiagnostic(error)).toBe("runtime error: Undefined variable 'missing' (line 2, column 13)");
  });

  test("constants reject assignment and redeclaration", () => {
    expect(runFailing("const k = 1; k = 2;").error).toMatchObject({
      kind: "ConstAssignmentError",
      message: "Cannot assign to constant 'k'",
    });
    expect(runFailing("const k = 1; var k = 2;").error).toMatchObject({
      kind: "RedeclarationError",
      message: "Cannot redeclare constant 'k'",
    });
  });

  test("parse errors are reported before anything runs", () => {
    const { error, output } = runFailing('print("never");\nvar = 1;');
    expect(output).toEqual([]);
    expect(error.phase).toBe("parser");
    expect(formatDiagnostic(error)).toBe("parser error: Expected variable name but found '=' (line 2, column 5)");
  });

  test("lexical errors are reported with their position", () => {
    const { error } = runFailing("var a = 1 # 2;");
    expect(formatDiagnostic(error)).toBe("lexer error: Unexpected character '#' (line 1, column 11)");
  });

  test("the host can halt a run between top-level statements", () => {
    const { error, output } = runFailing("print(1); print(2); print(3);", {
      shouldHalt: executed => executed >= 2,
    });
    expect(output).toEqual(["1", "2"]);
    expect(error).toMatchObject({
      kind: "ExecutionHaltedError",
      message: "execution halted by host after 2 statement(s)",
    });
  });
});

describe("error handling - host errors", () => {
  test("a host RangeError becomes a StackOverflowError throw completion", () => {
    const span = { start: { line: 3, column: 5 }, end: { line: 3, column: 9 } };
    const completion = completionFromError(new RangeError("Maximum call stack size exceeded"), span);
    expect(completion?.error?.kind).toBe("StackOverflowError");
    expect(completion?.value).toEqual({ kind: "string", value: "Maximum call stack size exceeded" });
    expect(completion?.span).toEqual(span);
  });

  test("other host errors are left to the caller", () => {
    expect(completionFromError(new Error("host failure"))).toBeNull();
  });
});
