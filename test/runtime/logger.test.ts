import { describe, expect, test } from "vitest";
import { createLogger, isDebugFlag, LogLevel } from "../../src/logger";

describe("logger", () => {
  test("debug lines are prefixed with the logger name", () => {
    const lines: string[] = [];
    const logger = createLogger("tern", { debug: true, sink: line => lines.push(line) });
    logger.debug("parsing");
    logger.warn("careful");
    expect(lines).toEqual(["[tern:debug] parsing", "[tern:warn] careful"]);
  });

  test("debug output is off by default", () => {
    const lines: string[] = [];
    const logger = createLogger("tern", { debug: false, sink: line => lines.push(line) });
    logger.debug("hidden");
    logger.info("shown");
    expect(lines).toEqual(["[tern:info] shown"]);
    expect(logger.debugEnabled).toBe(false);
  });

  test("levels can be raised at run time", () => {
    const lines: string[] = [];
    const logger = createLogger("tern", { debug: true, sink: line => lines.push(line) });
    logger.setLevel(LogLevel.ERROR);
    logger.info("dropped");
    logger.error("kept");
    expect(lines).toEqual(["[tern:error] kept"]);
  });

  test("recognises debug flag spellings", () => {
    expect(["1", "true", " YES ", "on"].map(isDebugFlag)).toEqual([true, true, true, true]);
    expect(["0", "false", "", undefined].map(isDebugFlag)).toEqual([false, false, false, false]);
  });
});
