import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { applyEnvOverrides, defaultConfig, findConfigPath, loadConfig, readConfigFile } from "../../src/config";
import { ConfigError } from "../../src/errors";

let root: string;

beforeEach(() => {
  root = fs.mkdtempSync(path.join(os.tmpdir(), "tern-config-"));
});

afterEach(() => {
  fs.rmSync(root, { recursive: true, force: true });
});

function writeConfig(contents: string): string {
  const file = path.join(root, "tern.yml");
  fs.writeFileSync(file, contents, "utf8");
  return file;
}

describe("config", () => {
  test("finds tern.yml in a parent of the entry file", async () => {
    const file = writeConfig('max_call_depth: 64\nprompt: ">> "\ndebug: true\n');
    const entry = path.join(root, "src", "main.tern");
    fs.mkdirSync(path.dirname(entry));
    fs.writeFileSync(entry, "print(1);", "utf8");

    expect(await findConfigPath(entry)).toBe(file);
    expect(await loadConfig({ startPath: entry, env: {} })).toEqual({
      path: file,
      maxCallDepth: 64,
      prompt: ">> ",
      debug: true,
    });
  });

  test("an empty file keeps the defaults", async () => {
    const file = writeConfig("");
    expect(await readConfigFile(file)).toEqual({ ...defaultConfig(), path: file });
  });

  test("environment variables override the file", async () => {
    writeConfig("max_call_depth: 64\ndebug: true\n");
    const config = await loadConfig({ startPath: root, env: { TERN_MAX_CALL_DEPTH: "32", TERN_DEBUG: "0" } });
    expect(config.maxCallDepth).toBe(32);
    expect(config.debug).toBe(false);
  });

  test("applyEnvOverrides leaves the input untouched", () => {
    const base = defaultConfig();
    const overridden = applyEnvOverrides(base, { TERN_DEBUG: "yes" });
    expect(overridden.debug).toBe(true);
    expect(base.debug).toBe(false);
  });

  test("rejects invalid values", async () => {
    const file = writeConfig("max_call_depth: -1\n");
    await expect(readConfigFile(file)).rejects.toThrow(ConfigError);
    await expect(readConfigFile(file)).rejects.toThrow(`max_call_depth in ${file} must be a positive integer`);
    expect(() => applyEnvOverrides(defaultConfig(), { TERN_MAX_CALL_DEPTH: "abc" })).toThrow(
      "TERN_MAX_CALL_DEPTH must be a positive integer",
    );
  });

  test("rejects call depths above the ceiling", async () => {
    const file = writeConfig("max_call_depth: 5000\n");
    await expect(readConfigFile(file)).rejects.toThrow(`max_call_depth in ${file} must not exceed 1000`);
    expect(() => applyEnvOverrides(defaultConfig(), { TERN_MAX_CALL_DEPTH: "1001" })).toThrow(
      "TERN_MAX_CALL_DEPTH must not exceed 1000",
    );
    expect(applyEnvOverrides(defaultConfig(), { TERN_MAX_CALL_DEPTH: "1000" }).maxCallDepth).toBe(1000);
  });

  test("rejects unknown keys and non-mapping documents", async () => {
    const file = writeConfig("colour: blue\n");
    await expect(readConfigFile(file)).rejects.toThrow(`unknown key "colour" in ${file}`);
    writeConfig("- a\n- b\n");
    await expect(readConfigFile(file)).rejects.toThrow(`config ${file} must be a mapping`);
  });

  test("rejects YAML syntax errors", async () => {
    const file = writeConfig("prompt: [unclosed\n");
    await expect(readConfigFile(file)).rejects.toThrow(`failed to parse config ${file}`);
  });
});
