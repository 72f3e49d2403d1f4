import { promises as fsp } from "node:fs";
import path from "node:path";

import { parse as parseYAML } from "yaml";

import { ConfigError } from "./errors";
import { DEFAULT_MAX_CALL_DEPTH, MAX_CALL_DEPTH_LIMIT } from "./interpreter/index";
import { isDebugFlag } from "./logger";

export const CONFIG_FILE_NAME = "tern.yml";
export const DEFAULT_PROMPT = "tern> ";

export type TernConfig = {
  /** Absolute path of the tern.yml that was read, or null when none was found. */
  path: string | null;
  maxCallDepth: number;
  prompt: string;
  debug: boolean;
};

export type LoadConfigOptions = {
  /** File or directory where the upward search for tern.yml starts. */
  startPath?: string;
  env?: NodeJS.ProcessEnv;
};

export function defaultConfig(): TernConfig {
  return { path: null, maxCallDepth: DEFAULT_MAX_CALL_DEPTH, prompt: DEFAULT_PROMPT, debug: false };
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<TernConfig> {
  const env = options.env ?? process.env;
  const configPath = await findConfigPath(options.startPath ?? process.cwd());
  const config = configPath ? await readConfigFile(configPath) : defaultConfig();
  return applyEnvOverrides(config, env);
}

export async function findConfigPath(start: string): Promise<string | null> {
  let dir = path.resolve(start);
  const startStat = await statOrNull(dir);
  if (startStat && !startStat.isDirectory()) {
    dir = path.dirname(dir);
  }
  while (true) {
    const candidate = path.join(dir, CONFIG_FILE_NAME);
    const stats = await statOrNull(candidate);
    if (stats?.isFile()) {
      return candidate;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      break;
    }
    dir = parent;
  }
  return null;
}

export async function readConfigFile(configPath: string): Promise<TernConfig> {
  const abs = path.resolve(configPath);
  let contents: string;
  try {
    contents = await fsp.readFile(abs, "utf8");
  } catch (error) {
    throw new ConfigError(`failed to read config ${abs}: ${extractErrorMessage(error)}`, abs);
  }
  let parsed: unknown;
  try {
    parsed = parseYAML(contents) ?? {};
  } catch (error) {
    throw new ConfigError(`failed to parse config ${abs}: ${extractErrorMessage(error)}`, abs);
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`config ${abs} must be a mapping`, abs);
  }

  const config = defaultConfig();
  config.path = abs;
  for (const [key, value] of Object.entries(parsed)) {
    switch (key) {
      case "max_call_depth":
        config.maxCallDepth = expectCallDepth(value, `max_call_depth in ${abs}`, abs);
        break;
      case "prompt":
        if (typeof value !== "string") {
          throw new ConfigError(`prompt in ${abs} must be a string`, abs);
        }
        config.prompt = value;
        break;
      case "debug":
        if (typeof value !== "boolean") {
          throw new ConfigError(`debug in ${abs} must be true or false`, abs);
        }
        config.debug = value;
        break;
      default:
        throw new ConfigError(`unknown key "${key}" in ${abs}`, abs);
    }
  }
  return config;
}

export function applyEnvOverrides(config: TernConfig, env: NodeJS.ProcessEnv): TernConfig {
  const result = { ...config };
  const depth = env.TERN_MAX_CALL_DEPTH;
  if (depth !== undefined && depth.trim() !== "") {
    const parsed = /^\d+$/.test(depth.trim()) ? Number(depth.trim()) : Number.NaN;
    result.maxCallDepth = expectCallDepth(parsed, "TERN_MAX_CALL_DEPTH");
  }
  if (env.TERN_DEBUG !== undefined) {
    result.debug = isDebugFlag(env.TERN_DEBUG);
  }
  return result;
}

function expectCallDepth(value: unknown, label: string, configPath?: string): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${label} must be a positive integer`, configPath);
  }
  if (value > MAX_CALL_DEPTH_LIMIT) {
    throw new ConfigError(`${label} must not exceed ${MAX_CALL_DEPTH_LIMIT}`, configPath);
  }
  return value;
}

async function statOrNull(target: string) {
  try {
    return await fsp.stat(target);
  } catch (error) {
    if (isRecord(error) && error.code === "ENOENT") return null;
    if (isRecord(error) && error.code === "ENOTDIR") return null;
    throw error;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
