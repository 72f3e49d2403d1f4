#!/usr/bin/env tsx
import fs from "node:fs";
import { promises as fsPromises } from "node:fs";
import path from "node:path";
import readline from "node:readline";
import { fileURLToPath } from "node:url";

import { compileSource, deserializeProgram } from "../src/serialization/index";
import { loadConfig, type TernConfig } from "../src/config";
import { diagnosticFromError, formatDiagnostic, type Diagnostic } from "../src/diagnostics";
import { TernError } from "../src/errors";
import { createLogger } from "../src/logger";
import { isIncompleteInput, Session, type RunResult } from "../src/session";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const PACKAGE_JSON = path.resolve(__dirname, "../package.json");

type CLICommand = "run" | "compile" | "repl";

async function main() {
  const argv = process.argv.slice(2);
  if (argv.length === 0) {
    printUsage();
    process.exitCode = 1;
    return;
  }

  const first = argv[0];
  if (isHelpFlag(first)) {
    printUsage();
    return;
  }
  if (isVersionFlag(first)) {
    printVersion();
    return;
  }

  const { command, args } = extractCommand(argv);
  switch (command) {
    case "run":
      await handleRunCommand(args);
      return;
    case "compile":
      await handleCompileCommand(args);
      return;
    case "repl":
      await handleReplCommand();
      return;
  }
}

function extractCommand(argv: string[]): { command: CLICommand; args: string[] } {
  const candidate = argv[0] ?? "";
  if (isCommand(candidate)) {
    return { command: candidate, args: argv.slice(1) };
  }
  return { command: "run", args: argv };
}

function isCommand(value: string | undefined): value is CLICommand {
  return value === "run" || value === "compile" || value === "repl";
}

function isHelpFlag(value: string | undefined): boolean {
  return value === "--help" || value === "-h" || value === "help";
}

function isVersionFlag(value: string | undefined): boolean {
  return value === "--version" || value === "-V" || value === "version";
}

async function handleRunCommand(args: string[]): Promise<void> {
  const entry = args[0];
  if (!entry) {
    console.error("tern run requires a path to a .tern or .ternast file");
    process.exitCode = 1;
    return;
  }
  const entryPath = path.resolve(entry);
  const config = await loadConfigOrReport(entryPath);
  if (!config) return;

  let source: string;
  try {
    source = await fsPromises.readFile(entryPath, "utf8");
  } catch (err) {
    console.error(`failed to read ${entry}: ${extractErrorMessage(err)}`);
    process.exitCode = 1;
    return;
  }

  const session = createSession(config);
  let result: RunResult;
  if (entryPath.endsWith(".ternast")) {
    try {
      result = session.runProgram(deserializeProgram(source), entry);
    } catch (err) {
      reportFailure(err, entry);
      return;
    }
  } else {
    result = session.run(source, entry);
  }
  if (!result.ok) {
    emitDiagnostic(result.error);
  }
}

async function handleCompileCommand(args: string[]): Promise<void> {
  const entry = args[0];
  if (!entry) {
    console.error("tern compile requires a path to a .tern file");
    process.exitCode = 1;
    return;
  }
  const outPath = args[1] ?? replaceExtension(entry, ".ternast");
  const logger = createLogger("tern");
  try {
    const source = await fsPromises.readFile(entry, "utf8");
    const compiled = compileSource(source, { source: path.basename(entry) });
    await fsPromises.writeFile(outPath, `${compiled}\n`, "utf8");
    logger.debug(`wrote ${outPath}`);
  } catch (err) {
    reportFailure(err, entry);
  }
}

async function handleReplCommand(): Promise<void> {
  const config = await loadConfigOrReport(process.cwd());
  if (!config) return;
  const session = createSession(config);
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, prompt: config.prompt });
  let buffer = "";

  rl.prompt();
  for await (const line of rl) {
    if (buffer === "" && line.trim() === ".exit") break;
    buffer = buffer === "" ? line : `${buffer}\n${line}`;
    if (buffer.trim() === "") {
      buffer = "";
      rl.prompt();
      continue;
    }
    if (isIncompleteInput(buffer)) {
      rl.setPrompt("... ");
      rl.prompt();
      continue;
    }
    const result = session.evaluateLine(buffer);
    buffer = "";
    if (!result.ok) {
      console.error(formatDiagnostic(result.error));
    } else if (result.value.kind !== "null") {
      console.log(session.display(result.value));
    }
    rl.setPrompt(config.prompt);
    rl.prompt();
  }
  rl.close();
}

function createSession(config: TernConfig): Session {
  return new Session({
    maxCallDepth: config.maxCallDepth,
    logger: createLogger("tern", { debug: config.debug }),
  });
}

async function loadConfigOrReport(startPath: string): Promise<TernConfig | null> {
  try {
    return await loadConfig({ startPath });
  } catch (err) {
    reportFailure(err);
    return null;
  }
}

function reportFailure(err: unknown, filePath?: string): void {
  if (err instanceof TernError) {
    emitDiagnostic(diagnosticFromError(err, filePath));
    return;
  }
  console.error(`error: ${extractErrorMessage(err)}`);
  process.exitCode = 1;
}

function emitDiagnostic(diag: Diagnostic): void {
  console.error(formatDiagnostic(diag));
  process.exitCode = 1;
}

function replaceExtension(filePath: string, extension: string): string {
  const parsed = path.parse(filePath);
  return path.join(parsed.dir, `${parsed.name}${extension}`);
}

function printUsage(): void {
  const script = path.relative(process.cwd(), path.join(__dirname, "run-module.ts"));
  console.log(`Tern CLI

Usage:
  tsx ${script} run <path>              Execute a .tern source file or a compiled .ternast file (default command)
  tsx ${script} compile <path> [out]    Parse a .tern file and write its AST as JSON
  tsx ${script} repl                    Start an interactive session

Options:
  --help, -h        Show this message
  --version, -V     Print CLI version

Environment:
  TERN_MAX_CALL_DEPTH   Override max_call_depth from tern.yml
  TERN_DEBUG            Enable debug logging on stderr`);
}

function printVersion(): void {
  console.log(`tern ${readPackageVersion()}`);
}

function readPackageVersion(): string {
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(PACKAGE_JSON, "utf8"));
    if (typeof parsed === "object" && parsed !== null && "version" in parsed && typeof parsed.version === "string") {
      return parsed.version;
    }
    return "dev";
  } catch (err) {
    createLogger("tern").debug(`could not read package version: ${extractErrorMessage(err)}`);
    return "dev";
  }
}

function extractErrorMessage(err: unknown): string {
  if (!err) return "";
  if (typeof err === "string") return err;
  if (err instanceof Error) return err.message;
  return String(err);
}

await main();
