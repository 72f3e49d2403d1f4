import { AstFormatError, ConfigError, ExecutionHaltedError, LexError, ParseError, RuntimeError, TernError } from "./errors";
import type { ThrowCompletion } from "./interpreter/signals";
import { valueToString } from "./interpreter/stringify";

export type DiagnosticPhase = "lexer" | "parser" | "runtime" | "loader" | "config" | "host";

export type DiagnosticLocation = {
  path?: string;
  line?: number;
  column?: number;
};

export type Diagnostic = {
  severity: "error";
  phase: DiagnosticPhase;
  kind: string;
  message: string;
  location?: DiagnosticLocation;
};

function locationOf(err: TernError, path?: string): DiagnosticLocation | undefined {
  if (err.line === undefined && !path) return undefined;
  return { path, line: err.line, column: err.column };
}

export function diagnosticFromError(err: unknown, path?: string): Diagnostic {
  if (err instanceof LexError) {
    return { severity: "error", phase: "lexer", kind: err.name, message: err.message, location: locationOf(err, path) };
  }
  if (err instanceof ParseError) {
    return { severity: "error", phase: "parser", kind: err.name, message: err.message, location: locationOf(err, path) };
  }
  if (err instanceof RuntimeError || err instanceof ExecutionHaltedError) {
    return { severity: "error", phase: "runtime", kind: err.name, message: err.message, location: locationOf(err, path) };
  }
  if (err instanceof AstFormatError) {
    return { severity: "error", phase: "loader", kind: err.name, message: err.message, location: path ? { path } : undefined };
  }
  if (err instanceof ConfigError) {
    const configPath = err.path ?? path;
    return { severity: "error", phase: "config", kind: err.name, message: err.message, location: configPath ? { path: configPath } : undefined };
  }
  if (err instanceof Error) {
    return { severity: "error", phase: "host", kind: err.name, message: err.message };
  }
  return { severity: "error", phase: "host", kind: "Error", message: String(err) };
}

/** Diagnostic for a throw completion that reached the top level. */
export function diagnosticFromThrow(completion: ThrowCompletion, path?: string): Diagnostic {
  if (completion.error) return diagnosticFromError(completion.error, path);
  const line = completion.span?.start.line;
  return {
    severity: "error",
    phase: "runtime",
    kind: "UncaughtException",
    message: `uncaught exception: ${valueToString(completion.value)}`,
    location: line !== undefined || path ? { path, line } : undefined,
  };
}

export function formatDiagnostic(diag: Diagnostic): string {
  const location = formatDiagnosticLocation(diag.location);
  const text = `${diag.phase} error: ${diag.message}`;
  return location ? `${text} (${location})` : text;
}

function formatDiagnosticLocation(location: DiagnosticLocation | undefined): string | null {
  if (!location) return null;
  const { path, line, column } = location;
  if (path && line && column) return `${path}:${line}:${column}`;
  if (path && line) return `${path}:${line}`;
  if (path) return path;
  if (line && column) return `line ${line}, column ${column}`;
  if (line) return `line ${line}`;
  return null;
}
