import type { Span } from "./ast";

export type RuntimeErrorKind =
  | "UndefinedVariableError"
  | "RedeclarationError"
  | "ConstAssignmentError"
  | "TypeError"
  | "ArityError"
  | "NotCallableError"
  | "UndefinedMethodError"
  | "ConversionError"
  | "StackOverflowError"
  | "IndexError";

export class TernError extends Error {
  line?: number;
  column?: number;

  constructor(message: string, line?: number, column?: number) {
    super(message);
    this.name = "TernError";
    this.line = line;
    this.column = column;
  }
}

export class LexError extends TernError {
  readonly character: string;

  constructor(message: string, character: string, line: number, column: number) {
    super(message, line, column);
    this.name = "LexError";
    this.character = character;
  }
}

export class ParseError extends TernError {
  readonly expected: string;
  readonly found: string;

  constructor(expected: string, found: string, line: number, column: number, message?: string) {
    super(message ?? `expected ${expected}, found ${found}`, line, column);
    this.name = "ParseError";
    this.expected = expected;
    this.found = found;
  }
}

/**
 * Failure raised while evaluating a program. Runtime errors surface to
 * `catch` clauses as their message; the span is filled in by the innermost
 * node being evaluated when the error escapes it.
 */
export class RuntimeError extends TernError {
  readonly kind: RuntimeErrorKind;
  span?: Span;

  constructor(kind: RuntimeErrorKind, message: string, span?: Span) {
    super(message, span?.start.line, span?.start.column);
    this.name = kind;
    this.kind = kind;
    if (span) this.attachSpan(span);
  }

  attachSpan(span: Span): void {
    if (this.span) return;
    this.span = span;
    this.line = span.start.line;
    this.column = span.start.column;
  }
}

export class AstFormatError extends TernError {
  constructor(message: string) {
    super(message);
    this.name = "AstFormatError";
  }
}

export class ExecutionHaltedError extends TernError {
  readonly executedStatements: number;

  constructor(executedStatements: number) {
    super(`execution halted by host after ${executedStatements} statement(s)`);
    this.name = "ExecutionHaltedError";
    this.executedStatements = executedStatements;
  }
}

export class ConfigError extends TernError {
  readonly path?: string;

  constructor(message: string, path?: string) {
    super(message);
    this.name = "ConfigError";
    this.path = path;
  }
}
