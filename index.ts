export * as AST from "./src/ast";
export * from "./src/errors";
export { Lexer, tokenize, TokenType, describeToken, type Token } from "./src/lexer/index";
export { Parser, parse } from "./src/parser/index";
export {
  Interpreter,
  createGlobalEnvironment,
  DEFAULT_MAX_CALL_DEPTH,
  MAX_CALL_DEPTH_LIMIT,
  Environment,
  type InterpreterOptions,
  type ProgramResult,
  type RuntimeValue,
  type NativeFunctionValue,
  type Completion,
  type ThrowCompletion,
} from "./src/interpreter/index";
export { valueToString } from "./src/interpreter/stringify";
export { valuesEqual } from "./src/interpreter/value_equals";
export { BufferedIO, createProcessIO, createStandardLibrary, makeNativeFunction, type HostIO } from "./src/builtins/index";
export {
  compileSource,
  deserializeDocument,
  deserializeProgram,
  serializeProgram,
  type AstDocument,
  type AstMetadata,
} from "./src/serialization/index";
export { Session, isIncompleteInput, type RunResult } from "./src/session";
export { diagnosticFromError, diagnosticFromThrow, formatDiagnostic, type Diagnostic } from "./src/diagnostics";
export { loadConfig, defaultConfig, type TernConfig } from "./src/config";
export { createLogger, Logger, LogLevel } from "./src/logger";
