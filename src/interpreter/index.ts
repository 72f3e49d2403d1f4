import { applyHelperAugmentations } from "./helpers";
import { applyStringifyAugmentations } from "./stringify";
import { applyEvaluationAugmentations } from "./eval_expressions";
import { applyStatementAugmentations } from "./statements";
import { applyProgramAugmentations } from "./program";

import { Environment } from "./environment";
import type { NativeFunctionValue } from "./values";
import { createProcessIO, type HostIO } from "../builtins/host_io";
import { createStandardLibrary } from "../builtins/standard_library";
import { createLogger, type Logger } from "../logger";

// =============================================================================
// Tern interpreter (modular layout)
// =============================================================================

export const DEFAULT_MAX_CALL_DEPTH = 256;
/** Ceiling for `maxCallDepth`; larger requests are clamped to it. */
export const MAX_CALL_DEPTH_LIMIT = 1000;

export type InterpreterOptions = {
  /** Root scope to run in; a fresh one holding the natives is created when omitted. */
  globals?: Environment;
  io?: HostIO;
  /** Native registry bound into a fresh root scope; defaults to the standard library. */
  natives?: Iterable<NativeFunctionValue>;
  maxCallDepth?: number;
  /** Consulted between top-level statements; returning true stops the run. */
  shouldHalt?: (executedStatements: number) => boolean;
  logger?: Logger;
};

export class Interpreter {
  readonly globals: Environment;
  readonly io: HostIO;
  readonly logger: Logger;
  readonly maxCallDepth: number;
  readonly shouldHalt: ((executedStatements: number) => boolean) | null;

  callDepth = 0;
  executedStatements = 0;

  constructor(options: InterpreterOptions = {}) {
    this.io = options.io ?? createProcessIO();
    this.logger = options.logger ?? createLogger("tern");
    const maxCallDepth = options.maxCallDepth ?? DEFAULT_MAX_CALL_DEPTH;
    if (!Number.isInteger(maxCallDepth) || maxCallDepth < 1) {
      throw new RangeError(`maxCallDepth must be a positive integer (got ${maxCallDepth})`);
    }
    this.maxCallDepth = Math.min(maxCallDepth, MAX_CALL_DEPTH_LIMIT);
    this.shouldHalt = options.shouldHalt ?? null;
    this.globals = options.globals ?? createGlobalEnvironment(options.natives ?? createStandardLibrary());
  }
}

applyHelperAugmentations(Interpreter);
applyStringifyAugmentations(Interpreter);
applyEvaluationAugmentations(Interpreter);
applyStatementAugmentations(Interpreter);
applyProgramAugmentations(Interpreter);

export function createGlobalEnvironment(natives: Iterable<NativeFunctionValue>): Environment {
  const globals = new Environment();
  for (const native of natives) {
    globals.declare(native.name, native, false);
  }
  return globals;
}

export { Environment } from "./environment";
export type { RuntimeValue, NativeFunctionValue } from "./values";
export type { Completion, ThrowCompletion } from "./signals";
export type { ProgramResult } from "./program";
