import { BufferedIO } from "../../src/builtins/host_io";
import type { InterpreterOptions } from "../../src/interpreter/index";
import { Session, type RunResult } from "../../src/session";

export type RunOutcome = {
  result: RunResult;
  output: string[];
  io: BufferedIO;
  session: Session;
};

export function runSource(source: string, options: InterpreterOptions & { input?: string[] } = {}): RunOutcome {
  const { input, ...interpreterOptions } = options;
  const io = new BufferedIO(input);
  const session = new Session({ ...interpreterOptions, io });
  const result = session.run(source);
  return { result, output: io.outputLines(), io, session };
}

/** Runs source expected to fail and returns its diagnostic. */
export function runFailing(source: string, options: InterpreterOptions = {}) {
  const outcome = runSource(source, options);
  if (outcome.result.ok) {
    throw new Error(`expected failure, got output ${JSON.stringify(outcome.output)}`);
  }
  return { error: outcome.result.error, output: outcome.output };
}
