export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 4,
}

export type LogSink = (line: string) => void;

/**
 * Console logger for the pipeline. Everything goes to stderr so that program
 * output on stdout stays clean.
 */
export class Logger {
  constructor(
    readonly name: string,
    private level: LogLevel = LogLevel.INFO,
    private sink: LogSink = line => console.error(line),
  ) {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  get debugEnabled(): boolean {
    return this.level <= LogLevel.DEBUG;
  }

  debug(message: string): void {
    if (this.level <= LogLevel.DEBUG) this.sink(`[${this.name}:debug] ${message}`);
  }

  info(message: string): void {
    if (this.level <= LogLevel.INFO) this.sink(`[${this.name}:info] ${message}`);
  }

  warn(message: string): void {
    if (this.level <= LogLevel.WARN) this.sink(`[${this.name}:warn] ${message}`);
  }

  error(message: string): void {
    if (this.level <= LogLevel.ERROR) this.sink(`[${this.name}:error] ${message}`);
  }
}

export type LoggerOptions = {
  debug?: boolean;
  sink?: LogSink;
};

export function isDebugFlag(raw: string | undefined): boolean {
  if (raw === undefined) return false;
  return ["1", "true", "yes", "on"].includes(raw.trim().toLowerCase());
}

/** Debug output is on when requested or when TERN_DEBUG is set. */
export function createLogger(name: string, options: LoggerOptions = {}): Logger {
  const debug = options.debug ?? isDebugFlag(process.env.TERN_DEBUG);
  return new Logger(name, debug ? LogLevel.DEBUG : LogLevel.INFO, options.sink);
}
