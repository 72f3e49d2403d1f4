import { readSync } from "node:fs";

/** Host side of `print` and `input`. */
export interface HostIO {
  write(text: string): void;
  /** Next line of input without its terminator, or null at end of input. */
  readLine(): string | null;
}

export function createProcessIO(): HostIO {
  return {
    write(text) {
      process.stdout.write(text);
    },
    readLine() {
      return readLineFrom(buffer => readSync(0, buffer, 0, 1, null));
    },
  };
}

/** Fills the one-byte buffer and returns the byte count; 0 at end of input. */
export type ByteReader = (buffer: Buffer) => number;

const pauseCell = new Int32Array(new SharedArrayBuffer(4));

function pauseBriefly(): void {
  Atomics.wait(pauseCell, 0, 0, 10);
}

/**
 * Reads one line byte by byte. A non-blocking stdin reports EAGAIN while no
 * data is ready; `backOff` runs before each retry.
 */
export function readLineFrom(read: ByteReader, backOff: () => void = pauseBriefly): string | null {
  const chunk = Buffer.alloc(1);
  const bytes: number[] = [];
  for (;;) {
    let count: number;
    try {
      count = read(chunk);
    } catch (err) {
      const code = err instanceof Error && "code" in err ? err.code : undefined;
      if (code === "EAGAIN") {
        backOff();
        continue;
      }
      if (code === "EOF") break;
      throw err;
    }
    if (count === 0) break;
    const byte = chunk[0];
    if (byte === undefined || byte === 0x0a) {
      return Buffer.from(bytes).toString("utf8").replace(/\r$/, "");
    }
    bytes.push(byte);
  }
  return bytes.length > 0 ? Buffer.from(bytes).toString("utf8") : null;
}

/** In-memory host used by sessions that capture output. */
export class BufferedIO implements HostIO {
  private readonly lines: string[];
  output = "";

  constructor(input: string[] = []) {
    this.lines = [...input];
  }

  write(text: string): void {
    this.output += text;
  }

  readLine(): string | null {
    return this.lines.shift() ?? null;
  }

  /** Output split on newlines, without the trailing empty entry. */
  outputLines(): string[] {
    const lines = this.output.split("\n");
    if (lines[lines.length - 1] === "") lines.pop();
    return lines;
  }
}
