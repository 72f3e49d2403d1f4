import { describe, expect, test, vi } from "vitest";
import { readLineFrom, type ByteReader } from "../../src/builtins/host_io";

function readerOf(text: string, busyReads = 0): ByteReader {
  const bytes = Buffer.from(text, "utf8");
  let offset = 0;
  let busy = busyReads;
  return buffer => {
    if (busy > 0) {
      busy--;
      throw Object.assign(new Error("resource temporarily unavailable"), { code: "EAGAIN" });
    }
    const byte = bytes[offset];
    if (byte === undefined) return 0;
    buffer[0] = byte;
    offset++;
    return 1;
  };
}

describe("host io - line reader", () => {
  test("backs off while stdin has no data ready", () => {
    const backOff = vi.fn();
    expect(readLineFrom(readerOf("hi\nrest", 2), backOff)).toBe("hi");
    expect(backOff).toHaveBeenCalledTimes(2);
  });

  test("strips a carriage return and decodes UTF-8", () => {
    expect(readLineFrom(readerOf("héllo\r\n"), vi.fn())).toBe("héllo");
  });

  test("returns the partial last line, then null at end of input", () => {
    const read = readerOf("tail");
    expect(readLineFrom(read, vi.fn())).toBe("tail");
    expect(readLineFrom(read, vi.fn())).toBeNull();
  });

  test("other read failures propagate", () => {
    const failing: ByteReader = () => {
      throw Object.assign(new Error("bad file descriptor"), { code: "EBADF" });
    };
    expect(() => readLineFrom(failing, vi.fn())).toThrow("bad file descriptor");
  });
});
