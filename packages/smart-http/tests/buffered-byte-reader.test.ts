import { describe, expect, it } from "vitest";
import { BufferedByteReader } from "../src/streams/buffered-byte-reader.js";
import { LengthLimitedSource, ReleasingSource, readAll } from "../src/streams/byte-source.js";
import { MAX_LINE_LENGTH, readCrlfLine } from "../src/streams/line-reader.js";
import { bytes, text } from "./helpers/scripted-socket.js";

function readerOf(...parts: Array<string | Uint8Array>): BufferedByteReader {
  return BufferedByteReader.from(
    (async function* () {
      for (const part of parts) {
        yield typeof part === "string" ? bytes(part) : part;
      }
    })(),
  );
}

const fail = (message: string) => new Error(`bad line: ${message}`);

describe("BufferedByteReader", () => {
  it("should copy at most the buffer size per read", async () => {
    const reader = readerOf("abcdef");
    const buffer = new Uint8Array(4);

    expect(await reader.read(buffer)).toBe(4);
    expect(text(buffer)).toBe("abcd");
    expect(await reader.read(buffer)).toBe(2);
    expect(text(buffer.subarray(0, 2))).toBe("ef");
    expect(await reader.read(buffer)).toBe(0);
  });

  it("should skip empty chunks", async () => {
    const reader = readerOf("", new Uint8Array(0), "xy");

    expect(text(await readAll(reader))).toBe("xy");
  });

  it("should keep bytes after a line for the next read", async () => {
    const reader = readerOf("first\r\nsec", "ond\r\nrest");

    expect(await readCrlfLine(reader, fail)).toBe("first");
    expect(await readCrlfLine(reader, fail)).toBe("second");
    expect(text(await readAll(reader))).toBe("rest");
  });
});

describe("readCrlfLine", () => {
  it("should return an empty string for a blank line", async () => {
    expect(await readCrlfLine(readerOf("\r\n"), fail)).toBe("");
  });

  it("should reject a line ending in a bare LF", async () => {
    await expect(readCrlfLine(readerOf("Server: x\n"), fail)).rejects.toThrow(
      "bad line: line is not terminated by CR LF",
    );
  });

  it("should reject non-ASCII bytes", async () => {
    const line = new Uint8Array([0x58, 0x3a, 0x20, 0xc3, 0xa9, 0x0d, 0x0a]);

    await expect(readCrlfLine(readerOf(line), fail)).rejects.toThrow(
      "bad line: line is not in ASCII",
    );
  });

  it("should reject a line cut off by the end of stream", async () => {
    await expect(readCrlfLine(readerOf("HTTP/1.1 200"), fail)).rejects.toThrow(
      "bad line: unexpected end of stream",
    );
  });

  it("should reject lines longer than the limit", async () => {
    const long = "a".repeat(MAX_LINE_LENGTH + 10);

    await expect(readCrlfLine(readerOf(long, "\r\n"), fail)).rejects.toThrow(
      `bad line: line exceeds ${MAX_LINE_LENGTH} bytes`,
    );
  });

  it("should reject a long line that arrives in one chunk with its terminator", async () => {
    const reader = readerOf(`${"a".repeat(20000)}\r\nnext\r\n`);

    await expect(readCrlfLine(reader, fail)).rejects.toThrow(
      `bad line: line exceeds ${MAX_LINE_LENGTH} bytes`,
    );
  });

  it("should accept a line of exactly the limit, CR included", async () => {
    const atLimit = "a".repeat(MAX_LINE_LENGTH - 1);

    expect(await readCrlfLine(readerOf(`${atLimit}\r\n`), fail)).toBe(atLimit);
    expect(await readCrlfLine(readerOf(atLimit, "\r\n"), fail)).toBe(atLimit);
  });
});

describe("LengthLimitedSource", () => {
  it("should stop at the declared length", async () => {
    const source = new LengthLimitedSource(readerOf("hello world"), 5);

    expect(text(await readAll(source))).toBe("hello");
  });

  it("should end early when the underlying source ends", async () => {
    const source = new LengthLimitedSource(readerOf("hi"), 10);

    expect(text(await readAll(source))).toBe("hi");
  });
});

describe("ReleasingSource", () => {
  it("should release once when the source ends", async () => {
    let releases = 0;
    const source = new ReleasingSource(readerOf("data"), async () => {
      releases++;
    });

    expect(text(await readAll(source))).toBe("data");
    expect(await source.read(new Uint8Array(4))).toBe(0);
    expect(releases).toBe(1);
  });

  it("should release on close before the end and stop reading", async () => {
    let releases = 0;
    const source = new ReleasingSource(readerOf("ab", "cd"), async () => {
      releases++;
    });

    expect(await source.read(new Uint8Array(2))).toBe(2);
    await source.close();
    await source.close();

    expect(releases).toBe(1);
    expect(await source.read(new Uint8Array(2))).toBe(0);
  });

  it("should release and rethrow when the source fails", async () => {
    let releases = 0;
    const failing = {
      async read(): Promise<number> {
        throw new Error("reset by peer");
      },
    };
    const source = new ReleasingSource(failing, async () => {
      releases++;
    });

    await expect(source.read(new Uint8Array(4))).rejects.toThrow("reset by peer");
    expect(releases).toBe(1);
  });
});
