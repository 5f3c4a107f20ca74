import type { BufferedByteReader } from "./buffered-byte-reader.js";

const CR = 0x0d;

export const MAX_LINE_LENGTH = 8192;

/**
 * Read one CR LF terminated ASCII line, without its terminator.
 *
 * `fail` builds the error thrown for a line that ends without CR LF, runs
 * past the stream end or `MAX_LINE_LENGTH`, or carries non-ASCII bytes.
 */
export async function readCrlfLine(
  reader: BufferedByteReader,
  fail: (message: string) => Error,
): Promise<string> {
  const { line, terminated } = await reader.readLine(MAX_LINE_LENGTH);
  if (!terminated) {
    throw fail(
      line.length > MAX_LINE_LENGTH
        ? `line exceeds ${MAX_LINE_LENGTH} bytes`
        : "unexpected end of stream",
    );
  }
  if (line.length === 0 || line[line.length - 1] !== CR) {
    throw fail("line is not terminated by CR LF");
  }
  let text = "";
  for (let i = 0; i < line.length - 1; i++) {
    const byte = line[i];
    if (byte > 0x7f) {
      throw fail("line is not in ASCII");
    }
    text += String.fromCharCode(byte);
  }
  return text;
}
