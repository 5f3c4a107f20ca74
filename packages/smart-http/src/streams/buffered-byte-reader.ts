import type { ByteSource } from "./byte-source.js";

const LF = 0x0a;

/**
 * Buffered reader over an async iterator of byte chunks.
 *
 * Provides line and buffer-filling reads on top of a chunk-based stream.
 * Buffers only what the current read needs.
 *
 * Calls `iterator.next()` directly instead of `for await...of`, so leftover
 * bytes survive between reads and the iterator is not terminated by an
 * early exit. Safe for repeated sequential reads on a shared iterator.
 */
export class BufferedByteReader implements ByteSource {
  private buffer: Uint8Array = new Uint8Array(0);
  private iterator: AsyncIterator<Uint8Array>;
  private done = false;

  constructor(iterator: AsyncIterator<Uint8Array>) {
    this.iterator = iterator;
  }

  static from(chunks: AsyncIterable<Uint8Array>): BufferedByteReader {
    return new BufferedByteReader(chunks[Symbol.asyncIterator]());
  }

  /** Pull one more chunk into the buffer. Returns false at end of stream. */
  private async fill(): Promise<boolean> {
    if (this.done) return false;
    const { value, done } = await this.iterator.next();
    if (done) {
      this.done = true;
      return false;
    }
    if (value.length === 0) return true;
    if (this.buffer.length === 0) {
      this.buffer = value;
      return true;
    }
    const merged = new Uint8Array(this.buffer.length + value.length);
    merged.set(this.buffer);
    merged.set(value, this.buffer.length);
    this.buffer = merged;
    return true;
  }

  async read(target: Uint8Array): Promise<number> {
    if (target.length === 0) return 0;
    while (this.buffer.length === 0) {
      if (!(await this.fill())) return 0;
    }
    const n = Math.min(target.length, this.buffer.length);
    target.set(this.buffer.subarray(0, n));
    this.buffer = this.buffer.subarray(n);
    return n;
  }

  /**
   * Read bytes up to and including the next LF.
   *
   * Resolves to the bytes read so far (without LF) and `terminated: false`
   * when the stream ends first or more than `maxLength` bytes precede the
   * next LF.
   */
  async readLine(maxLength: number): Promise<{ line: Uint8Array; terminated: boolean }> {
    let scanned = 0;
    while (true) {
      const index = this.buffer.indexOf(LF, scanned);
      if (index > maxLength) {
        const line = this.buffer.slice(0, maxLength + 1);
        this.buffer = this.buffer.subarray(line.length);
        return { line, terminated: false };
      }
      if (index >= 0) {
        const line = this.buffer.slice(0, index);
        this.buffer = this.buffer.subarray(index + 1);
        return { line, terminated: true };
      }
      scanned = this.buffer.length;
      if (scanned > maxLength || !(await this.fill())) {
        const line = this.buffer.slice(0, Math.min(scanned, maxLength + 1));
        this.buffer = this.buffer.subarray(line.length);
        return { line, terminated: false };
      }
    }
  }
}
