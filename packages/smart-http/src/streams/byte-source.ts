/**
 * Pull-based byte sources a response body is read from.
 */

export interface ByteSource {
  /**
   * Copy up to `buffer.length` bytes into `buffer`.
   * Resolves to the number of bytes copied; 0 means the source is exhausted.
   */
  read(buffer: Uint8Array): Promise<number>;

  /**
   * Give up on the rest of the source and free what it holds open.
   */
  close?(): Promise<void>;
}

/**
 * Exposes at most `length` bytes of an underlying source (a body framed by
 * Content-Length).
 */
export class LengthLimitedSource implements ByteSource {
  private readonly source: ByteSource;
  private remaining: number;

  constructor(source: ByteSource, length: number) {
    this.source = source;
    this.remaining = length;
  }

  async read(buffer: Uint8Array): Promise<number> {
    if (this.remaining === 0 || buffer.length === 0) return 0;
    const n = await this.source.read(buffer.subarray(0, Math.min(buffer.length, this.remaining)));
    this.remaining = n === 0 ? 0 : this.remaining - n;
    return n;
  }
}

/**
 * Runs `release` once, when the wrapped source reports its end, fails or is
 * closed. Used to close the connection a body is read from.
 */
export class ReleasingSource implements ByteSource {
  private readonly source: ByteSource;
  private release: (() => Promise<void>) | null;

  constructor(source: ByteSource, release: () => Promise<void>) {
    this.source = source;
    this.release = release;
  }

  async read(buffer: Uint8Array): Promise<number> {
    if (!this.release) return 0;
    let n: number;
    try {
      n = await this.source.read(buffer);
    } catch (error) {
      await this.finish();
      throw error;
    }
    if (n === 0 && buffer.length > 0) {
      await this.finish();
    }
    return n;
  }

  async close(): Promise<void> {
    await this.finish();
  }

  private async finish(): Promise<void> {
    const release = this.release;
    this.release = null;
    await release?.();
  }
}

/**
 * Read a whole source into one array.
 */
export async function readAll(source: ByteSource, chunkSize = 8192): Promise<Uint8Array> {
  const chunks: Uint8Array[] = [];
  let total = 0;
  while (true) {
    const buffer = new Uint8Array(chunkSize);
    const n = await source.read(buffer);
    if (n === 0) break;
    chunks.push(buffer.subarray(0, n));
    total += n;
  }
  const result = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.length;
  }
  return result;
}
