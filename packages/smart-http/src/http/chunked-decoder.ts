/**
 * HTTP/1.1 chunked transfer coding decoder (RFC 7230, section 4.1).
 *
 * Chunked format:
 *   <hex-size>[;ext]\r\n
 *   <data>\r\n
 *   ...
 *   0\r\n
 *   [trailer-field\r\n]*
 *   \r\n
 *
 * Decodes lazily: nothing is pulled from the connection until the caller
 * asks for body bytes.
 */

import { ChunkFormatError } from "../api/errors.js";
import type { BufferedByteReader } from "../streams/buffered-byte-reader.js";
import type { ByteSource } from "../streams/byte-source.js";
import { readCrlfLine } from "../streams/line-reader.js";

type DecoderState =
  | { kind: "awaiting-size" }
  | { kind: "reading-data"; remaining: number }
  | { kind: "awaiting-trailer" }
  | { kind: "done" };

const CHUNK_SIZE_PATTERN = /^[0-9a-fA-F]+$/;
const MAX_CHUNK_SIZE_DIGITS = 12;

export class ChunkedTransferDecoder implements ByteSource {
  private readonly reader: BufferedByteReader;
  private state: DecoderState = { kind: "awaiting-size" };

  constructor(reader: BufferedByteReader) {
    this.reader = reader;
  }

  get isDone(): boolean {
    return this.state.kind === "done";
  }

  async read(buffer: Uint8Array): Promise<number> {
    if (buffer.length === 0) return 0;

    while (true) {
      switch (this.state.kind) {
        case "done":
          return 0;

        case "awaiting-size": {
          const size = await this.readChunkSize();
          this.state =
            size === 0 ? { kind: "awaiting-trailer" } : { kind: "reading-data", remaining: size };
          break;
        }

        case "reading-data": {
          const remaining = this.state.remaining;
          const n = await this.reader.read(buffer.subarray(0, Math.min(buffer.length, remaining)));
          if (n === 0) {
            throw new ChunkFormatError(`connection closed with ${remaining} chunk bytes missing`);
          }
          if (n === remaining) {
            await this.readDataTerminator();
            this.state = { kind: "awaiting-size" };
          } else {
            this.state = { kind: "reading-data", remaining: remaining - n };
          }
          return n;
        }

        case "awaiting-trailer": {
          // Trailer fields are not used by the smart protocol; skip them.
          const line = await readCrlfLine(this.reader, fail);
          if (line === "") {
            this.state = { kind: "done" };
          }
          break;
        }
      }
    }
  }

  private async readChunkSize(): Promise<number> {
    const line = await readCrlfLine(this.reader, fail);
    const semicolon = line.indexOf(";");
    const digits = (semicolon === -1 ? line : line.slice(0, semicolon)).trim();
    if (!CHUNK_SIZE_PATTERN.test(digits) || digits.length > MAX_CHUNK_SIZE_DIGITS) {
      throw new ChunkFormatError(`invalid chunk size line: ${JSON.stringify(line)}`);
    }
    return Number.parseInt(digits, 16);
  }

  private async readDataTerminator(): Promise<void> {
    const line = await readCrlfLine(this.reader, fail);
    if (line !== "") {
      throw new ChunkFormatError("expected CR LF after chunk data");
    }
  }
}

function fail(message: string): ChunkFormatError {
  return new ChunkFormatError(`malformed chunked body: ${message}`);
}
