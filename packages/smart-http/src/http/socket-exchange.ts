/**
 * Smart HTTP exchange over a raw TCP/TLS socket.
 *
 * Speaks just enough HTTP/1.0 to talk to smart HTTP git servers: one
 * connection per request, a request line and a handful of headers, then
 * status and header parsing by hand. Chunked bodies are decoded here, not
 * by a client library.
 */

import {
  ConnectionError,
  HttpStatusError,
  ResponseParseError,
  UrlParseError,
} from "../api/errors.js";
import type { TransportLogger } from "../api/types.js";
import { BufferedByteReader } from "../streams/buffered-byte-reader.js";
import { type ByteSource, LengthLimitedSource, ReleasingSource } from "../streams/byte-source.js";
import { readCrlfLine } from "../streams/line-reader.js";
import { ChunkedTransferDecoder } from "./chunked-decoder.js";
import {
  checkContentType,
  defaultUserAgentProduct,
  type ExchangeRequest,
  type ExchangeResponse,
  formatUserAgent,
  type HttpExchange,
  negotiationHeaders,
} from "./exchange.js";
import {
  checkRedirect,
  REDIRECT_STATUS_CODES,
  type RedirectPolicy,
  resolveLocation,
} from "./redirect.js";

/**
 * Abstract interface for a TCP socket.
 * Allows plugging in different implementations (Node.js net/tls, a proxy
 * tunnel, an in-memory fake).
 */
export interface TcpSocket {
  connect(): Promise<void>;
  write(data: Uint8Array): Promise<void>;
  read(): AsyncIterable<Uint8Array>;
  close(): Promise<void>;
}

/**
 * Where a socket should connect. `secure` asks for TLS.
 */
export interface SocketTarget {
  host: string;
  port: number;
  secure: boolean;
}

export type SocketFactory = (target: SocketTarget) => TcpSocket;

export interface SocketHttpExchangeOptions {
  socketFactory: SocketFactory;
  /** Product reported inside the User-Agent. Default: "gitwire-socket <version>" */
  userAgentProduct?: string;
  /** Follow 3xx responses. Default: true */
  followRedirects?: boolean;
  /** Maximum redirects to follow. Default: 5 */
  maxRedirects?: number;
  /** Default: "any" */
  redirectPolicy?: RedirectPolicy;
  logger?: TransportLogger;
}

const DEFAULT_MAX_REDIRECTS = 5;

const textEncoder = new TextEncoder();

interface ParsedResponseHead {
  status: number;
  headers: Map<string, string>;
}

export class SocketHttpExchange implements HttpExchange {
  readonly name = "socket";
  private readonly socketFactory: SocketFactory;
  private readonly userAgent: string;
  private readonly followRedirects: boolean;
  private readonly maxRedirects: number;
  private readonly redirectPolicy: RedirectPolicy;
  private readonly logger?: TransportLogger;

  constructor(options: SocketHttpExchangeOptions) {
    this.socketFactory = options.socketFactory;
    this.userAgent = formatUserAgent(
      options.userAgentProduct ?? defaultUserAgentProduct(this.name),
    );
    this.followRedirects = options.followRedirects ?? true;
    this.maxRedirects = options.maxRedirects ?? DEFAULT_MAX_REDIRECTS;
    this.redirectPolicy = options.redirectPolicy ?? "any";
    this.logger = options.logger;
  }

  async execute(request: ExchangeRequest): Promise<ExchangeResponse> {
    let url = request.url;
    let redirects = 0;

    while (true) {
      const parsed = parseRequestUrl(url);
      const socket = this.socketFactory(toSocketTarget(parsed));
      this.logger?.debug?.(`request to ${url}`);

      try {
        await socket.connect();
      } catch (error) {
        await this.release(socket);
        throw new ConnectionError(`failed to connect to ${parsed.host}`, { cause: error });
      }

      let released = false;
      try {
        await socket.write(this.encodeRequestHead(request, parsed));
        if (request.body) {
          await socket.write(request.body);
        }

        const reader = BufferedByteReader.from(socket.read());
        const status = await readStatusLine(reader);

        if (status !== 200) {
          if (!this.followRedirects || !REDIRECT_STATUS_CODES.has(status)) {
            throw new HttpStatusError(status);
          }
          const headers = await readHeaders(reader);
          url = this.nextHop(request, url, { status, headers }, ++redirects);
          released = true;
          await this.release(socket);
          continue;
        }

        const headers = await readHeaders(reader);
        checkContentType(request.binding, headers.get("content-type"));

        let redirectTarget: string | undefined;
        const location = headers.get("location");
        if (location !== undefined) {
          redirectTarget = resolveLocation(location, url);
          checkRedirect(this.redirectPolicy, url, redirectTarget);
        } else if (redirects > 0) {
          redirectTarget = url;
        }

        const body = new ReleasingSource(createBodySource(reader, headers), () =>
          this.release(socket),
        );
        released = true;
        return { body, redirectTarget };
      } catch (error) {
        if (!released) {
          await this.release(socket);
        }
        throw error;
      }
    }
  }

  /**
   * Validate a redirect response and return the URL to request next.
   */
  private nextHop(
    request: ExchangeRequest,
    url: string,
    response: ParsedResponseHead,
    redirects: number,
  ): string {
    const location = response.headers.get("location");
    if (location === undefined) {
      throw new HttpStatusError(
        response.status,
        `HTTP ${response.status} redirect without a Location header`,
      );
    }
    if (redirects > this.maxRedirects) {
      throw new HttpStatusError(
        response.status,
        `too many redirects (more than ${this.maxRedirects})`,
      );
    }
    // Only 307 and 308 promise that the same request may be replayed.
    if (request.body && response.status !== 307 && response.status !== 308) {
      throw new HttpStatusError(
        response.status,
        `HTTP ${response.status} redirect cannot be followed with a request body`,
      );
    }
    const next = resolveLocation(location, url);
    checkRedirect(this.redirectPolicy, url, next);
    this.logger?.debug?.(`following HTTP ${response.status} redirect to ${next}`);
    return next;
  }

  private encodeRequestHead(request: ExchangeRequest, url: URL): Uint8Array {
    const lines = [
      `${request.binding.method} ${url.pathname}${url.search} HTTP/1.0`,
      `Host: ${url.host}`,
      `User-Agent: ${this.userAgent}`,
    ];
    for (const [name, value] of negotiationHeaders(request)) {
      lines.push(`${name}: ${value}`);
    }
    return textEncoder.encode(`${lines.join("\r\n")}\r\n\r\n`);
  }

  private async release(socket: TcpSocket): Promise<void> {
    try {
      await socket.close();
    } catch (error) {
      this.logger?.debug?.("failed to close socket", error);
    }
  }
}

function parseRequestUrl(url: string): URL {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new UrlParseError("invalid url, failed to parse", url);
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new UrlParseError("invalid url, unknown scheme", url);
  }
  if (parsed.hostname === "") {
    throw new UrlParseError("invalid url, did not have a host", url);
  }
  return parsed;
}

function toSocketTarget(url: URL): SocketTarget {
  const secure = url.protocol === "https:";
  const host = url.hostname.startsWith("[") ? url.hostname.slice(1, -1) : url.hostname;
  const port = url.port === "" ? (secure ? 443 : 80) : Number(url.port);
  return { host, port, secure };
}

const STATUS_LINE_PATTERN = /^HTTP\/\d\.\d (\d{3})(?: .*)?$/;

async function readStatusLine(reader: BufferedByteReader): Promise<number> {
  const line = await readCrlfLine(reader, (message) => {
    return new ResponseParseError(`bad status line: ${message}`);
  });
  const match = STATUS_LINE_PATTERN.exec(line);
  if (!match) {
    throw new ResponseParseError(`bad status line: ${JSON.stringify(line)}`);
  }
  return Number(match[1]);
}

/**
 * Read header lines up to the empty line. Names are lower-cased; repeated
 * headers are joined with ", ".
 */
async function readHeaders(reader: BufferedByteReader): Promise<Map<string, string>> {
  const headers = new Map<string, string>();
  while (true) {
    const line = await readCrlfLine(reader, (message) => {
      return new ResponseParseError(`bad header: ${message}`);
    });
    if (line === "") {
      return headers;
    }
    const colon = line.indexOf(":");
    if (colon <= 0) {
      throw new ResponseParseError(`bad header: ${JSON.stringify(line)}`);
    }
    const name = line.slice(0, colon).trim().toLowerCase();
    const value = line.slice(colon + 1).trim();
    const previous = headers.get(name);
    headers.set(name, previous === undefined ? value : `${previous}, ${value}`);
  }
}

function createBodySource(reader: BufferedByteReader, headers: Map<string, string>): ByteSource {
  const transferEncoding = headers.get("transfer-encoding");
  if (transferEncoding !== undefined) {
    const codings = transferEncoding.split(",").map((coding) => coding.trim().toLowerCase());
    if (codings[codings.length - 1] === "chunked") {
      return new ChunkedTransferDecoder(reader);
    }
  }

  const contentLength = headers.get("content-length");
  if (contentLength !== undefined) {
    if (!/^\d+$/.test(contentLength)) {
      throw new ResponseParseError(`bad Content-Length: ${contentLength}`);
    }
    return new LengthLimitedSource(reader, Number(contentLength));
  }

  return reader;
}
