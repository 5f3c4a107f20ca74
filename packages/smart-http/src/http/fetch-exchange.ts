/**
 * Smart HTTP exchange over WHATWG fetch.
 *
 * Redirects and transfer coding are handled by the fetch implementation;
 * the final response URL tells whether the repository moved.
 */

import { ConnectionError, HttpStatusError, UrlParseError } from "../api/errors.js";
import type { TransportLogger } from "../api/types.js";
import { BufferedByteReader } from "../streams/buffered-byte-reader.js";
import { type ByteSource, ReleasingSource } from "../streams/byte-source.js";
import {
  checkContentType,
  defaultUserAgentProduct,
  type ExchangeRequest,
  type ExchangeResponse,
  formatUserAgent,
  type HttpExchange,
  negotiationHeaders,
} from "./exchange.js";
import { checkRedirect, type RedirectPolicy, resolveLocation } from "./redirect.js";

export type FetchFunction = typeof globalThis.fetch;

export interface FetchHttpExchangeOptions {
  /** Fetch implementation. Default: globalThis.fetch */
  fetch?: FetchFunction;
  /** Product reported inside the User-Agent. Default: "gitwire-fetch <version>" */
  userAgentProduct?: string;
  /** Extra request headers */
  headers?: Record<string, string>;
  /** Milliseconds to wait for the response headers. Default: 30000 */
  timeout?: number;
  /** Follow 3xx responses. Default: true */
  followRedirects?: boolean;
  /** Default: "any" */
  redirectPolicy?: RedirectPolicy;
  logger?: TransportLogger;
}

const DEFAULT_TIMEOUT = 30000;

export class FetchHttpExchange implements HttpExchange {
  readonly name = "fetch";
  private readonly fetchFn: FetchFunction;
  private readonly userAgent: string;
  private readonly customHeaders: Record<string, string>;
  private readonly timeout: number;
  private readonly followRedirects: boolean;
  private readonly redirectPolicy: RedirectPolicy;
  private readonly logger?: TransportLogger;

  constructor(options: FetchHttpExchangeOptions = {}) {
    this.fetchFn = options.fetch ?? globalThis.fetch;
    this.userAgent = formatUserAgent(
      options.userAgentProduct ?? defaultUserAgentProduct(this.name),
    );
    this.customHeaders = options.headers ?? {};
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT;
    this.followRedirects = options.followRedirects ?? true;
    this.redirectPolicy = options.redirectPolicy ?? "any";
    this.logger = options.logger;
  }

  async execute(request: ExchangeRequest): Promise<ExchangeResponse> {
    const url = request.url;
    try {
      new URL(url);
    } catch {
      throw new UrlParseError("invalid url, failed to parse", url);
    }

    const headers = new Headers(this.customHeaders);
    headers.set("User-Agent", this.userAgent);
    for (const [name, value] of negotiationHeaders(request)) {
      // fetch computes Content-Length itself
      if (name !== "Content-Length") headers.set(name, value);
    }

    this.logger?.debug?.(`request to ${url}`);

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method: request.binding.method,
        headers,
        // Copy to get a plain ArrayBuffer (not SharedArrayBuffer) behind the view
        body: request.body ? new Blob([new Uint8Array(request.body)]) : undefined,
        redirect: this.followRedirects ? "follow" : "manual",
        signal: controller.signal,
      });
    } catch (error) {
      if (controller.signal.aborted) {
        throw new ConnectionError(`Request timeout after ${this.timeout}ms`, { cause: error });
      }
      throw new ConnectionError(`HTTP request to ${url} failed`, { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }

    try {
      if (response.status !== 200) {
        throw new HttpStatusError(response.status);
      }
      checkContentType(request.binding, response.headers.get("Content-Type") ?? undefined);

      let redirectTarget: string | undefined;
      const location = response.headers.get("Location");
      if (location !== null) {
        redirectTarget = resolveLocation(location, url);
      } else if (response.redirected && response.url !== "" && response.url !== url) {
        redirectTarget = response.url;
      }
      if (redirectTarget !== undefined) {
        checkRedirect(this.redirectPolicy, url, redirectTarget);
        this.logger?.debug?.(`response redirected to ${redirectTarget}`);
      }

      const body = response.body;
      if (!body) {
        return { body: emptySource, redirectTarget };
      }
      const reader = body.getReader();
      return {
        body: new ReleasingSource(BufferedByteReader.from(chunksOf(reader)), () =>
          this.cancel(reader),
        ),
        redirectTarget,
      };
    } catch (error) {
      await this.discard(response);
      throw error;
    }
  }

  /** Cancel the body so the connection is not held for unread bytes. */
  private async cancel(reader: ReadableStreamDefaultReader<Uint8Array>): Promise<void> {
    try {
      await reader.cancel();
    } catch (error) {
      this.logger?.debug?.("failed to cancel response body", error);
    }
  }

  private async discard(response: Response): Promise<void> {
    try {
      await response.body?.cancel();
    } catch (error) {
      this.logger?.debug?.("failed to cancel response body", error);
    }
  }
}

const emptySource: ByteSource = {
  async read(): Promise<number> {
    return 0;
  },
};

/**
 * Convert a stream reader to async iterable.
 */
async function* chunksOf(
  reader: ReadableStreamDefaultReader<Uint8Array>,
): AsyncGenerator<Uint8Array> {
  while (true) {
    const { done, value } = await reader.read();
    if (done) return;
    yield value;
  }
}
