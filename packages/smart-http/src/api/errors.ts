/**
 * Transport-related error classes.
 *
 * Every failure of an `action`, `read` or `write` call surfaces as one of
 * these. Nothing is retried by the transport layer.
 */

/**
 * Base error for all transport operations.
 */
export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
  }
}

/**
 * Malformed URL, unsupported scheme for the engine, or URL without a host.
 */
export class UrlParseError extends TransportError {
  readonly url: string;

  constructor(message: string, url: string) {
    super(`${message}: ${url}`);
    this.name = "UrlParseError";
    this.url = url;
  }
}

/**
 * Network connection error.
 */
export class ConnectionError extends TransportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConnectionError";
  }
}

/**
 * Server answered with a status other than 200.
 */
export class HttpStatusError extends TransportError {
  readonly status: number;

  constructor(status: number, message = `failed to receive HTTP 200 response: got ${status}`) {
    super(message);
    this.name = "HttpStatusError";
    this.status = status;
  }
}

/**
 * Response Content-Type is missing or is not the one the service expects.
 */
export class ContentTypeMismatchError extends TransportError {
  readonly expected: string;
  readonly actual?: string;

  constructor(expected: string, actual?: string) {
    super(
      actual === undefined
        ? `expected a Content-Type header with \`${expected}\` but didn't find one`
        : `expected a Content-Type header with \`${expected}\` but found \`${actual}\``,
    );
    this.name = "ContentTypeMismatchError";
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Malformed chunked transfer framing.
 */
export class ChunkFormatError extends TransportError {
  constructor(message: string) {
    super(message);
    this.name = "ChunkFormatError";
  }
}

/**
 * Malformed status line or header block.
 */
export class ResponseParseError extends TransportError {
  constructor(message: string) {
    super(message);
    this.name = "ResponseParseError";
  }
}

/**
 * Redirect target refused by the configured redirect policy.
 */
export class RedirectRejectedError extends TransportError {
  readonly location: string;

  constructor(location: string, from: string) {
    super(`refusing cross-origin redirect from ${from} to ${location}`);
    this.name = "RedirectRejectedError";
    this.location = location;
  }
}

/**
 * Caller broke the stream contract: double write, write on a listing
 * service, read before write, or I/O on a failed stream.
 */
export class ProtocolViolationError extends TransportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ProtocolViolationError";
  }
}

/**
 * No transport is registered for the URL scheme.
 */
export class UnsupportedSchemeError extends TransportError {
  readonly url: string;

  constructor(url: string) {
    super(`unsupported URL protocol: ${url}`);
    this.name = "UnsupportedSchemeError";
    this.url = url;
  }
}

/**
 * Fold any error into the single descriptive string a host engine reports
 * for its generic network failure class.
 */
export function describeTransportError(error: unknown): string {
  if (error instanceof TransportError) {
    const cause = error.cause;
    if (cause instanceof Error && !error.message.includes(cause.message)) {
      return `${error.name}: ${error.message} (${cause.message})`;
    }
    return `${error.name}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
