/**
 * One HTTP request/response cycle for a smart HTTP action.
 *
 * Each HTTP primitive (a raw socket, WHATWG fetch) provides its own
 * `HttpExchange`; everything above it is shared.
 */

import { ContentTypeMismatchError } from "../api/errors.js";
import { type ActionBinding, getContentTypes, getExpectedContentType } from "../api/service.js";
import type { ByteSource } from "../streams/byte-source.js";
import { VERSION } from "../version.js";

export interface ExchangeRequest {
  /** Base URL followed by the action's path suffix */
  url: string;
  binding: ActionBinding;
  /** Request body; present only after a write */
  body?: Uint8Array;
}

export interface ExchangeResponse {
  /** Response body, already stripped of transfer coding */
  body: ByteSource;
  /** URL the response says the repository moved to, if any */
  redirectTarget?: string;
}

export interface HttpExchange {
  /** Backend name reported in the User-Agent */
  readonly name: string;
  execute(request: ExchangeRequest): Promise<ExchangeResponse>;
}

/**
 * User agent for requests made by `product`.
 *
 * The value must start with "git/": GitHub selects its smart responder by
 * it when a URL has no ".git" suffix.
 */
export function formatUserAgent(product: string): string {
  return `git/1.0 (${product})`;
}

export function defaultUserAgentProduct(backend: string): string {
  return `gitwire-${backend} ${VERSION}`;
}

/**
 * Request headers that depend on whether a body is sent.
 */
export function negotiationHeaders(request: ExchangeRequest): Array<[string, string]> {
  if (!request.body) {
    return [["Accept", "*/*"]];
  }
  const types = getContentTypes(request.binding.serviceName);
  return [
    ["Accept", types.result],
    ["Content-Type", types.request],
    ["Content-Length", String(request.body.length)],
  ];
}

/**
 * Check the response Content-Type against the one the binding expects.
 *
 * A transparent proxy answering with an HTML error page would otherwise
 * be handed to the pack protocol parser.
 */
export function checkContentType(binding: ActionBinding, contentType: string | undefined): void {
  const expected = getExpectedContentType(binding);
  if (contentType === undefined) {
    throw new ContentTypeMismatchError(expected);
  }
  const mediaType = contentType.split(";", 1)[0].trim().toLowerCase();
  if (mediaType !== expected) {
    throw new ContentTypeMismatchError(expected, contentType);
  }
}
