/**
 * Redirect handling shared by the HTTP engines.
 *
 * Some hosts (GitLab, for one) redirect the first request and expect the
 * client to keep using the new location, so a redirect seen during one
 * exchange moves the base URL of every later exchange on the transport.
 */

import { RedirectRejectedError } from "../api/errors.js";

/**
 * `"any"` follows every redirect target. `"same-origin"` refuses targets
 * whose scheme, host or port differ from the URL that was requested.
 */
export type RedirectPolicy = "any" | "same-origin";

export const REDIRECT_STATUS_CODES: ReadonlySet<number> = new Set([301, 302, 303, 307, 308]);

/**
 * Compute the base URL a redirect points at.
 *
 * The path suffix of the action is stripped from the end of `location`.
 * A location that does not end with it is used as the base unchanged.
 */
export function computeRedirectBase(location: string, pathSuffix: string): string {
  if (pathSuffix.length > 0 && location.endsWith(pathSuffix)) {
    return location.slice(0, location.length - pathSuffix.length);
  }
  return location;
}

/**
 * Resolve a Location header value against the URL it was received for.
 * Absolute locations are kept verbatim.
 */
export function resolveLocation(location: string, requestUrl: string): string {
  try {
    new URL(location);
    return location;
  } catch {
    return new URL(location, requestUrl).href;
  }
}

/**
 * Throw when `policy` does not allow going from `from` to `to`.
 */
export function checkRedirect(policy: RedirectPolicy, from: string, to: string): void {
  if (policy === "any") return;
  if (new URL(from).origin !== new URL(to).origin) {
    throw new RedirectRejectedError(to, from);
  }
}
