import { describe, expect, it } from "vitest";
import {
  ConnectionError,
  ContentTypeMismatchError,
  describeTransportError,
  HttpStatusError,
  TransportError,
  UrlParseError,
} from "../src/api/errors.js";

describe("transport errors", () => {
  it("should share the TransportError base", () => {
    const error = new UrlParseError("invalid url, failed to parse", "::");

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("UrlParseError");
    expect(error.message).toBe("invalid url, failed to parse: ::");
    expect(error.url).toBe("::");
  });

  it("should keep the status of an HTTP failure", () => {
    const error = new HttpStatusError(503);

    expect(error.status).toBe(503);
    expect(error.message).toBe("failed to receive HTTP 200 response: got 503");
  });

  it("should describe a missing Content-Type", () => {
    const error = new ContentTypeMismatchError("application/x-git-receive-pack-result");

    expect(error.actual).toBeUndefined();
    expect(error.message).toBe(
      "expected a Content-Type header with `application/x-git-receive-pack-result` but didn't find one",
    );
  });
});

describe("describeTransportError", () => {
  it("should include the name and the cause", () => {
    const error = new ConnectionError("failed to connect to example.com", {
      cause: new Error("connect ECONNREFUSED"),
    });

    expect(describeTransportError(error)).toBe(
      "ConnectionError: failed to connect to example.com (connect ECONNREFUSED)",
    );
  });

  it("should not repeat a cause already in the message", () => {
    const cause = new Error("socket hang up");
    const error = new TransportError("socket hang up", { cause });

    expect(describeTransportError(error)).toBe("TransportError: socket hang up");
  });

  it("should describe foreign errors and values", () => {
    expect(describeTransportError(new TypeError("fetch failed"))).toBe("fetch failed");
    expect(describeTransportError("plain")).toBe("plain");
    expect(describeTransportError(42)).toBe("42");
  });
});
