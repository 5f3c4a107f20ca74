import { describe, expect, it } from "vitest";
import { UnsupportedSchemeError } from "../src/api/errors.js";
import type { SmartSubtransport } from "../src/api/types.js";
import { Transport, type TransportFactory } from "../src/transport/transport.js";
import {
  defaultTransportRegistry,
  registerTransport,
  TransportRegistry,
} from "../src/transport/transport-registry.js";

const idle: SmartSubtransport = {
  async action() {
    throw new Error("not used");
  },
  async close() {},
};

function factory(stateless: boolean): TransportFactory {
  return (remote) => Transport.smart(remote, stateless, idle);
}

describe("TransportRegistry", () => {
  it("should resolve a factory by URL scheme", () => {
    const registry = new TransportRegistry();
    const http = factory(true);
    registry.register("http", http);

    expect(registry.resolve("http://example.com/repo")).toBe(http);
    expect(registry.resolve("HTTP://example.com/repo")).toBe(http);
    expect(registry.resolve("https://example.com/repo")).toBeUndefined();
  });

  it("should keep the first registration for a prefix", () => {
    const registry = new TransportRegistry();
    const first = factory(true);
    const second = factory(false);

    expect(registry.register("custom", first)).toBe(true);
    expect(registry.register("custom://", second)).toBe(false);
    expect(registry.register("CUSTOM", second)).toBe(false);

    expect(registry.resolve("custom://host/repo")).toBe(first);
    expect(registry.prefixes()).toEqual(["custom"]);
  });

  it("should report registered prefixes", () => {
    const registry = new TransportRegistry();
    registry.register("http", factory(true));
    registry.register("https://", factory(true));

    expect(registry.has("https")).toBe(true);
    expect(registry.has("git")).toBe(false);
    expect(registry.prefixes()).toEqual(["http", "https"]);
  });

  it("should not resolve URLs without a scheme separator", () => {
    const registry = new TransportRegistry();
    registry.register("http", factory(true));

    expect(registry.resolve("http:example.com")).toBeUndefined();
    expect(registry.resolve("://example.com")).toBeUndefined();
  });

  it("should create transports through the matching factory", () => {
    const registry = new TransportRegistry();
    registry.register("http", factory(true));

    const transport = registry.createTransport({ url: "http://example.com/repo" });

    expect(transport.stateless).toBe(true);
    expect(transport.remote.url).toBe("http://example.com/repo");
  });

  it("should reject URLs with an unregistered scheme", () => {
    const registry = new TransportRegistry();

    expect(() => registry.createTransport({ url: "gopher://example.com/repo" })).toThrow(
      UnsupportedSchemeError,
    );
    expect(() => registry.createTransport({ url: "gopher://example.com/repo" })).toThrow(
      "unsupported URL protocol: gopher://example.com/repo",
    );
  });

  it("should register into the default registry", () => {
    const first = factory(false);

    expect(registerTransport("test-scheme", first)).toBe(true);
    expect(registerTransport("test-scheme", factory(true))).toBe(false);
    expect(defaultTransportRegistry.resolve("test-scheme://host/repo")).toBe(first);
  });
});
