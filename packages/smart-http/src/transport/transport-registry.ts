/**
 * Table from URL scheme to the factory that builds its transport.
 *
 * Registration cannot be undone: once a connection may have been created
 * against a transport, the host engine cannot swap it out. The first
 * factory registered for a scheme therefore stays for the lifetime of the
 * registry, and later registrations for the same scheme are ignored.
 */

import { UnsupportedSchemeError } from "../api/errors.js";
import type { RemoteHandle } from "../api/types.js";
import type { Transport, TransportFactory } from "./transport.js";

export class TransportRegistry {
  private readonly factories = new Map<string, TransportFactory>();

  /**
   * Install `factory` for URLs starting with `<prefix>://`.
   *
   * @returns false when the prefix was already taken and `factory` was discarded
   */
  register(prefix: string, factory: TransportFactory): boolean {
    const key = normalizePrefix(prefix);
    if (this.factories.has(key)) {
      return false;
    }
    this.factories.set(key, factory);
    return true;
  }

  has(prefix: string): boolean {
    return this.factories.has(normalizePrefix(prefix));
  }

  prefixes(): string[] {
    return [...this.factories.keys()];
  }

  /**
   * Find the factory responsible for `url`.
   */
  resolve(url: string): TransportFactory | undefined {
    const separator = url.indexOf("://");
    if (separator <= 0) return undefined;
    return this.factories.get(url.slice(0, separator).toLowerCase());
  }

  /**
   * Build the transport for a remote through the factory of its URL scheme.
   */
  createTransport(remote: RemoteHandle): Transport {
    const factory = this.resolve(remote.url);
    if (!factory) {
      throw new UnsupportedSchemeError(remote.url);
    }
    return factory(remote);
  }
}

function normalizePrefix(prefix: string): string {
  const trimmed = prefix.endsWith("://") ? prefix.slice(0, -3) : prefix;
  return trimmed.toLowerCase();
}

/**
 * Process-wide registry used when no registry is passed explicitly.
 */
export const defaultTransportRegistry = new TransportRegistry();

export function registerTransport(prefix: string, factory: TransportFactory): boolean {
  return defaultTransportRegistry.register(prefix, factory);
}
