/**
 * Installation of the smart HTTP backend for the `http` and `https` schemes.
 */

import type { TransportLogger } from "../api/types.js";
import { Transport } from "../transport/transport.js";
import {
  defaultTransportRegistry,
  type TransportRegistry,
} from "../transport/transport-registry.js";
import type { HttpExchange } from "./exchange.js";
import { FetchHttpExchange, type FetchHttpExchangeOptions } from "./fetch-exchange.js";
import { SmartHttpTransport } from "./smart-http-transport.js";
import { SocketHttpExchange, type SocketHttpExchangeOptions } from "./socket-exchange.js";

export type HttpBackendOptions =
  | ({ engine: "fetch" } & FetchHttpExchangeOptions)
  | ({ engine: "socket" } & SocketHttpExchangeOptions)
  | { engine: "custom"; exchange: HttpExchange; logger?: TransportLogger };

export const HTTP_SCHEMES = ["http", "https"] as const;

const installed = new WeakSet<TransportRegistry>();

/**
 * Build the exchange engine described by `options`.
 */
export function createHttpExchange(options: HttpBackendOptions): HttpExchange {
  switch (options.engine) {
    case "fetch":
      return new FetchHttpExchange(options);
    case "socket":
      return new SocketHttpExchange(options);
    case "custom":
      return options.exchange;
  }
}

/**
 * Register the smart HTTP backend for `http://` and `https://` URLs.
 *
 * The engine is built once, here, so connection parameters captured in
 * `options` apply to every transport created later. Only the first call
 * per registry has an effect; later calls are discarded and return false.
 */
export function registerHttpTransport(
  options: HttpBackendOptions = { engine: "fetch" },
  registry: TransportRegistry = defaultTransportRegistry,
): boolean {
  if (installed.has(registry)) {
    return false;
  }
  installed.add(registry);

  const exchange = createHttpExchange(options);
  const logger = options.logger;
  let registered = false;
  for (const scheme of HTTP_SCHEMES) {
    registered =
      registry.register(scheme, (remote) =>
        Transport.smart(remote, true, new SmartHttpTransport(exchange, { logger })),
      ) || registered;
  }
  return registered;
}
