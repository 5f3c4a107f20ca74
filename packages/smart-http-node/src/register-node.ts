import {
  registerHttpTransport,
  type SocketHttpExchangeOptions,
  type TransportRegistry,
  VERSION,
} from "@gitwire/smart-http";
import { NodeTcpSocket, type NodeTcpSocketOptions } from "./node-tcp-socket.js";

export interface NodeHttpTransportOptions
  extends Omit<SocketHttpExchangeOptions, "socketFactory">,
    NodeTcpSocketOptions {}

/**
 * Register the Node.js socket backend for `http://` and `https://` URLs.
 *
 * Trust roots, certificate checking and timeouts are captured here, once,
 * and used for every connection made afterwards. Only the first call per
 * registry takes effect.
 */
export function registerNodeHttpTransport(
  options: NodeHttpTransportOptions = {},
  registry?: TransportRegistry,
): boolean {
  const { ca, rejectUnauthorized, timeout, dial, ...exchangeOptions } = options;
  const socketOptions: NodeTcpSocketOptions = { ca, rejectUnauthorized, timeout, dial };
  return registerHttpTransport(
    {
      engine: "socket",
      userAgentProduct: `gitwire-node ${VERSION}`,
      ...exchangeOptions,
      socketFactory: (target) => new NodeTcpSocket(target, socketOptions),
    },
    registry,
  );
}
