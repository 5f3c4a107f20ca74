/**
 * @gitwire/smart-http-node
 *
 * Node.js socket backend for @gitwire/smart-http: raw node:net / node:tls
 * connections carrying the hand-rolled HTTP/1.0 exchange.
 *
 * @example
 * ```typescript
 * import { registerNodeHttpTransport } from "@gitwire/smart-http-node";
 *
 * registerNodeHttpTransport({ ca: readFileSync("roots.pem"), timeout: 10000 });
 * ```
 *
 * @packageDocumentation
 */

export {
  type DialFunction,
  dialNode,
  NodeTcpSocket,
  type NodeTcpSocketOptions,
} from "./node-tcp-socket.js";
export { type NodeHttpTransportOptions, registerNodeHttpTransport } from "./register-node.js";
