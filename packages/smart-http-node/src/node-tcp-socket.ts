/**
 * Node.js TCP/TLS socket implementation of `TcpSocket`.
 *
 * Plain `http` targets use node:net, `https` targets node:tls. Trust roots
 * and timeouts are set on the socket before any byte is exchanged; there is
 * no way to cancel an exchange once it runs.
 */

import * as net from "node:net";
import type { Duplex } from "node:stream";
import * as tls from "node:tls";
import { ConnectionError, type SocketTarget, type TcpSocket } from "@gitwire/smart-http";

export interface NodeTcpSocketOptions {
  /** Trust roots for TLS; Node's bundled roots when omitted */
  ca?: string | Buffer | Array<string | Buffer>;
  /** Default: true */
  rejectUnauthorized?: boolean;
  /** Connect and idle timeout in milliseconds. Default: 30000 */
  timeout?: number;
  /** Opens the connection. Default: `dialNode` */
  dial?: DialFunction;
}

export type DialFunction = (
  target: SocketTarget,
  options: Omit<NodeTcpSocketOptions, "dial">,
) => Promise<Duplex>;

const DEFAULT_TIMEOUT = 30000;

/**
 * Connect with node:net or node:tls and resolve once the socket (and the
 * TLS handshake, for secure targets) is ready.
 */
export const dialNode: DialFunction = (target, options) => {
  const timeout = options.timeout ?? DEFAULT_TIMEOUT;
  return new Promise<Duplex>((resolve, reject) => {
    const socket: net.Socket = target.secure
      ? tls.connect({
          host: target.host,
          port: target.port,
          servername: net.isIP(target.host) === 0 ? target.host : undefined,
          ca: options.ca,
          rejectUnauthorized: options.rejectUnauthorized ?? true,
        })
      : net.connect({ host: target.host, port: target.port });

    const onError = (error: Error) => {
      socket.destroy();
      reject(error);
    };
    socket.setTimeout(timeout, () => {
      socket.destroy(new ConnectionError(`socket timed out after ${timeout}ms`));
    });
    socket.once("error", onError);
    socket.once(target.secure ? "secureConnect" : "connect", () => {
      socket.off("error", onError);
      resolve(socket);
    });
  });
};

export class NodeTcpSocket implements TcpSocket {
  private readonly target: SocketTarget;
  private readonly options: Omit<NodeTcpSocketOptions, "dial">;
  private readonly dial: DialFunction;
  private socket: Duplex | null = null;
  private closed = false;
  private failure: Error | null = null;

  constructor(target: SocketTarget, options: NodeTcpSocketOptions = {}) {
    this.target = target;
    const { dial, ...rest } = options;
    this.options = rest;
    this.dial = dial ?? dialNode;
  }

  async connect(): Promise<void> {
    if (this.socket) return;
    if (this.closed) throw new ConnectionError("Socket is closed");
    let socket: Duplex;
    try {
      socket = await this.dial(this.target, this.options);
    } catch (error) {
      throw new ConnectionError(`failed to connect to ${this.target.host}:${this.target.port}`, {
        cause: error,
      });
    }
    // Errors while nobody reads (an idle timeout) surface on the next call.
    socket.on("error", (error: Error) => {
      this.failure = error;
    });
    this.socket = socket;
  }

  async write(data: Uint8Array): Promise<void> {
    const socket = this.requireSocket();
    await new Promise<void>((resolve, reject) => {
      socket.write(data, (error) => {
        if (error) {
          reject(new ConnectionError("failed to write to socket", { cause: error }));
        } else {
          resolve();
        }
      });
    });
  }

  async *read(): AsyncGenerator<Uint8Array> {
    const socket = this.requireSocket();
    try {
      for await (const chunk of socket) {
        if (chunk instanceof Uint8Array) {
          yield chunk;
        } else if (typeof chunk === "string") {
          yield Buffer.from(chunk);
        }
      }
    } catch (error) {
      if (error instanceof ConnectionError) throw error;
      throw new ConnectionError("failed to read from socket", { cause: error });
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    const socket = this.socket;
    this.socket = null;
    if (socket && !socket.destroyed) {
      socket.destroy();
    }
  }

  private requireSocket(): Duplex {
    if (!this.socket) {
      throw new ConnectionError(this.closed ? "Socket is closed" : "Not connected");
    }
    if (this.failure) {
      throw new ConnectionError("connection failed", { cause: this.failure });
    }
    return this.socket;
  }
}
