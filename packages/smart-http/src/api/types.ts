/**
 * Interfaces shared by the host engine and the transport backends.
 *
 * A smart subtransport only needs to read() and write() bytes over a
 * channel; the git protocol itself (pkt-line framing, pack negotiation)
 * is handled by the host engine on the other side of the stream.
 */

import type { Service } from "./service.js";

/**
 * Opaque handle of a remote owned by the host engine.
 * The transport layer only looks at the URL to pick a backend.
 */
export interface RemoteHandle {
  readonly url: string;
  readonly name?: string;
}

/**
 * Byte stream over which the host engine talks to the remote for one action.
 */
export interface SmartSubtransportStream {
  /**
   * Copy response bytes into `buffer`.
   * Resolves to the number of bytes copied; 0 means end of body.
   */
  read(buffer: Uint8Array): Promise<number>;

  /**
   * Send `data` as the request body.
   */
  write(data: Uint8Array): Promise<void>;
}

/**
 * Capability set a backend provides to a smart transport.
 */
export interface SmartSubtransport {
  /**
   * Prepare a stream for performing `service` against `url`.
   * No network activity is required before the stream is read or written.
   */
  action(url: string, service: Service): Promise<SmartSubtransportStream>;

  /**
   * Terminate the connection with the remote.
   *
   * Each subtransport gets a close() between calls to action(), except for
   * the two natural progressions against a constant URL:
   * UploadPackLs -> UploadPack and ReceivePackLs -> ReceivePack.
   */
  close(): Promise<void>;
}

/**
 * Optional logger for debugging.
 */
export interface TransportLogger {
  debug?(message: string, ...args: unknown[]): void;
  info?(message: string, ...args: unknown[]): void;
  error?(message: string, ...args: unknown[]): void;
}
