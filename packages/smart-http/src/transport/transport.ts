/**
 * Smart transport binding.
 *
 * Binds a `SmartSubtransport` to a remote the way the host engine expects:
 * the host calls `action()` for every protocol phase and drives the
 * returned stream. Stateless (rpc) transports such as HTTP get a fresh
 * stream for every phase. Stateful transports open a stream only for the
 * listing phase and keep using it for the data phase that follows.
 */

import { describeTransportError, ProtocolViolationError, TransportError } from "../api/errors.js";
import { isListingService, type Service } from "../api/service.js";
import type { RemoteHandle, SmartSubtransport, SmartSubtransportStream } from "../api/types.js";

/**
 * Constructs the transport for a remote. Installed per URL scheme in a
 * `TransportRegistry`.
 */
export type TransportFactory = (remote: RemoteHandle) => Transport;

export class Transport {
  readonly remote: RemoteHandle;
  readonly stateless: boolean;
  private readonly subtransport: SmartSubtransport;
  private stream: SmartSubtransportStream | null = null;
  private freed = false;

  private constructor(remote: RemoteHandle, stateless: boolean, subtransport: SmartSubtransport) {
    this.remote = remote;
    this.stateless = stateless;
    this.subtransport = subtransport;
  }

  /**
   * Create a transport that uses the smart protocol over `subtransport`.
   *
   * @param stateless true if the protocol is stateless (`http://` is,
   * `git://` is not)
   */
  static smart(
    remote: RemoteHandle,
    stateless: boolean,
    subtransport: SmartSubtransport,
  ): Transport {
    return new Transport(remote, stateless, subtransport);
  }

  /**
   * Get the stream for one protocol phase.
   */
  async action(url: string, service: Service): Promise<SmartSubtransportStream> {
    if (this.freed) {
      throw new ProtocolViolationError("transport has been freed");
    }

    const generateStream = this.stateless || isListingService(service);
    if (!generateStream) {
      if (!this.stream) {
        throw new ProtocolViolationError(
          `no listing stream to continue with for service ${service}`,
        );
      }
      return this.stream;
    }

    try {
      this.stream = await this.subtransport.action(url, service);
    } catch (error) {
      throw foldError(error);
    }
    return this.stream;
  }

  async close(): Promise<void> {
    try {
      await this.subtransport.close();
    } catch (error) {
      throw foldError(error);
    }
  }

  /**
   * Close the subtransport and drop the remembered stream.
   */
  async free(): Promise<void> {
    if (this.freed) return;
    this.freed = true;
    this.stream = null;
    await this.close();
  }
}

function foldError(error: unknown): TransportError {
  if (error instanceof TransportError) {
    return error;
  }
  return new TransportError(describeTransportError(error), { cause: error });
}
