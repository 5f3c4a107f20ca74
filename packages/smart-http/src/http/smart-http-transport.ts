/**
 * Smart HTTP subtransport.
 *
 * The transport maps each requested service to its document path and
 * method and hands out one stream per action. A stream performs exactly
 * one HTTP exchange, deferred until the host engine first reads or writes
 * it; streams the host never touches never open a connection.
 */

import { ProtocolViolationError } from "../api/errors.js";
import { type ActionBinding, getActionBinding, type Service } from "../api/service.js";
import type { SmartSubtransport, SmartSubtransportStream, TransportLogger } from "../api/types.js";
import type { ByteSource } from "../streams/byte-source.js";
import { BaseUrlCell } from "./base-url-cell.js";
import type { HttpExchange } from "./exchange.js";
import { computeRedirectBase } from "./redirect.js";

export interface SmartHttpTransportOptions {
  logger?: TransportLogger;
}

export class SmartHttpTransport implements SmartSubtransport {
  /**
   * URL of the remote server, e.g. "https://example.com/user/repo".
   * Idle until the first action; moved by redirects afterwards.
   */
  readonly baseUrl = new BaseUrlCell();
  private readonly exchange: HttpExchange;
  private readonly logger?: TransportLogger;
  private readonly streams = new Set<SmartHttpStream>();

  constructor(exchange: HttpExchange, options: SmartHttpTransportOptions = {}) {
    this.exchange = exchange;
    this.logger = options.logger;
  }

  async action(url: string, service: Service): Promise<SmartSubtransportStream> {
    await this.baseUrl.captureIfIdle(url);
    const binding = getActionBinding(service);
    this.logger?.info?.(`action ${binding.serviceName} ${binding.pathSuffix}`);
    const stream = new SmartHttpStream(binding, this.baseUrl, this.exchange, this.logger);
    this.streams.add(stream);
    return stream;
  }

  /**
   * Close every stream handed out since the last close, dropping the
   * connections of bodies the host stopped reading.
   */
  async close(): Promise<void> {
    const streams = [...this.streams];
    this.streams.clear();
    await Promise.all(streams.map((stream) => stream.close()));
  }
}

type ExchangeState =
  | { kind: "not-started" }
  | { kind: "executing"; pending: Promise<ByteSource> }
  | { kind: "done"; body: ByteSource }
  | { kind: "failed"; error: unknown }
  | { kind: "closed" };

export class SmartHttpStream implements SmartSubtransportStream {
  readonly binding: ActionBinding;
  private readonly baseUrl: BaseUrlCell;
  private readonly exchange: HttpExchange;
  private readonly logger?: TransportLogger;
  private state: ExchangeState = { kind: "not-started" };

  constructor(
    binding: ActionBinding,
    baseUrl: BaseUrlCell,
    exchange: HttpExchange,
    logger?: TransportLogger,
  ) {
    this.binding = binding;
    this.baseUrl = baseUrl;
    this.exchange = exchange;
    this.logger = logger;
  }

  /** Whether the HTTP exchange has been started. */
  get sentRequest(): boolean {
    return this.state.kind !== "not-started";
  }

  async write(data: Uint8Array): Promise<void> {
    if (this.binding.method !== "POST") {
      throw new ProtocolViolationError(
        `write not supported for ${this.binding.method} service ${this.binding.service}`,
      );
    }
    this.checkUsable();
    if (this.state.kind !== "not-started") {
      throw new ProtocolViolationError("already sent HTTP request");
    }
    await this.start(data);
  }

  async read(buffer: Uint8Array): Promise<number> {
    const body = await this.body();
    try {
      return await body.read(buffer);
    } catch (error) {
      this.fail(error);
      throw error;
    }
  }

  /**
   * Close the response body. Waits for an exchange in flight; later reads
   * and writes are refused.
   */
  async close(): Promise<void> {
    if (this.state.kind === "executing") {
      await Promise.allSettled([this.state.pending]);
    }
    const state = this.state;
    this.state = { kind: "closed" };
    if (state.kind === "done") {
      await state.body.close?.();
    }
  }

  private async body(): Promise<ByteSource> {
    this.checkUsable();
    switch (this.state.kind) {
      case "done":
        return this.state.body;
      case "executing":
        return this.state.pending;
      case "not-started":
        if (this.binding.method === "POST") {
          throw new ProtocolViolationError(
            `read before write on POST service ${this.binding.service}`,
          );
        }
        return this.start();
      case "failed":
        throw this.state.error;
      case "closed":
        throw new ProtocolViolationError("stream has been closed");
    }
  }

  private checkUsable(): void {
    switch (this.state.kind) {
      case "failed":
        throw new ProtocolViolationError("stream has already failed", { cause: this.state.error });
      case "closed":
        throw new ProtocolViolationError("stream has been closed");
    }
  }

  private start(body?: Uint8Array): Promise<ByteSource> {
    const pending = this.execute(body).then(
      (source) => {
        this.state = { kind: "done", body: source };
        return source;
      },
      (error: unknown) => {
        this.fail(error);
        throw error;
      },
    );
    this.state = { kind: "executing", pending };
    return pending;
  }

  private async execute(body?: Uint8Array): Promise<ByteSource> {
    const base = await this.baseUrl.get();
    if (base.kind === "idle") {
      throw new ProtocolViolationError("stream used before its transport captured a base URL");
    }
    const url = `${base.baseUrl}${this.binding.pathSuffix}`;
    const response = await this.exchange.execute({ url, binding: this.binding, body });

    if (response.redirectTarget !== undefined) {
      const newBase = computeRedirectBase(response.redirectTarget, this.binding.pathSuffix);
      this.logger?.info?.(`got redirect, updating base url to ${newBase}`);
      await this.baseUrl.update(newBase);
    }
    return response.body;
  }

  private fail(error: unknown): void {
    if (this.state.kind === "failed" || this.state.kind === "closed") return;
    this.logger?.error?.(`${this.binding.method} ${this.binding.pathSuffix} failed:`, error);
    this.state = { kind: "failed", error };
  }
}
