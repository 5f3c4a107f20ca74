/**
 * Base URL shared by every stream a smart HTTP transport spawns.
 *
 * Idle until the first action captures the remote URL. After that only a
 * redirect discovered by an exchange moves it. All access goes through the
 * mutex, so a redirect written by one exchange is what the next action sees.
 */

import { AsyncMutex } from "../utils/async-mutex.js";

export type BaseUrlState = { kind: "idle" } | { kind: "active"; baseUrl: string };

export class BaseUrlCell {
  private readonly mutex = new AsyncMutex();
  private state: BaseUrlState = { kind: "idle" };

  /**
   * Capture `url` when idle; an active base is never overwritten.
   * Resolves to the base URL in effect afterwards.
   */
  async captureIfIdle(url: string): Promise<string> {
    return this.mutex.withLock(() => {
      if (this.state.kind === "idle") {
        this.state = { kind: "active", baseUrl: url };
        return url;
      }
      return this.state.baseUrl;
    });
  }

  async get(): Promise<BaseUrlState> {
    return this.mutex.withLock(() => this.state);
  }

  /**
   * Move the base after a redirect.
   */
  async update(baseUrl: string): Promise<void> {
    await this.mutex.withLock(() => {
      this.state = { kind: "active", baseUrl };
    });
  }
}
