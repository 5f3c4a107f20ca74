/**
 * Async mutex for exclusive access to shared state across awaits.
 *
 * Waiters are served in FIFO order. Not reentrant: acquiring the lock
 * again from inside `withLock` deadlocks.
 */

export type ReleaseFn = () => void;

export class AsyncMutex {
  private locked = false;
  private waiters: Array<() => void> = [];

  /**
   * Resolves with a release function once the lock is held.
   * The caller must call it exactly once.
   */
  async acquire(): Promise<ReleaseFn> {
    if (this.locked) {
      await new Promise<void>((resolve) => {
        this.waiters.push(resolve);
      });
    }
    this.locked = true;

    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      if (next) {
        // Ownership passes straight to the next waiter.
        next();
      } else {
        this.locked = false;
      }
    };
  }

  async withLock<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  get isLocked(): boolean {
    return this.locked;
  }
}
