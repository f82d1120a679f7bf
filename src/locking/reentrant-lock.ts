/**
 * Reentrant Lock - async mutual exclusion owned by a call context
 *
 * A holder is identified by the async context that acquired the lock, so a
 * nested `runExclusive()` from inside the held section (directly or through
 * any number of awaits) enters immediately, while any other caller waits.
 * Waiters are served in arrival order.
 *
 * @example
 * ```ts
 * const lock = new ReentrantLock("entitlements");
 * await lock.runExclusive(async () => {
 *   await lock.runExclusive(async () => {
 *     // same owner, no deadlock
 *   });
 * });
 * ```
 *
 * @module locking/reentrant-lock
 */

import { AsyncLocalStorage } from "node:async_hooks";

export interface LockStats {
  acquireCount: number;
  reentryCount: number;
  contentionCount: number;
  totalWaitTimeMs: number;
  waitingCount: number;
  isLocked: boolean;
}

export class ReentrantLock {
  private readonly owner = new AsyncLocalStorage<symbol>();
  private holder: symbol | null = null;
  private depth = 0;
  private readonly waitQueue: Array<() => void> = [];
  private readonly stats = {
    acquireCount: 0,
    reentryCount: 0,
    contentionCount: 0,
    totalWaitTimeMs: 0,
  };

  constructor(readonly name: string = "lock") {}

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    if (this.isHeldByCurrentContext()) {
      this.depth++;
      this.stats.reentryCount++;
      try {
        return await fn();
      } finally {
        this.depth--;
      }
    }

    const token = await this.acquire();
    this.depth = 1;
    try {
      return await this.owner.run(token, fn);
    } finally {
      this.release(token);
    }
  }

  isLocked(): boolean {
    return this.holder !== null;
  }

  isHeldByCurrentContext(): boolean {
    const current = this.owner.getStore();
    return current !== undefined && current === this.holder;
  }

  /** Nesting depth of the current holder; 0 when free. */
  getDepth(): number {
    return this.holder === null ? 0 : this.depth;
  }

  getStats(): LockStats {
    return {
      ...this.stats,
      waitingCount: this.waitQueue.length,
      isLocked: this.isLocked(),
    };
  }

  private acquire(): Promise<symbol> {
    const token = Symbol(this.name);
    this.stats.acquireCount++;

    if (this.holder === null) {
      this.holder = token;
      return Promise.resolve(token);
    }

    this.stats.contentionCount++;
    const queuedAt = Date.now();
    return new Promise<symbol>((resolve) => {
      // Ownership is handed over inside release() so no late caller can
      // slip in between.
      this.waitQueue.push(() => {
        this.stats.totalWaitTimeMs += Date.now() - queuedAt;
        this.holder = token;
        resolve(token);
      });
    });
  }

  private release(token: symbol): void {
    if (this.holder !== token) return;
    this.holder = null;
    this.depth = 0;
    const next = this.waitQueue.shift();
    if (next) next();
  }
}
