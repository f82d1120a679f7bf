/**
 * Action Invoker - runs one update under the shared entitlement lock
 *
 * Everything that changes entitlement state, on the server or locally,
 * extends this class and shares one ReentrantLock instance. Whole updates are
 * serialized; an update started from inside another one re-enters.
 *
 * @module locking/action-invoker
 */

import type { ReentrantLock } from "./reentrant-lock.js";

export abstract class ActionInvoker<TReport> {
  constructor(protected readonly lock: ReentrantLock) {}

  update(): Promise<TReport> {
    return this.lock.runExclusive(() => this.doUpdate());
  }

  protected abstract doUpdate(): Promise<TReport>;
}
