/**
 * Healing Invoker - scheduler-facing entry point for one healing cycle
 *
 * Holds the shared entitlement lock for the whole decision, so no other
 * locked update (a certificate refresh in particular) interleaves with it.
 * The refresh triggered from inside the cycle re-enters the same lock.
 *
 * Ordering contract: a top-level certificate refresh must be started only
 * after `update()` has resolved. HealingCycleRunner does this.
 *
 * @module healing/healing-invoker
 */

import { ActionInvoker } from "../locking/action-invoker.js";
import type { ReentrantLock } from "../locking/reentrant-lock.js";
import { HealingDecision, type HealingResult } from "./healing-decision.js";
import type { HealingReport } from "./healing-report.js";
import type { HealingDependencies } from "./types.js";

export class HealingInvoker extends ActionInvoker<HealingReport> {
  private readonly decision: HealingDecision;
  private lastResult: HealingResult | null = null;

  constructor(lock: ReentrantLock, deps: HealingDependencies) {
    super(lock);
    this.decision = new HealingDecision(deps);
  }

  /** Run one cycle at an explicit instant instead of the wall clock. */
  updateAt(now: Date): Promise<HealingReport> {
    return this.lock.runExclusive(() => this.runCycle(now));
  }

  /** Result of the most recent completed cycle, if any. */
  getLastResult(): HealingResult | null {
    return this.lastResult;
  }

  protected doUpdate(): Promise<HealingReport> {
    return this.runCycle();
  }

  private async runCycle(now?: Date): Promise<HealingReport> {
    const result = await this.decision.perform(now);
    this.lastResult = result;
    return result.report;
  }
}
