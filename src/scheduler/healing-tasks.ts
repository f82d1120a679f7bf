/**
 * Healing Scheduler Tasks
 *
 * Registers the periodic heal cycle and the standalone certificate refresh.
 * No mutex group: both go through the shared entitlement lock, so a heal
 * that fires during a refresh waits for it instead of skipping a whole
 * interval. The heal task runs its own refresh after healing, in that order.
 *
 * @module scheduler/healing-tasks
 */

import type { HealingCycleRunner } from "../healing/cycle-runner.js";
import { describeError } from "../healing/errors.js";
import type { Scheduler } from "./scheduler.js";

export const HEAL_TASK_ID = "entitlement_heal";
export const REFRESH_TASK_ID = "cert_refresh";

export interface HealingTaskConfig {
  healIntervalMinutes?: number;
  refreshIntervalMinutes?: number;
  /** Upper bound for a random delay before the first heal. */
  splayMinutes?: number;
  /** Run the first heal after the splay instead of a full interval. */
  runOnStart?: boolean;
  random?: () => number;
}

const MINUTE_MS = 60 * 1000;

const DEFAULTS = {
  healIntervalMinutes: 24 * 60,
  refreshIntervalMinutes: 4 * 60,
  splayMinutes: 5,
  runOnStart: true,
};

export class HealingTaskError extends Error {
  constructor(
    message: string,
    public readonly cycleId: string,
    public readonly failures: string[],
  ) {
    super(message);
    this.name = "HealingTaskError";
  }
}

export function registerHealingTasks(
  scheduler: Scheduler,
  runner: HealingCycleRunner,
  config: HealingTaskConfig = {},
): void {
  const healIntervalMinutes = config.healIntervalMinutes ?? DEFAULTS.healIntervalMinutes;
  const refreshIntervalMinutes = config.refreshIntervalMinutes ?? DEFAULTS.refreshIntervalMinutes;
  const splayMinutes = config.splayMinutes ?? DEFAULTS.splayMinutes;
  const runOnStart = config.runOnStart ?? DEFAULTS.runOnStart;
  const random = config.random ?? Math.random;

  scheduler.register({
    id: HEAL_TASK_ID,
    name: "Entitlement Auto-Heal",
    intervalMs: healIntervalMinutes * MINUTE_MS,
    initialDelayMs: runOnStart ? Math.floor(random() * splayMinutes * MINUTE_MS) : undefined,
    handler: createHealHandler(runner),
  });

  scheduler.register({
    id: REFRESH_TASK_ID,
    name: "Certificate Refresh",
    intervalMs: refreshIntervalMinutes * MINUTE_MS,
    handler: createRefreshHandler(runner),
  });

  console.log(
    `[healing-tasks] Registered heal every ${healIntervalMinutes}m, refresh every ${refreshIntervalMinutes}m`,
  );
}

export function unregisterHealingTasks(scheduler: Scheduler): void {
  scheduler.unregister(HEAL_TASK_ID);
  scheduler.unregister(REFRESH_TASK_ID);
}

/**
 * A cycle whose report carries errors fails the task run, which counts
 * toward the circuit breaker. The heal task keeps the scheduler's default
 * reset window, which is shorter than a daily interval: an open circuit is
 * reported but does not hold back the next scheduled heal.
 */
export function createHealHandler(runner: HealingCycleRunner): () => Promise<void> {
  return async () => {
    const { healing, refresh } = await runner.run();

    console.log(
      `[healing-tasks] Cycle ${healing.cycleId}: ${healing.grants.length} grant(s), ` +
        `${healing.errors.length} error(s); refresh +${refresh.added.length}/-${refresh.removed.length}`,
    );

    if (healing.hasErrors()) {
      const failures = healing.errors.map((e) => describeError(e));
      throw new HealingTaskError(`Auto-heal cycle failed: ${failures.join("; ")}`, healing.cycleId, failures);
    }
  };
}

export function createRefreshHandler(runner: HealingCycleRunner): () => Promise<void> {
  return async () => {
    const report = await runner.refreshOnly();
    if (report.errors.length > 0) {
      throw new Error(`Certificate refresh failed: ${report.errors.map((e) => e.message).join("; ")}`);
    }
  };
}
