/**
 * Scheduler - periodic tasks with jitter, splay and circuit breakers
 *
 * Each task re-arms its own timer after every run. A task that keeps
 * failing opens its circuit and is skipped until the reset window passes.
 * Tasks sharing a mutex group never run at the same time; a task that finds
 * its group busy is deferred to its next slot.
 *
 * @module scheduler/scheduler
 */

export type TaskStatus = "idle" | "running" | "circuit_open" | "disabled";

export interface CircuitBreakerConfig {
  maxFailures: number;
  resetTimeMs: number;
}

export interface TaskRegistration {
  id: string;
  name: string;
  intervalMs: number;
  /** ± range added to each interval. Defaults to a percentage of the interval. */
  jitterMs?: number;
  /** Delay before the first run when the scheduler starts. Defaults to a full interval. */
  initialDelayMs?: number;
  handler: () => Promise<void>;
  circuitBreaker?: Partial<CircuitBreakerConfig>;
  mutexGroup?: string;
}

export interface ScheduledTask {
  id: string;
  name: string;
  intervalMs: number;
  jitterMs: number;
  initialDelayMs: number | null;
  handler: () => Promise<void>;
  status: TaskStatus;
  lastRun: Date | null;
  lastSuccess: Date | null;
  lastError: string | null;
  consecutiveFailures: number;
  circuitBreaker: CircuitBreakerConfig;
  mutexGroup?: string;
}

export interface TaskStatusView {
  id: string;
  name: string;
  status: TaskStatus;
  lastRun: string | null;
  lastSuccess: string | null;
  lastError: string | null;
  consecutiveFailures: number;
  scheduled: boolean;
}

export interface SchedulerConfig {
  defaultJitterPercent?: number;
  defaultCircuitBreaker?: CircuitBreakerConfig;
  /** Floor for any computed delay. */
  minDelayMs?: number;
  random?: () => number;
}

const DEFAULT_CIRCUIT_BREAKER: CircuitBreakerConfig = {
  maxFailures: 3,
  resetTimeMs: 5 * 60 * 1000,
};

export class Scheduler {
  private readonly tasks = new Map<string, ScheduledTask>();
  private readonly timers = new Map<string, NodeJS.Timeout>();
  private readonly busyGroups = new Map<string, string>();
  private readonly config: Required<SchedulerConfig>;
  private running = false;

  constructor(config: SchedulerConfig = {}) {
    this.config = {
      defaultJitterPercent: config.defaultJitterPercent ?? 10,
      defaultCircuitBreaker: config.defaultCircuitBreaker ?? DEFAULT_CIRCUIT_BREAKER,
      minDelayMs: config.minDelayMs ?? 1000,
      random: config.random ?? Math.random,
    };
  }

  register(registration: TaskRegistration): void {
    if (this.tasks.has(registration.id)) {
      throw new Error(`[scheduler] Task already registered: ${registration.id}`);
    }

    const jitterMs =
      registration.jitterMs ?? Math.floor((registration.intervalMs * this.config.defaultJitterPercent) / 100);

    this.tasks.set(registration.id, {
      id: registration.id,
      name: registration.name,
      intervalMs: registration.intervalMs,
      jitterMs,
      initialDelayMs: registration.initialDelayMs ?? null,
      handler: registration.handler,
      status: "idle",
      lastRun: null,
      lastSuccess: null,
      lastError: null,
      consecutiveFailures: 0,
      circuitBreaker: { ...this.config.defaultCircuitBreaker, ...registration.circuitBreaker },
      mutexGroup: registration.mutexGroup,
    });

    console.log(`[scheduler] Registered ${registration.name} (${registration.intervalMs}ms ±${jitterMs}ms)`);

    if (this.running) {
      this.arm(registration.id, true);
    }
  }

  unregister(taskId: string): boolean {
    this.clearTimer(taskId);
    return this.tasks.delete(taskId);
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    for (const taskId of this.tasks.keys()) {
      this.arm(taskId, true);
    }
    console.log(`[scheduler] Started with ${this.tasks.size} task(s)`);
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;
    for (const taskId of [...this.timers.keys()]) {
      this.clearTimer(taskId);
    }
    console.log("[scheduler] Stopped");
  }

  isRunning(): boolean {
    return this.running;
  }

  /** Run a task now, outside its timer. Returns false for unknown ids. */
  async trigger(taskId: string): Promise<boolean> {
    if (!this.tasks.has(taskId)) return false;
    this.clearTimer(taskId);
    await this.execute(taskId, true);
    return true;
  }

  disable(taskId: string): void {
    const task = this.tasks.get(taskId);
    if (!task) return;
    task.status = "disabled";
    this.clearTimer(taskId);
    console.log(`[scheduler] Disabled ${task.name}`);
  }

  enable(taskId: string): void {
    const task = this.tasks.get(taskId);
    if (!task || task.status !== "disabled") return;
    task.status = "idle";
    task.consecutiveFailures = 0;
    this.arm(taskId, false);
    console.log(`[scheduler] Enabled ${task.name}`);
  }

  resetCircuitBreaker(taskId: string): void {
    const task = this.tasks.get(taskId);
    if (!task) return;
    task.status = "idle";
    task.consecutiveFailures = 0;
  }

  getTask(taskId: string): ScheduledTask | undefined {
    return this.tasks.get(taskId);
  }

  getStatus(): TaskStatusView[] {
    return [...this.tasks.values()].map((task) => ({
      id: task.id,
      name: task.name,
      status: task.status,
      lastRun: task.lastRun?.toISOString() ?? null,
      lastSuccess: task.lastSuccess?.toISOString() ?? null,
      lastError: task.lastError,
      consecutiveFailures: task.consecutiveFailures,
      scheduled: this.timers.has(task.id),
    }));
  }

  private arm(taskId: string, first: boolean): void {
    const task = this.tasks.get(taskId);
    if (!task || !this.running || task.status === "disabled") return;

    const delay = first && task.initialDelayMs !== null ? task.initialDelayMs : this.nextDelay(task);
    this.clearTimer(taskId);
    this.timers.set(
      taskId,
      setTimeout(() => {
        this.timers.delete(taskId);
        void this.execute(taskId, false);
      }, delay),
    );
  }

  private nextDelay(task: ScheduledTask): number {
    const jitter = Math.floor(this.config.random() * task.jitterMs * 2) - task.jitterMs;
    return Math.max(this.config.minDelayMs, task.intervalMs + jitter);
  }

  /** Never rejects; handler failures are counted against the circuit. */
  private async execute(taskId: string, manual: boolean): Promise<void> {
    const task = this.tasks.get(taskId);
    if (!task || task.status === "disabled") return;
    if (!manual && !this.running) return;

    if (task.status === "circuit_open") {
      const sinceLastRun = task.lastRun ? Date.now() - task.lastRun.getTime() : Infinity;
      if (!manual && sinceLastRun < task.circuitBreaker.resetTimeMs) {
        this.arm(taskId, false);
        return;
      }
      console.log(`[scheduler] Circuit half-open for ${task.name}`);
    }

    if (task.mutexGroup) {
      const holder = this.busyGroups.get(task.mutexGroup);
      if (holder !== undefined && holder !== taskId) {
        console.log(`[scheduler] ${task.name} deferred, ${task.mutexGroup} held by ${holder}`);
        this.arm(taskId, false);
        return;
      }
      this.busyGroups.set(task.mutexGroup, taskId);
    }

    task.status = "running";
    task.lastRun = new Date();

    try {
      await task.handler();
      task.status = "idle";
      task.lastSuccess = new Date();
      task.lastError = null;
      task.consecutiveFailures = 0;
      console.log(`[scheduler] ${task.name} completed`);
    } catch (e) {
      task.consecutiveFailures++;
      task.lastError = e instanceof Error ? e.message : String(e);

      if (task.consecutiveFailures >= task.circuitBreaker.maxFailures) {
        task.status = "circuit_open";
        console.error(`[scheduler] Circuit OPEN for ${task.name} after ${task.consecutiveFailures} failures`);
      } else {
        task.status = "idle";
        console.warn(
          `[scheduler] ${task.name} failed (${task.consecutiveFailures}/${task.circuitBreaker.maxFailures}): ${task.lastError}`,
        );
      }
    } finally {
      if (task.mutexGroup) {
        this.busyGroups.delete(task.mutexGroup);
      }
      this.arm(taskId, false);
    }
  }

  private clearTimer(taskId: string): void {
    const timer = this.timers.get(taskId);
    if (timer) {
      clearTimeout(timer);
      this.timers.delete(taskId);
    }
  }
}
