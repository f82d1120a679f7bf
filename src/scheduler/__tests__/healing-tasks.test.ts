import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { CertificateRefreshInvoker, type ReconcileResult } from "../../certs/cert-refresh.js";
import { HealingCycleRunner } from "../../healing/cycle-runner.js";
import { HealingInvoker } from "../../healing/healing-invoker.js";
import { createFakes, type FakeOptions } from "../../healing/__tests__/fakes.js";
import { ReentrantLock } from "../../locking/reentrant-lock.js";
import {
  HEAL_TASK_ID,
  HealingTaskError,
  REFRESH_TASK_ID,
  createHealHandler,
  createRefreshHandler,
  registerHealingTasks,
  unregisterHealingTasks,
} from "../healing-tasks.js";
import { Scheduler } from "../scheduler.js";

type Reconcile = () => Promise<ReconcileResult>;

const reconcileNothing: Reconcile = async () => ({ added: [], removed: [] });

function stackFor(options: FakeOptions, reconcile: Reconcile = reconcileNothing) {
  const lock = new ReentrantLock("entitlements");
  const fakes = createFakes(options);
  const refresh = new CertificateRefreshInvoker(lock, { reconcile });
  const healing = new HealingInvoker(lock, { ...fakes.deps, refresher: refresh });
  return { fakes, runner: new HealingCycleRunner(healing, refresh) };
}

function runnerFor(options: FakeOptions, reconcile: Reconcile = reconcileNothing) {
  return stackFor(options, reconcile).runner;
}

describe("healing tasks", () => {
  beforeEach(() => {
    vi.spyOn(console, "debug").mockImplementation(() => {});
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("registers heal and refresh outside any mutex group", () => {
    const scheduler = new Scheduler();
    registerHealingTasks(scheduler, runnerFor({ autoHeal: false }), {
      healIntervalMinutes: 60,
      refreshIntervalMinutes: 30,
      splayMinutes: 10,
      random: () => 0.5,
    });

    const heal = scheduler.getTask(HEAL_TASK_ID);
    const refresh = scheduler.getTask(REFRESH_TASK_ID);
    expect(heal).toMatchObject({
      name: "Entitlement Auto-Heal",
      intervalMs: 3_600_000,
      initialDelayMs: 300_000,
      circuitBreaker: { maxFailures: 3, resetTimeMs: 300_000 },
    });
    expect(heal?.mutexGroup).toBeUndefined();
    expect(refresh).toMatchObject({
      name: "Certificate Refresh",
      intervalMs: 1_800_000,
      initialDelayMs: null,
    });
    expect(refresh?.mutexGroup).toBeUndefined();
  });

  it("runs a heal that fires while a refresh holds the lock", async () => {
    vi.useFakeTimers();
    let releaseRefresh: () => void = () => {};
    let reconciles = 0;
    const { fakes, runner } = stackFor({ autoHeal: false }, async () => {
      reconciles++;
      if (reconciles === 1) {
        await new Promise<void>((resolve) => {
          releaseRefresh = resolve;
        });
      }
      return { added: [], removed: [] };
    });
    const scheduler = new Scheduler({ random: () => 0.5 });
    registerHealingTasks(scheduler, runner, { splayMinutes: 5, random: () => 0.5 });
    scheduler.start();

    const refreshing = scheduler.trigger(REFRESH_TASK_ID);
    await vi.advanceTimersByTimeAsync(150_000);

    // Fired on its splay and now queued on the lock, not deferred.
    expect(scheduler.getTask(HEAL_TASK_ID)?.status).toBe("running");
    expect(fakes.client.getAccount).not.toHaveBeenCalled();

    releaseRefresh();
    await refreshing;
    await vi.waitFor(() => expect(fakes.client.getAccount).toHaveBeenCalledTimes(1));
    await vi.waitFor(() => expect(scheduler.getTask(HEAL_TASK_ID)?.lastSuccess).not.toBeNull());
    scheduler.stop();
  });

  it("still runs the next daily heal after the circuit opens", async () => {
    vi.useFakeTimers();
    const { fakes, runner } = stackFor({ accountError: new Error("offline") });
    const scheduler = new Scheduler({ random: () => 0.5 });
    registerHealingTasks(scheduler, runner, { runOnStart: false });
    scheduler.start();

    await scheduler.trigger(HEAL_TASK_ID);
    await scheduler.trigger(HEAL_TASK_ID);
    await scheduler.trigger(HEAL_TASK_ID);
    expect(scheduler.getTask(HEAL_TASK_ID)?.status).toBe("circuit_open");

    await vi.advanceTimersByTimeAsync(24 * 60 * 60 * 1000);

    await vi.waitFor(() => expect(fakes.client.getAccount).toHaveBeenCalledTimes(4));
    scheduler.stop();
  });

  it("waits a full interval when not running on start", () => {
    const scheduler = new Scheduler();
    registerHealingTasks(scheduler, runnerFor({ autoHeal: false }), { runOnStart: false });

    expect(scheduler.getTask(HEAL_TASK_ID)?.initialDelayMs).toBeNull();
    expect(scheduler.getTask(HEAL_TASK_ID)?.intervalMs).toBe(86_400_000);
  });

  it("unregisters both tasks", () => {
    const scheduler = new Scheduler();
    registerHealingTasks(scheduler, runnerFor({ autoHeal: false }));
    unregisterHealingTasks(scheduler);

    expect(scheduler.getStatus()).toEqual([]);
  });

  it("completes a clean heal cycle", async () => {
    await expect(createHealHandler(runnerFor({ autoHeal: true, validNow: false }))()).resolves.toBeUndefined();
  });

  it("fails the task when the cycle reports errors", async () => {
    const error = await createHealHandler(runnerFor({ accountError: new Error("offline") }))().catch(
      (e: unknown) => e,
    );

    expect(error).toBeInstanceOf(HealingTaskError);
    expect(error instanceof HealingTaskError && error.message).toBe("Auto-heal cycle failed: ServiceError: offline");
    expect(error instanceof HealingTaskError && error.failures).toEqual(["ServiceError: offline"]);
  });

  it("counts failed cycles against the circuit", async () => {
    const scheduler = new Scheduler();
    registerHealingTasks(scheduler, runnerFor({ accountError: new Error("offline") }));

    await scheduler.trigger(HEAL_TASK_ID);

    expect(scheduler.getTask(HEAL_TASK_ID)).toMatchObject({
      consecutiveFailures: 1,
      lastError: "Auto-heal cycle failed: ServiceError: offline",
    });
  });

  it("fails the refresh task when reconciling fails", async () => {
    const runner = runnerFor({ autoHeal: false }, async () => {
      throw new Error("disk full");
    });

    await expect(createRefreshHandler(runner)()).rejects.toThrow("Certificate refresh failed: disk full");
  });
});
