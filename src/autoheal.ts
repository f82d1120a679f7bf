/**
 * Wiring - builds the healing stack from configuration
 *
 * Every locked action shares one ReentrantLock, so a heal cycle, the
 * refresh it triggers, and a scheduled refresh are serialized against
 * each other.
 *
 * @module autoheal
 */

import { CertificateRefreshInvoker, GrantSnapshotSource } from "./certs/cert-refresh.js";
import type { AutohealConfig } from "./config/config.js";
import { HealingCycleRunner } from "./healing/cycle-runner.js";
import { HealingInvoker } from "./healing/healing-invoker.js";
import type { IdentityProvider } from "./healing/types.js";
import { PluginHookDispatcher } from "./hooks/hook-dispatcher.js";
import { FileIdentityProvider, StaticIdentityProvider } from "./identity/identity-provider.js";
import { ReentrantLock } from "./locking/reentrant-lock.js";
import { registerHealingTasks } from "./scheduler/healing-tasks.js";
import { Scheduler } from "./scheduler/scheduler.js";
import { AuditLogger } from "./security/audit-logger.js";
import { ComplianceValidityOracle } from "./service/compliance-oracle.js";
import { EntitlementServiceClient } from "./service/entitlement-client.js";

export interface AutohealRuntime {
  lock: ReentrantLock;
  auditLogger: AuditLogger;
  hooks: PluginHookDispatcher;
  identity: IdentityProvider;
  client: EntitlementServiceClient;
  healing: HealingInvoker;
  refresh: CertificateRefreshInvoker;
  runner: HealingCycleRunner;
}

export interface AutohealRuntimeOptions {
  fetch?: typeof fetch;
  hooks?: PluginHookDispatcher;
  clock?: () => Date;
}

export function createAutohealRuntime(config: AutohealConfig, opts: AutohealRuntimeOptions = {}): AutohealRuntime {
  const lock = new ReentrantLock("entitlements");
  const auditLogger = new AuditLogger(config.auditLogPath);
  const hooks = opts.hooks ?? new PluginHookDispatcher();

  const identity: IdentityProvider = config.accountId
    ? new StaticIdentityProvider(config.accountId)
    : new FileIdentityProvider(config.identityPath);

  const client = new EntitlementServiceClient({
    baseUrl: config.serviceUrl,
    token: config.token ?? undefined,
    timeoutMs: config.timeoutMs,
    fetch: opts.fetch,
  });

  const validity = new ComplianceValidityOracle(client, identity, opts.clock);
  const refresh = new CertificateRefreshInvoker(
    lock,
    new GrantSnapshotSource(client, identity, config.snapshotPath, opts.clock),
    auditLogger,
    opts.clock,
  );
  const healing = new HealingInvoker(lock, {
    client,
    validity,
    hooks,
    refresher: refresh,
    identity,
    auditLogger,
    clock: opts.clock,
  });
  const runner = new HealingCycleRunner(healing, refresh, auditLogger);

  return { lock, auditLogger, hooks, identity, client, healing, refresh, runner };
}

export interface AutohealDaemon {
  runtime: AutohealRuntime;
  scheduler: Scheduler;
  /** Idempotent; the caller owns signal registration. */
  shutdown: () => void;
}

export async function startAutohealDaemon(
  config: AutohealConfig,
  opts: AutohealRuntimeOptions = {},
): Promise<AutohealDaemon> {
  const runtime = createAutohealRuntime(config, opts);
  await runtime.auditLogger.initialize();

  const scheduler = new Scheduler();
  registerHealingTasks(scheduler, runtime.runner, {
    healIntervalMinutes: config.healIntervalMinutes,
    refreshIntervalMinutes: config.refreshIntervalMinutes,
    splayMinutes: config.splayMinutes,
    runOnStart: config.runOnStart,
  });
  scheduler.start();
  console.log("[autoheal] Daemon started");

  let stopped = false;
  const shutdown = () => {
    if (stopped) return;
    stopped = true;
    try {
      scheduler.stop();
    } catch (err) {
      console.error("[autoheal] scheduler.stop() failed during shutdown:", err);
    }
  };

  return { runtime, scheduler, shutdown };
}
