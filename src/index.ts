/**
 * Entitlement auto-heal
 *
 * @module entitlement-autoheal
 */

// Healing core
export { HealingDecision, describeOutcome, HEALING_HORIZON_MS, type HealingResult } from "./healing/healing-decision.js";
export { HealingReport, type HealingReportJson } from "./healing/healing-report.js";
export { HealingInvoker } from "./healing/healing-invoker.js";
export { HealingCycleRunner, type CycleReports } from "./healing/cycle-runner.js";
export { ServiceError, HookError, IdentityError, AnomalousState, describeError } from "./healing/errors.js";
export type {
  CertificateRefresher,
  ConsumerAccount,
  EntitlementClient,
  Grant,
  HealingDependencies,
  HealingFailure,
  HealingOutcome,
  HealingPhase,
  HealingWarning,
  HookContext,
  HookDispatcher,
  HookName,
  IdentityProvider,
  ValidityOracle,
} from "./healing/types.js";

// Locking
export { ReentrantLock, type LockStats } from "./locking/reentrant-lock.js";
export { ActionInvoker } from "./locking/action-invoker.js";

// Collaborators
export {
  EntitlementServiceClient,
  type EntitlementServiceConfig,
  type ComplianceStatus,
} from "./service/entitlement-client.js";
export { ComplianceValidityOracle, type ComplianceSource } from "./service/compliance-oracle.js";
export {
  PluginHookDispatcher,
  type HookHandler,
  type HookRegistration,
} from "./hooks/hook-dispatcher.js";
export {
  CertificateRefreshInvoker,
  GrantSnapshotSource,
  type CertificateSource,
  type GrantLister,
  type ReconcileResult,
  type RefreshReport,
} from "./certs/cert-refresh.js";
export { FileIdentityProvider, StaticIdentityProvider } from "./identity/identity-provider.js";

// Ambient
export { AuditLogger, type AuditEntry, type AuditSink, type AuditAction, type AuditActor } from "./security/audit-logger.js";
export { loadConfig, ConfigError, type AutohealConfig } from "./config/config.js";
export { Scheduler, type TaskRegistration, type TaskStatus } from "./scheduler/scheduler.js";
export {
  registerHealingTasks,
  unregisterHealingTasks,
  HEAL_TASK_ID,
  REFRESH_TASK_ID,
} from "./scheduler/healing-tasks.js";

// Wiring
export {
  createAutohealRuntime,
  startAutohealDaemon,
  type AutohealRuntime,
  type AutohealDaemon,
} from "./autoheal.js";
