/**
 * Healing types - collaborator contracts and cycle vocabulary
 *
 * The healing cycle talks to its collaborators only through these
 * interfaces. Concrete implementations live in service/, hooks/, certs/
 * and identity/; tests substitute fakes.
 *
 * @module healing/types
 */

import type { AuditSink } from "../security/audit-logger.js";
import type { AnomalousState, HookError, IdentityError, ServiceError } from "./errors.js";

// -- Remote records -----------------------------------------------------------

/** Account record as seen by the healing cycle. */
export interface ConsumerAccount {
  id: string;
  name?: string;
  /** Server-side permission to remediate automatically. Absent means disabled. */
  autoHeal?: boolean;
}

/** One entitlement grant attached to an account by a bind. */
export interface Grant {
  id: string;
  productId?: string;
  productName?: string;
  quantity: number;
  startDate: Date;
  endDate: Date;
}

// -- Collaborators ------------------------------------------------------------

export interface EntitlementClient {
  getAccount(accountId: string): Promise<ConsumerAccount>;
  /** Ask the server to attach coverage effective as of `instant`. */
  bind(accountId: string, instant: Date): Promise<Grant[]>;
}

/**
 * Answers from one cached validity status. `expiryInstant()` reads the status
 * loaded by the preceding `isValidAt()` call.
 */
export interface ValidityOracle {
  isValidAt(instant: Date): Promise<boolean>;
  expiryInstant(): Promise<Date | null>;
}

export type HookName = "pre_auto_attach" | "post_auto_attach";

export interface HookContext {
  accountId: string;
  grants?: readonly Grant[];
}

export interface HookDispatcher {
  run(name: HookName, context: HookContext): Promise<void>;
}

/**
 * Reconciles local credential state with server-side entitlements.
 * Implementations own their error handling; the healing cycle only
 * guarantees the call happens after every bind.
 */
export interface CertificateRefresher {
  refresh(): Promise<void>;
}

export interface IdentityProvider {
  getAccountId(): Promise<string>;
}

// -- Cycle --------------------------------------------------------------------

export type HealingPhase =
  | "IDLE"
  | "CHECKING_TODAY"
  | "REMEDIATING_TODAY"
  | "CHECKING_TOMORROW"
  | "REMEDIATING_TOMORROW"
  | "SATISFIED"
  | "DONE";

export type HealingOutcome =
  | "skipped"
  | "valid_today"
  | "valid_today_and_tomorrow"
  | "healed_today"
  | "healed_tomorrow";

export type HealingFailure = ServiceError | HookError | IdentityError;
export type HealingWarning = AnomalousState;

export interface HealingDependencies {
  client: EntitlementClient;
  validity: ValidityOracle;
  hooks: HookDispatcher;
  refresher: CertificateRefresher;
  identity: IdentityProvider;
  auditLogger?: AuditSink;
  /** Wall clock used when `perform()` is called without an instant. */
  clock?: () => Date;
}
