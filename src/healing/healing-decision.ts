/**
 * Healing Decision - two-horizon coverage check
 *
 * Checks coverage for "now" and, when that holds, for 24 hours from now,
 * asking the entitlement service to bind new coverage for the first horizon
 * that has a gap. At most one bind per cycle: a gap today short-circuits the
 * tomorrow check, which the next cycle picks up.
 *
 * Cycle phases:
 *
 *   IDLE → CHECKING_TODAY → REMEDIATING_TODAY ─────────────────────┐
 *                         → CHECKING_TOMORROW → REMEDIATING_TOMORROW → DONE
 *                                             → SATISFIED ─────────┘
 *   IDLE → DONE (auto-heal disabled on the account)
 *
 * Hooks: pre_auto_attach, post_auto_attach
 *
 * @module healing/healing-decision
 */

import type { AuditAction } from "../security/audit-logger.js";
import { AnomalousState, HookError, describeError, toHealingFailure } from "./errors.js";
import { HealingReport } from "./healing-report.js";
import type {
  Grant,
  HealingDependencies,
  HealingFailure,
  HealingOutcome,
  HealingPhase,
  HookContext,
  HookName,
} from "./types.js";

export const HEALING_HORIZON_MS = 24 * 60 * 60 * 1000;

export type HealingResult =
  | {
      ok: true;
      outcome: HealingOutcome;
      trace: readonly HealingPhase[];
      report: HealingReport;
    }
  | {
      ok: false;
      failedAt: HealingPhase;
      errors: readonly HealingFailure[];
      trace: readonly HealingPhase[];
      report: HealingReport;
    };

/** Per-call bookkeeping; never shared between cycles. */
interface Cycle {
  now: Date;
  tomorrow: Date;
  report: HealingReport;
  trace: HealingPhase[];
  accountId: string | null;
}

export class HealingDecision {
  private readonly clock: () => Date;

  constructor(private readonly deps: HealingDependencies) {
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Run one decision. Never rejects: failures land in the result and in
   * the report.
   */
  async perform(now: Date = this.clock()): Promise<HealingResult> {
    const cycle: Cycle = {
      now,
      tomorrow: new Date(now.getTime() + HEALING_HORIZON_MS),
      report: new HealingReport(now),
      trace: ["IDLE"],
      accountId: null,
    };

    try {
      const outcome = await this.decide(cycle);
      enter(cycle, "DONE");
      console.debug(`[healing] ${describeOutcome(outcome, cycle.now, cycle.tomorrow)}`);
      return { ok: true, outcome, trace: cycle.trace, report: cycle.report.seal() };
    } catch (e) {
      const failure = toHealingFailure(e);
      const failedAt = currentPhase(cycle);
      cycle.report.addError(failure);
      enter(cycle, "DONE");

      console.error(`[healing] Error attempting to auto-heal during ${failedAt}: ${describeError(failure)}`);
      await this.audit("heal_failed", {
        cycleId: cycle.report.cycleId,
        accountId: cycle.accountId,
        phase: failedAt,
        error: describeError(failure),
      });

      return {
        ok: false,
        failedAt,
        errors: cycle.report.errors,
        trace: cycle.trace,
        report: cycle.report.seal(),
      };
    }
  }

  private async decide(cycle: Cycle): Promise<HealingOutcome> {
    const accountId = await this.deps.identity.getAccountId();
    cycle.accountId = accountId;

    const account = await this.deps.client.getAccount(accountId);
    if (account.autoHeal !== true) {
      console.warn("[healing] Auto-heal disabled on server, skipping.");
      await this.audit("heal_skipped", { cycleId: cycle.report.cycleId, accountId });
      return "skipped";
    }

    enter(cycle, "CHECKING_TODAY");
    if (!(await this.deps.validity.isValidAt(cycle.now))) {
      console.warn(`[healing] Found invalid entitlements for today: ${cycle.now.toISOString()}`);
      enter(cycle, "REMEDIATING_TODAY");
      await this.remediate(cycle, accountId, cycle.now);
      return "healed_today";
    }

    enter(cycle, "CHECKING_TOMORROW");
    const compliantUntil = await this.deps.validity.expiryInstant();

    if (compliantUntil === null) {
      const warning = new AnomalousState("Got valid status from server but no valid until date.", cycle.now);
      console.warn(`[healing] ${warning.message}`);
      cycle.report.addWarning(warning);
      enter(cycle, "SATISFIED");
      await this.auditChecked(cycle, accountId, null);
      return "valid_today";
    }

    if (cycle.tomorrow.getTime() > compliantUntil.getTime()) {
      console.warn(`[healing] Entitlements will be invalid by tomorrow: ${cycle.tomorrow.toISOString()}`);
      enter(cycle, "REMEDIATING_TOMORROW");
      await this.remediate(cycle, accountId, cycle.tomorrow);
      return "healed_tomorrow";
    }

    enter(cycle, "SATISFIED");
    await this.auditChecked(cycle, accountId, compliantUntil);
    return "valid_today_and_tomorrow";
  }

  /**
   * pre-hook → bind → post-hook, then the certificate refresh. The refresh
   * follows every successful bind, including one whose post-hook failed.
   */
  private async remediate(cycle: Cycle, accountId: string, instant: Date): Promise<void> {
    await this.runHook("pre_auto_attach", { accountId });

    await this.audit("heal_bind_requested", {
      cycleId: cycle.report.cycleId,
      accountId,
      instant: instant.toISOString(),
    });

    const grants = await this.deps.client.bind(accountId, instant);
    cycle.report.addGrants(grants);

    await this.audit("heal_bind_completed", {
      cycleId: cycle.report.cycleId,
      accountId,
      instant: instant.toISOString(),
      grants: grants.map((g: Grant) => g.id),
    });

    try {
      await this.runHook("post_auto_attach", { accountId, grants });
    } finally {
      await this.refreshCertificates();
    }
  }

  private async runHook(name: HookName, context: HookContext): Promise<void> {
    try {
      await this.deps.hooks.run(name, context);
    } catch (e) {
      if (e instanceof HookError) throw e;
      const message = e instanceof Error ? e.message : String(e);
      throw new HookError(message, name, { cause: e });
    }
  }

  private async refreshCertificates(): Promise<void> {
    try {
      await this.deps.refresher.refresh();
    } catch (e) {
      // Refresh failures belong to the refresher's own reporting.
      console.error(`[healing] Certificate refresh after bind failed: ${describeError(e)}`);
    }
  }

  private async auditChecked(cycle: Cycle, accountId: string, compliantUntil: Date | null): Promise<void> {
    await this.audit("heal_checked", {
      cycleId: cycle.report.cycleId,
      accountId,
      today: cycle.now.toISOString(),
      compliantUntil: compliantUntil?.toISOString() ?? null,
    });
  }

  private async audit(action: AuditAction, details: Record<string, unknown>): Promise<void> {
    if (!this.deps.auditLogger) return;
    try {
      await this.deps.auditLogger.log(action, details, "system");
    } catch (e) {
      console.error(`[healing] Audit write failed for ${action}:`, e);
    }
  }
}

function enter(cycle: Cycle, phase: HealingPhase): void {
  console.debug(`[healing] ${currentPhase(cycle)} → ${phase}`);
  cycle.trace.push(phase);
}

function currentPhase(cycle: Cycle): HealingPhase {
  return cycle.trace[cycle.trace.length - 1] ?? "IDLE";
}

export function describeOutcome(outcome: HealingOutcome, today: Date, tomorrow: Date): string {
  switch (outcome) {
    case "skipped":
      return "Entitlement auto healing skipped: auto-heal is disabled for this account";
    case "valid_today":
      return `Entitlement auto healing was checked and entitlements are valid today ${today.toISOString()}`;
    case "valid_today_and_tomorrow":
      return (
        `Entitlement auto healing was checked and entitlements are valid today ${today.toISOString()}` +
        ` and tomorrow ${tomorrow.toISOString()}`
      );
    case "healed_today":
      return `Entitlement auto healing attached coverage for today ${today.toISOString()}`;
    case "healed_tomorrow":
      return `Entitlement auto healing attached coverage for tomorrow ${tomorrow.toISOString()}`;
  }
}
