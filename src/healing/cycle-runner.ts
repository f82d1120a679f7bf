/**
 * Healing Cycle Runner - heal, then refresh
 *
 * Entitlement changes must reach the server before local state is
 * reconciled against it, so the top-level refresh starts only after the
 * healing invoker has returned and released the lock.
 *
 * @module healing/cycle-runner
 */

import type { CertificateRefreshInvoker, RefreshReport } from "../certs/cert-refresh.js";
import type { AuditSink } from "../security/audit-logger.js";
import { describeError } from "./errors.js";
import type { HealingInvoker } from "./healing-invoker.js";
import type { HealingReport } from "./healing-report.js";

export interface CycleReports {
  healing: HealingReport;
  refresh: RefreshReport;
}

export class HealingCycleRunner {
  constructor(
    private readonly healing: HealingInvoker,
    private readonly refresh: CertificateRefreshInvoker,
    private readonly auditLogger?: AuditSink,
  ) {}

  async run(now?: Date): Promise<CycleReports> {
    const healing = now ? await this.healing.updateAt(now) : await this.healing.update();
    const refresh = await this.refresh.update();

    try {
      await this.auditLogger?.log(
        "cycle_completed",
        {
          cycleId: healing.cycleId,
          grants: healing.grants.length,
          errors: healing.errors.map((e) => describeError(e)),
          refreshed: { added: refresh.added.length, removed: refresh.removed.length },
        },
        "scheduler",
      );
    } catch (e) {
      console.error("[healing] Audit write failed for cycle_completed:", e);
    }

    return { healing, refresh };
  }

  /** Top-level refresh on its own, for the refresh-only schedule. */
  refreshOnly(): Promise<RefreshReport> {
    return this.refresh.update();
  }
}
