/**
 * Certificate Refresh - reconcile local entitlement state with the server
 *
 * Runs under the shared entitlement lock. Called from inside a healing cycle
 * right after a bind (re-entering the lock), and on its own schedule once
 * any healing cycle has finished.
 *
 * How grants become installed certificates is outside this package; the
 * bundled GrantSnapshotSource only tracks which grant ids are present.
 *
 * @module certs/cert-refresh
 */

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { describeError } from "../healing/errors.js";
import type { CertificateRefresher, Grant, IdentityProvider } from "../healing/types.js";
import { loadJsonFile, saveJsonFile } from "../infra/json-file.js";
import { ActionInvoker } from "../locking/action-invoker.js";
import type { ReentrantLock } from "../locking/reentrant-lock.js";
import type { AuditSink } from "../security/audit-logger.js";

export interface ReconcileResult {
  added: string[];
  removed: string[];
}

export interface CertificateSource {
  reconcile(): Promise<ReconcileResult>;
}

export interface RefreshReport extends ReconcileResult {
  completedAt: Date;
  errors: Error[];
}

export class CertificateRefreshInvoker extends ActionInvoker<RefreshReport> implements CertificateRefresher {
  constructor(
    lock: ReentrantLock,
    private readonly source: CertificateSource,
    private readonly auditLogger?: AuditSink,
    private readonly clock: () => Date = () => new Date(),
  ) {
    super(lock);
  }

  async refresh(): Promise<void> {
    const report = await this.update();
    if (report.errors.length > 0) {
      console.warn(`[cert-refresh] Refresh finished with ${report.errors.length} error(s)`);
    }
  }

  protected async doUpdate(): Promise<RefreshReport> {
    try {
      const { added, removed } = await this.source.reconcile();
      console.log(`[cert-refresh] Reconciled: ${added.length} added, ${removed.length} removed`);
      await this.audit("refresh_completed", { added, removed });
      return { added, removed, errors: [], completedAt: this.clock() };
    } catch (e) {
      const error = e instanceof Error ? e : new Error(String(e));
      console.error(`[cert-refresh] Refresh failed: ${describeError(error)}`);
      await this.audit("refresh_failed", { error: describeError(error) });
      return { added: [], removed: [], errors: [error], completedAt: this.clock() };
    }
  }

  private async audit(action: "refresh_completed" | "refresh_failed", details: Record<string, unknown>): Promise<void> {
    try {
      await this.auditLogger?.log(action, details, "system");
    } catch (e) {
      console.error(`[cert-refresh] Audit write failed for ${action}:`, e);
    }
  }
}

// -- Snapshot source ----------------------------------------------------------

export interface GrantLister {
  listGrants(accountId: string): Promise<Grant[]>;
}

const SnapshotSchema = Type.Object({
  accountId: Type.String(),
  updatedAt: Type.String(),
  grants: Type.Array(
    Type.Object({
      id: Type.String(),
      productId: Type.Union([Type.String(), Type.Null()]),
      endDate: Type.String(),
    }),
  ),
});

/**
 * Keeps a JSON snapshot of the account's grant ids and reports the
 * difference against the server on every reconcile.
 */
export class GrantSnapshotSource implements CertificateSource {
  constructor(
    private readonly client: GrantLister,
    private readonly identity: IdentityProvider,
    private readonly snapshotPath: string,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async reconcile(): Promise<ReconcileResult> {
    const accountId = await this.identity.getAccountId();
    const grants = await this.client.listGrants(accountId);

    const previous = this.readSnapshotIds(accountId);
    const current = new Set(grants.map((g) => g.id));

    const added = [...current].filter((id) => !previous.has(id)).sort();
    const removed = [...previous].filter((id) => !current.has(id)).sort();

    saveJsonFile(this.snapshotPath, {
      accountId,
      updatedAt: this.clock().toISOString(),
      grants: grants.map((g) => ({
        id: g.id,
        productId: g.productId ?? null,
        endDate: g.endDate.toISOString(),
      })),
    });

    return { added, removed };
  }

  private readSnapshotIds(accountId: string): Set<string> {
    const raw = loadJsonFile(this.snapshotPath);
    if (raw === undefined) return new Set();

    if (!Value.Check(SnapshotSchema, raw)) {
      console.warn(`[cert-refresh] Snapshot ${this.snapshotPath} is malformed, starting over`);
      return new Set();
    }
    if (raw.accountId !== accountId) {
      console.warn(`[cert-refresh] Snapshot belongs to ${raw.accountId}, starting over`);
      return new Set();
    }
    return new Set(raw.grants.map((g) => g.id));
  }
}
