/**
 * Compliance Validity Oracle
 *
 * Answers "is coverage valid at T" and "when does current coverage end"
 * from the server's compliance status. `isValidAt()` loads the status as
 * of the asked instant and caches it; `expiryInstant()` reads that cache, so
 * one healing cycle sees a single, consistent status.
 *
 * @module service/compliance-oracle
 */

import type { IdentityProvider, ValidityOracle } from "../healing/types.js";
import type { ComplianceStatus } from "./entitlement-client.js";

export interface ComplianceSource {
  getCompliance(accountId: string, onDate: Date): Promise<ComplianceStatus>;
}

interface CachedStatus {
  onDate: Date;
  status: ComplianceStatus;
}

export class ComplianceValidityOracle implements ValidityOracle {
  private cached: CachedStatus | null = null;

  constructor(
    private readonly source: ComplianceSource,
    private readonly identity: IdentityProvider,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async isValidAt(instant: Date): Promise<boolean> {
    const status = await this.load(instant);
    return status.compliant;
  }

  async expiryInstant(): Promise<Date | null> {
    const status = this.cached?.status ?? (await this.load(this.clock()));
    return status.compliant ? status.compliantUntil : null;
  }

  private async load(onDate: Date): Promise<ComplianceStatus> {
    const accountId = await this.identity.getAccountId();
    const status = await this.source.getCompliance(accountId, onDate);
    this.cached = { onDate, status };
    console.debug(
      `[compliance] ${accountId} on ${onDate.toISOString()}: ${status.status}` +
        (status.compliantUntil ? ` until ${status.compliantUntil.toISOString()}` : ""),
    );
    return status;
  }
}
