/**
 * Healing Report - per-cycle accumulator
 *
 * Created fresh by each cycle, appended to while the cycle runs, sealed
 * before it is handed back. A skipped cycle and a cycle that found coverage
 * valid both produce an empty report.
 *
 * @module healing/healing-report
 */

import { v4 as uuidv4 } from "uuid";
import { describeError } from "./errors.js";
import type { Grant, HealingFailure, HealingWarning } from "./types.js";

export interface HealingReportJson {
  cycleId: string;
  startedAt: string;
  grants: Array<{
    id: string;
    productId: string | null;
    productName: string | null;
    quantity: number;
    startDate: string;
    endDate: string;
  }>;
  errors: string[];
  warnings: string[];
}

export class HealingReport {
  readonly cycleId: string;
  readonly startedAt: Date;
  private readonly grantList: Grant[] = [];
  private readonly errorList: HealingFailure[] = [];
  private readonly warningList: HealingWarning[] = [];
  private sealed = false;

  constructor(startedAt: Date = new Date(), cycleId: string = uuidv4()) {
    this.startedAt = startedAt;
    this.cycleId = cycleId;
  }

  addGrants(grants: readonly Grant[]): void {
    this.assertOpen();
    this.grantList.push(...grants);
  }

  addError(error: HealingFailure): void {
    this.assertOpen();
    this.errorList.push(error);
  }

  addWarning(warning: HealingWarning): void {
    this.assertOpen();
    this.warningList.push(warning);
  }

  /** Freeze the report. Called by the cycle that owns it, once. */
  seal(): this {
    this.sealed = true;
    return this;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  get grants(): readonly Grant[] {
    return this.grantList;
  }

  get errors(): readonly HealingFailure[] {
    return this.errorList;
  }

  get warnings(): readonly HealingWarning[] {
    return this.warningList;
  }

  hasErrors(): boolean {
    return this.errorList.length > 0;
  }

  /** No grants and no errors. Warnings do not count. */
  isEmpty(): boolean {
    return this.grantList.length === 0 && this.errorList.length === 0;
  }

  toJSON(): HealingReportJson {
    return {
      cycleId: this.cycleId,
      startedAt: this.startedAt.toISOString(),
      grants: this.grantList.map((g) => ({
        id: g.id,
        productId: g.productId ?? null,
        productName: g.productName ?? null,
        quantity: g.quantity,
        startDate: g.startDate.toISOString(),
        endDate: g.endDate.toISOString(),
      })),
      errors: this.errorList.map((e) => describeError(e)),
      warnings: this.warningList.map((w) => w.message),
    };
  }

  private assertOpen(): void {
    if (this.sealed) {
      throw new Error(`[healing] Report ${this.cycleId} is sealed`);
    }
  }
}
