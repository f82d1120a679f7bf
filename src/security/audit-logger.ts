/**
 * Audit Logger - hash-chained record of remediation activity
 *
 * One JSON object per line. Each entry carries the SHA-256 of its own
 * content and the checksum of the entry before it, so an edited or deleted
 * line breaks the chain on `verify()`.
 *
 * @module security/audit-logger
 */

import { appendFile, mkdir, readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { createHash } from "node:crypto";
import { dirname } from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

const AuditActorSchema = Type.Union([
  Type.Literal("system"),
  Type.Literal("scheduler"),
  Type.Literal("user"),
]);

const AuditActionSchema = Type.Union([
  Type.Literal("heal_skipped"),
  Type.Literal("heal_checked"),
  Type.Literal("heal_bind_requested"),
  Type.Literal("heal_bind_completed"),
  Type.Literal("heal_failed"),
  Type.Literal("refresh_completed"),
  Type.Literal("refresh_failed"),
  Type.Literal("cycle_completed"),
]);

const AuditEntrySchema = Type.Object({
  timestamp: Type.String(),
  action: AuditActionSchema,
  actor: AuditActorSchema,
  details: Type.Record(Type.String(), Type.Unknown()),
  checksum: Type.String(),
  previous_checksum: Type.Union([Type.String(), Type.Null()]),
});

export type AuditActor = Static<typeof AuditActorSchema>;
export type AuditAction = Static<typeof AuditActionSchema>;
export type AuditEntry = Static<typeof AuditEntrySchema>;

/** The write side of the audit trail, as the healing components see it. */
export type AuditSink = Pick<AuditLogger, "log">;

export interface VerificationError {
  line: number;
  type: "chain_broken" | "checksum_mismatch" | "parse_error";
  message: string;
}

export interface VerificationResult {
  valid: boolean;
  entries: number;
  errors: VerificationError[];
}

export class AuditLogger {
  private lastChecksum: string | null = null;
  private initialized = false;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(
    private readonly logPath: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async initialize(): Promise<void> {
    if (this.initialized) return;

    await mkdir(dirname(this.logPath), { recursive: true });

    if (existsSync(this.logPath)) {
      const lines = await this.readLines();
      const last = lines[lines.length - 1];
      if (last !== undefined) {
        try {
          this.lastChecksum = parseEntry(last).checksum;
        } catch (e) {
          // A corrupt tail restarts the chain; verify() still reports it.
          console.warn("[audit] Could not read last checksum:", e);
        }
      }
    }

    this.initialized = true;
  }

  /**
   * Append an entry. Concurrent calls are written in call order so the
   * chain stays linear.
   */
  log(action: AuditAction, details: Record<string, unknown>, actor: AuditActor = "system"): Promise<void> {
    const write = this.writeChain.then(() => this.append(action, details, actor));
    this.writeChain = write.catch(() => undefined);
    return write;
  }

  private async append(action: AuditAction, details: Record<string, unknown>, actor: AuditActor): Promise<void> {
    if (!this.initialized) {
      await this.initialize();
    }

    const partial: Omit<AuditEntry, "checksum"> = {
      timestamp: this.now().toISOString(),
      action,
      actor,
      details,
      previous_checksum: this.lastChecksum,
    };
    const entry: AuditEntry = { ...partial, checksum: computeChecksum(partial) };

    await appendFile(this.logPath, `${JSON.stringify(entry)}\n`, "utf-8");
    this.lastChecksum = entry.checksum;
  }

  async verify(): Promise<VerificationResult> {
    if (!existsSync(this.logPath)) {
      return { valid: true, entries: 0, errors: [] };
    }

    const lines = await this.readLines();
    const errors: VerificationError[] = [];
    let previous: string | null = null;

    lines.forEach((line, index) => {
      let entry: AuditEntry;
      try {
        entry = parseEntry(line);
      } catch (e) {
        errors.push({ line: index + 1, type: "parse_error", message: String(e) });
        return;
      }

      if (entry.previous_checksum !== previous) {
        errors.push({
          line: index + 1,
          type: "chain_broken",
          message: `expected previous ${previous ?? "null"}, found ${entry.previous_checksum ?? "null"}`,
        });
      }

      const { checksum, ...rest } = entry;
      const computed = computeChecksum(rest);
      if (computed !== checksum) {
        errors.push({
          line: index + 1,
          type: "checksum_mismatch",
          message: `recorded ${checksum}, computed ${computed}`,
        });
      }

      previous = checksum;
    });

    return { valid: errors.length === 0, entries: lines.length, errors };
  }

  async getRecentEntries(count = 100): Promise<AuditEntry[]> {
    if (!existsSync(this.logPath)) return [];
    const lines = await this.readLines();
    return lines.slice(-count).map(parseEntry);
  }

  private async readLines(): Promise<string[]> {
    const content = await readFile(this.logPath, "utf-8");
    return content.split("\n").filter((line) => line.trim().length > 0);
  }
}

function computeChecksum(entry: Omit<AuditEntry, "checksum">): string {
  const canonical = JSON.stringify({
    timestamp: entry.timestamp,
    action: entry.action,
    actor: entry.actor,
    details: entry.details,
    previous_checksum: entry.previous_checksum,
  });
  return createHash("sha256").update(canonical).digest("hex");
}

function parseEntry(line: string): AuditEntry {
  const parsed: unknown = JSON.parse(line);
  if (!Value.Check(AuditEntrySchema, parsed)) {
    throw new Error("not an audit entry");
  }
  return parsed;
}
