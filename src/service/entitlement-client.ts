/**
 * Entitlement Service Client
 *
 * HTTP client for the remote entitlement service: account lookup, bind,
 * compliance status and the current grant list. Every failure, including a
 * response body of the wrong shape, is raised as a ServiceError. No retries;
 * the next scheduled cycle is the retry.
 *
 * @module service/entitlement-client
 */

import type { Static, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ServiceError } from "../healing/errors.js";
import type { ConsumerAccount, EntitlementClient, Grant } from "../healing/types.js";
import type { GrantLister } from "../certs/cert-refresh.js";
import {
  ComplianceSchema,
  ConsumerSchema,
  EntitlementListSchema,
  type EntitlementPayload,
} from "./schemas.js";

export interface EntitlementServiceConfig {
  baseUrl: string;
  /** Sent as a bearer token when set. */
  token?: string;
  timeoutMs?: number;
  /** Injected in tests; defaults to the global fetch. */
  fetch?: typeof fetch;
}

export interface ComplianceStatus {
  status: string;
  compliant: boolean;
  compliantUntil: Date | null;
}

type Method = "GET" | "POST";

export class EntitlementServiceClient implements EntitlementClient, GrantLister {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly config: EntitlementServiceConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = config.timeoutMs ?? 30_000;
    this.fetchImpl = config.fetch ?? fetch;
  }

  async getAccount(accountId: string): Promise<ConsumerAccount> {
    const consumer = await this.request("GET", `/consumers/${encodeURIComponent(accountId)}`, ConsumerSchema);
    return {
      id: consumer.uuid,
      name: consumer.name,
      autoHeal: consumer.autoheal ?? undefined,
    };
  }

  async bind(accountId: string, instant: Date): Promise<Grant[]> {
    const query = new URLSearchParams({ entitle_date: instant.toISOString() });
    const path = `/consumers/${encodeURIComponent(accountId)}/entitlements?${query.toString()}`;
    const entitlements = await this.request("POST", path, EntitlementListSchema);
    return entitlements.map((e) => toGrant(e, path));
  }

  async listGrants(accountId: string): Promise<Grant[]> {
    const path = `/consumers/${encodeURIComponent(accountId)}/entitlements`;
    const entitlements = await this.request("GET", path, EntitlementListSchema);
    return entitlements.map((e) => toGrant(e, path));
  }

  async getCompliance(accountId: string, onDate: Date): Promise<ComplianceStatus> {
    const query = new URLSearchParams({ on_date: onDate.toISOString() });
    const path = `/consumers/${encodeURIComponent(accountId)}/compliance?${query.toString()}`;
    const compliance = await this.request("GET", path, ComplianceSchema);
    return {
      status: compliance.status,
      compliant: compliance.compliant,
      compliantUntil: compliance.compliantUntil ? parseDate(compliance.compliantUntil, path) : null,
    };
  }

  private async request<T extends TSchema>(method: Method, path: string, schema: T): Promise<Static<T>> {
    const endpoint = `${method} ${path}`;
    const response = await this.send(method, path, endpoint);

    if (!response.ok) {
      const detail = await readErrorDetail(response);
      throw new ServiceError(
        `Entitlement service rejected request: ${response.status}${detail ? ` - ${detail}` : ""}`,
        endpoint,
        response.status,
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (e) {
      throw new ServiceError("Entitlement service returned invalid JSON", endpoint, response.status, { cause: e });
    }

    if (!Value.Check(schema, body)) {
      const first = Value.Errors(schema, body).First();
      const where = first ? ` at ${first.path || "/"}: ${first.message}` : "";
      throw new ServiceError(`Unexpected response shape${where}`, endpoint, response.status);
    }
    return body;
  }

  private async send(method: Method, path: string, endpoint: string): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    const headers: Record<string, string> = { Accept: "application/json" };
    if (this.config.token) {
      headers.Authorization = `Bearer ${this.config.token}`;
    }

    try {
      return await this.fetchImpl(`${this.baseUrl}${path}`, {
        method,
        headers,
        signal: controller.signal,
      });
    } catch (e) {
      if (e instanceof Error && e.name === "AbortError") {
        throw new ServiceError(`Request timeout after ${this.timeoutMs}ms`, endpoint, null, { cause: e });
      }
      const message = e instanceof Error ? e.message : String(e);
      throw new ServiceError(`Network error: ${message}`, endpoint, null, { cause: e });
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

function toGrant(e: EntitlementPayload, endpoint: string): Grant {
  return {
    id: e.id,
    productId: e.pool?.productId,
    productName: e.pool?.productName,
    quantity: e.quantity ?? 1,
    startDate: parseDate(e.startDate, endpoint),
    endDate: parseDate(e.endDate, endpoint),
  };
}

function parseDate(value: string, endpoint: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new ServiceError(`Invalid date in response: ${value}`, endpoint);
  }
  return date;
}

async function readErrorDetail(response: Response): Promise<string | null> {
  let text: string;
  try {
    text = await response.text();
  } catch {
    return null;
  }
  if (!text) return null;

  return displayMessageOf(text) ?? text.slice(0, 200);
}

function displayMessageOf(text: string): string | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  if (typeof parsed === "object" && parsed !== null && "displayMessage" in parsed) {
    const message = parsed.displayMessage;
    if (typeof message === "string") return message;
  }
  return null;
}
