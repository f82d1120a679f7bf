/**
 * Healing error taxonomy
 *
 * @module healing/errors
 */

import type { HookName } from "./types.js";

/**
 * Remote entitlement service call failed (network, auth, server rejection,
 * or a response that does not match the expected shape).
 */
export class ServiceError extends Error {
  constructor(
    message: string,
    public readonly endpoint: string | null = null,
    public readonly status: number | null = null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ServiceError";
  }
}

/**
 * An extension point raised while a remediation request was in flight.
 */
export class HookError extends Error {
  constructor(
    message: string,
    public readonly hook: HookName,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "HookError";
  }
}

/**
 * The local account identity could not be read (unregistered client, bad
 * identity file). Not a remote failure.
 */
export class IdentityError extends Error {
  constructor(
    message: string,
    public readonly source: string,
  ) {
    super(message);
    this.name = "IdentityError";
  }
}

/**
 * Coverage reported valid but without a known expiry. Recorded as a warning,
 * never thrown.
 */
export class AnomalousState {
  readonly name = "AnomalousState";

  constructor(
    public readonly message: string,
    public readonly observedAt: Date,
  ) {}
}

function isHealingFailure(e: unknown): e is ServiceError | HookError | IdentityError {
  return e instanceof ServiceError || e instanceof HookError || e instanceof IdentityError;
}

/**
 * Normalize anything a collaborator threw into the taxonomy. Typed failures
 * pass through; everything else is attributed to the remote service.
 */
export function toHealingFailure(e: unknown, endpoint: string | null = null): ServiceError | HookError | IdentityError {
  if (isHealingFailure(e)) return e;
  const message = e instanceof Error ? e.message : String(e);
  return new ServiceError(message, endpoint, null, { cause: e });
}

export function describeError(e: unknown): string {
  if (e instanceof ServiceError) {
    const where = e.endpoint ? ` (${e.endpoint}${e.status !== null ? ` → ${e.status}` : ""})` : "";
    return `${e.name}: ${e.message}${where}`;
  }
  if (e instanceof HookError) {
    return `${e.name} in ${e.hook}: ${e.message}`;
  }
  if (e instanceof Error) {
    return `${e.name}: ${e.message}`;
  }
  return String(e);
}
