/**
 * Identity - which account this client acts for
 *
 * @module identity/identity-provider
 */

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { IdentityError } from "../healing/errors.js";
import type { IdentityProvider } from "../healing/types.js";
import { loadJsonFile } from "../infra/json-file.js";

export class StaticIdentityProvider implements IdentityProvider {
  constructor(private readonly accountId: string) {
    if (!accountId.trim()) {
      throw new IdentityError("Account id must not be empty", "static");
    }
  }

  async getAccountId(): Promise<string> {
    return this.accountId;
  }
}

const IdentityFileSchema = Type.Object({
  uuid: Type.String({ minLength: 1 }),
  name: Type.Optional(Type.String()),
});

/**
 * Reads `{ "uuid": "..." }` from disk on every call, so a re-registered
 * client is picked up by the next cycle.
 */
export class FileIdentityProvider implements IdentityProvider {
  constructor(private readonly identityPath: string) {}

  async getAccountId(): Promise<string> {
    const raw = loadJsonFile(this.identityPath);
    if (raw === undefined) {
      throw new IdentityError(`No identity found at ${this.identityPath}; is this client registered?`, this.identityPath);
    }
    if (!Value.Check(IdentityFileSchema, raw)) {
      throw new IdentityError(`Identity file ${this.identityPath} has no uuid`, this.identityPath);
    }
    return raw.uuid;
  }
}
