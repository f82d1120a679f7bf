/**
 * Configuration
 *
 * Precedence: environment > YAML file > defaults. The file is optional
 * unless a path is passed explicitly.
 *
 * @module config/config
 */

import { existsSync, readFileSync } from "node:fs";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import * as yaml from "yaml";

export const DEFAULT_CONFIG_PATH = "/etc/autoheal/autoheal.yaml";

const ConfigFileSchema = Type.Object(
  {
    service: Type.Optional(
      Type.Object({
        url: Type.Optional(Type.String({ minLength: 1 })),
        token: Type.Optional(Type.String()),
        timeoutMs: Type.Optional(Type.Integer({ minimum: 1 })),
      }),
    ),
    identity: Type.Optional(
      Type.Object({
        accountId: Type.Optional(Type.String({ minLength: 1 })),
        path: Type.Optional(Type.String({ minLength: 1 })),
      }),
    ),
    schedule: Type.Optional(
      Type.Object({
        healIntervalMinutes: Type.Optional(Type.Integer({ minimum: 1 })),
        refreshIntervalMinutes: Type.Optional(Type.Integer({ minimum: 1 })),
        splayMinutes: Type.Optional(Type.Integer({ minimum: 0 })),
        runOnStart: Type.Optional(Type.Boolean()),
      }),
    ),
    paths: Type.Optional(
      Type.Object({
        auditLog: Type.Optional(Type.String({ minLength: 1 })),
        snapshot: Type.Optional(Type.String({ minLength: 1 })),
      }),
    ),
  },
  { additionalProperties: false },
);

export type ConfigFile = Static<typeof ConfigFileSchema>;

export interface AutohealConfig {
  serviceUrl: string;
  token: string | null;
  timeoutMs: number;
  /** Fixed account id; when null the identity file is read each cycle. */
  accountId: string | null;
  identityPath: string;
  healIntervalMinutes: number;
  refreshIntervalMinutes: number;
  splayMinutes: number;
  runOnStart: boolean;
  auditLogPath: string;
  snapshotPath: string;
}

const DEFAULTS: Omit<AutohealConfig, "serviceUrl"> = {
  token: null,
  timeoutMs: 30_000,
  accountId: null,
  identityPath: "/var/lib/autoheal/identity.json",
  healIntervalMinutes: 1440,
  refreshIntervalMinutes: 240,
  splayMinutes: 5,
  runOnStart: true,
  auditLogPath: "/var/lib/autoheal/audit.log",
  snapshotPath: "/var/lib/autoheal/grants.json",
};

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join("\n  - ")}` : message);
    this.name = "ConfigError";
  }
}

export interface LoadConfigOptions {
  /** Explicit file; must exist. */
  path?: string;
  env?: NodeJS.ProcessEnv;
}

export function loadConfig(opts: LoadConfigOptions = {}): AutohealConfig {
  const env = opts.env ?? process.env;
  const path = opts.path ?? env.AUTOHEAL_CONFIG ?? DEFAULT_CONFIG_PATH;
  const file = readConfigFile(path, opts.path !== undefined || env.AUTOHEAL_CONFIG !== undefined);

  const issues: string[] = [];
  const envInt = (name: string): number | undefined => {
    const raw = env[name];
    if (raw === undefined || raw === "") return undefined;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < 0) {
      issues.push(`${name} must be a non-negative integer (got "${raw}")`);
      return undefined;
    }
    return value;
  };

  const serviceUrl = env.AUTOHEAL_SERVICE_URL ?? file.service?.url;
  if (!serviceUrl) {
    issues.push("service url is required (service.url or AUTOHEAL_SERVICE_URL)");
  }

  const config: AutohealConfig = {
    serviceUrl: serviceUrl ?? "",
    token: env.AUTOHEAL_TOKEN ?? file.service?.token ?? DEFAULTS.token,
    timeoutMs: envInt("AUTOHEAL_TIMEOUT_MS") ?? file.service?.timeoutMs ?? DEFAULTS.timeoutMs,
    accountId: env.AUTOHEAL_ACCOUNT_ID ?? file.identity?.accountId ?? DEFAULTS.accountId,
    identityPath: env.AUTOHEAL_IDENTITY_PATH ?? file.identity?.path ?? DEFAULTS.identityPath,
    healIntervalMinutes:
      envInt("AUTOHEAL_INTERVAL_MINUTES") ?? file.schedule?.healIntervalMinutes ?? DEFAULTS.healIntervalMinutes,
    refreshIntervalMinutes: file.schedule?.refreshIntervalMinutes ?? DEFAULTS.refreshIntervalMinutes,
    splayMinutes: file.schedule?.splayMinutes ?? DEFAULTS.splayMinutes,
    runOnStart: file.schedule?.runOnStart ?? DEFAULTS.runOnStart,
    auditLogPath: env.AUTOHEAL_AUDIT_LOG ?? file.paths?.auditLog ?? DEFAULTS.auditLogPath,
    snapshotPath: env.AUTOHEAL_SNAPSHOT_PATH ?? file.paths?.snapshot ?? DEFAULTS.snapshotPath,
  };

  if (config.healIntervalMinutes === 0) {
    issues.push("AUTOHEAL_INTERVAL_MINUTES must be at least 1");
  }
  if (config.timeoutMs === 0) {
    issues.push("AUTOHEAL_TIMEOUT_MS must be at least 1");
  }

  if (issues.length > 0) {
    throw new ConfigError("Invalid autoheal configuration", issues);
  }
  return config;
}

function readConfigFile(path: string, required: boolean): ConfigFile {
  if (!existsSync(path)) {
    if (required) {
      throw new ConfigError(`Config file not found: ${path}`);
    }
    return {};
  }

  let parsed: unknown;
  try {
    parsed = yaml.parse(readFileSync(path, "utf-8"));
  } catch (e) {
    throw new ConfigError(`Config file ${path} is not valid YAML: ${e instanceof Error ? e.message : String(e)}`);
  }

  // An empty document parses to null
  if (parsed === null || parsed === undefined) return {};

  if (!Value.Check(ConfigFileSchema, parsed)) {
    const issues = [...Value.Errors(ConfigFileSchema, parsed)].map((err) => `${err.path || "/"}: ${err.message}`);
    throw new ConfigError(`Config file ${path} is invalid`, issues);
  }
  return parsed;
}
