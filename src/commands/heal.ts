import { createAutohealRuntime, startAutohealDaemon } from "../autoheal.js";
import type { RefreshReport } from "../certs/cert-refresh.js";
import { ConfigError, loadConfig, type AutohealConfig } from "../config/config.js";
import type { HealingReport } from "../healing/healing-report.js";
import type { RuntimeEnv } from "../runtime.js";

// ---------------------------------------------------------------------------
// Shared
// ---------------------------------------------------------------------------

export type ConfigOpts = {
  config?: string;
};

/** Load config or report why not. Returns null after exiting with code 2. */
export function requireConfig(opts: ConfigOpts, runtime: RuntimeEnv): AutohealConfig | null {
  try {
    return loadConfig({ path: opts.config });
  } catch (e) {
    if (e instanceof ConfigError) {
      runtime.error(e.message);
      runtime.exit(2);
      return null;
    }
    throw e;
  }
}

/** Parse an ISO-8601 instant. */
export function parseInstant(value: string): Date | null {
  if (!/^\d{4}-\d{2}-\d{2}/.test(value)) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

export function formatCycle(healing: HealingReport, refresh: RefreshReport): string[] {
  const lines = [`Cycle ${healing.cycleId} at ${healing.startedAt.toISOString()}`];

  if (healing.grants.length === 0) {
    lines.push("  grants: none");
  } else {
    lines.push(`  grants: ${healing.grants.length}`);
    for (const grant of healing.grants) {
      const product = grant.productName ?? grant.productId ?? "-";
      lines.push(`    ${grant.id}  ${product}  x${grant.quantity}  until ${grant.endDate.toISOString()}`);
    }
  }

  const json = healing.toJSON();
  lines.push(json.errors.length === 0 ? "  errors: none" : `  errors: ${json.errors.length}`);
  for (const error of json.errors) {
    lines.push(`    ${error}`);
  }
  for (const warning of json.warnings) {
    lines.push(`  warning: ${warning}`);
  }

  lines.push(`  refresh: +${refresh.added.length} / -${refresh.removed.length}`);
  for (const error of refresh.errors) {
    lines.push(`    refresh error: ${error.message}`);
  }
  return lines;
}

// ---------------------------------------------------------------------------
// run
// ---------------------------------------------------------------------------

export type HealRunOpts = ConfigOpts & {
  at?: string;
  json?: boolean;
};

export async function healRunCommand(opts: HealRunOpts, runtime: RuntimeEnv): Promise<void> {
  let at: Date | undefined;
  if (opts.at !== undefined) {
    const parsed = parseInstant(opts.at);
    if (!parsed) {
      runtime.error(`Invalid --at value: "${opts.at}". Expected an ISO-8601 timestamp.`);
      runtime.exit(1);
      return;
    }
    at = parsed;
  }

  const config = requireConfig(opts, runtime);
  if (!config) return;

  const autoheal = createAutohealRuntime(config);
  await autoheal.auditLogger.initialize();
  const { healing, refresh } = await autoheal.runner.run(at);

  if (opts.json) {
    runtime.log(
      JSON.stringify(
        {
          healing: healing.toJSON(),
          refresh: {
            added: refresh.added,
            removed: refresh.removed,
            errors: refresh.errors.map((e) => e.message),
          },
        },
        null,
        2,
      ),
    );
  } else {
    for (const line of formatCycle(healing, refresh)) {
      runtime.log(line);
    }
  }

  if (healing.hasErrors()) {
    runtime.exit(1);
  }
}

// ---------------------------------------------------------------------------
// daemon
// ---------------------------------------------------------------------------

export type HealDaemonOpts = ConfigOpts;

export async function healDaemonCommand(opts: HealDaemonOpts, runtime: RuntimeEnv): Promise<void> {
  const config = requireConfig(opts, runtime);
  if (!config) return;

  const daemon = await startAutohealDaemon(config);
  runtime.log(
    `autoheal daemon running: heal every ${config.healIntervalMinutes}m, refresh every ${config.refreshIntervalMinutes}m`,
  );

  const onSignal = (signal: NodeJS.Signals) => {
    runtime.log(`Received ${signal}, stopping`);
    daemon.shutdown();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
}
