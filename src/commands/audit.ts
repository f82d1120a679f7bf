import { AuditLogger } from "../security/audit-logger.js";
import type { RuntimeEnv } from "../runtime.js";
import { requireConfig, type ConfigOpts } from "./heal.js";

export type AuditVerifyOpts = ConfigOpts & {
  json?: boolean;
};

export async function auditVerifyCommand(opts: AuditVerifyOpts, runtime: RuntimeEnv): Promise<void> {
  const config = requireConfig(opts, runtime);
  if (!config) return;

  const result = await new AuditLogger(config.auditLogPath).verify();

  if (opts.json) {
    runtime.log(JSON.stringify({ path: config.auditLogPath, ...result }, null, 2));
  } else if (result.valid) {
    runtime.log(`Audit log OK: ${result.entries} entries (${config.auditLogPath})`);
  } else {
    runtime.log(`Audit log BROKEN: ${result.errors.length} problem(s) in ${result.entries} entries`);
    for (const error of result.errors) {
      runtime.log(`  line ${error.line}: ${error.type} - ${error.message}`);
    }
  }

  if (!result.valid) {
    runtime.exit(1);
  }
}
