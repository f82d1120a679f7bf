import { Command } from "commander";
import { auditVerifyCommand } from "../commands/audit.js";
import { healDaemonCommand, healRunCommand } from "../commands/heal.js";
import { defaultRuntime, type RuntimeEnv } from "../runtime.js";
import { runCommandWithRuntime } from "./cli-utils.js";

export function registerAutohealCli(program: Command, runtime: RuntimeEnv = defaultRuntime) {
  program
    .command("run")
    .description("Run one healing cycle, then refresh local entitlement state")
    .option("-c, --config <path>", "Config file (YAML)")
    .option("--at <instant>", "Evaluate as of this ISO-8601 instant instead of now")
    .option("--json", "Output JSON", false)
    .action(async (opts) => {
      await runCommandWithRuntime(runtime, async () => {
        await healRunCommand(
          {
            config: opts.config as string | undefined,
            at: opts.at as string | undefined,
            json: Boolean(opts.json),
          },
          runtime,
        );
      });
    });

  program
    .command("daemon")
    .description("Heal and refresh on a schedule until interrupted")
    .option("-c, --config <path>", "Config file (YAML)")
    .action(async (opts) => {
      await runCommandWithRuntime(runtime, async () => {
        await healDaemonCommand({ config: opts.config as string | undefined }, runtime);
      });
    });

  const audit = program.command("audit").description("Audit trail tools");

  audit
    .command("verify")
    .description("Check the audit log hash chain")
    .option("-c, --config <path>", "Config file (YAML)")
    .option("--json", "Output JSON", false)
    .action(async (opts) => {
      await runCommandWithRuntime(runtime, async () => {
        await auditVerifyCommand(
          { config: opts.config as string | undefined, json: Boolean(opts.json) },
          runtime,
        );
      });
    });
}

export function buildProgram(runtime: RuntimeEnv = defaultRuntime): Command {
  const program = new Command();
  program
    .name("autoheal")
    .description("Keep entitlement coverage valid today and tomorrow")
    .version("0.1.0");
  registerAutohealCli(program, runtime);
  return program;
}
