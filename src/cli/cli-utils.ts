import type { RuntimeEnv } from "../runtime.js";

/** Run a command body, turning an escaped error into a message and exit 1. */
export async function runCommandWithRuntime(runtime: RuntimeEnv, action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (e) {
    runtime.error(e instanceof Error ? e.message : String(e));
    runtime.exit(1);
  }
}
