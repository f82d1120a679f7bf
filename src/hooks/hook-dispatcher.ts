/**
 * Hook Dispatcher
 *
 * Named extension points that run immediately before and after a
 * remediation request. Handlers run one at a time, highest priority first,
 * then in registration order. The first failure stops the dispatch and
 * surfaces as a HookError.
 *
 * @module hooks/hook-dispatcher
 */

import { HookError } from "../healing/errors.js";
import type { HookContext, HookDispatcher, HookName } from "../healing/types.js";

export type HookHandler = (context: HookContext) => Promise<void> | void;

export interface HookRegistration {
  /** Higher runs first. Default 0. */
  priority?: number;
  /** Shown in logs and errors. */
  label?: string;
}

interface RegisteredHook {
  handler: HookHandler;
  priority: number;
  label: string;
  order: number;
}

export class PluginHookDispatcher implements HookDispatcher {
  private readonly hooks = new Map<HookName, RegisteredHook[]>();
  private registered = 0;

  register(name: HookName, handler: HookHandler, opts: HookRegistration = {}): () => void {
    const entry: RegisteredHook = {
      handler,
      priority: opts.priority ?? 0,
      label: opts.label ?? `${name}#${this.registered + 1}`,
      order: this.registered++,
    };

    const list = [...(this.hooks.get(name) ?? []), entry];
    list.sort((a, b) => b.priority - a.priority || a.order - b.order);
    this.hooks.set(name, list);

    return () => this.unregister(name, handler);
  }

  unregister(name: HookName, handler: HookHandler): boolean {
    const list = this.hooks.get(name);
    if (!list) return false;
    const remaining = list.filter((h) => h.handler !== handler);
    this.hooks.set(name, remaining);
    return remaining.length !== list.length;
  }

  count(name: HookName): number {
    return this.hooks.get(name)?.length ?? 0;
  }

  async run(name: HookName, context: HookContext): Promise<void> {
    const list = this.hooks.get(name) ?? [];
    if (list.length === 0) return;

    console.debug(`[hooks] Running ${list.length} handler(s) for ${name}`);

    for (const hook of list) {
      try {
        await hook.handler(context);
      } catch (e) {
        const message = e instanceof Error ? e.message : String(e);
        throw new HookError(`${hook.label} failed: ${message}`, name, { cause: e });
      }
    }
  }
}
