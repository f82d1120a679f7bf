import { beforeEach, describe, expect, it, vi } from "vitest";
import { AnomalousState, HookError, IdentityError, ServiceError } from "../errors.js";
import { HEALING_HORIZON_MS, HealingDecision, describeOutcome } from "../healing-decision.js";
import { createFakes, grant } from "./fakes.js";

const NOW = new Date("2024-01-10T00:00:00.000Z");
const TOMORROW = new Date("2024-01-11T00:00:00.000Z");

describe("HealingDecision", () => {
  beforeEach(() => {
    vi.spyOn(console, "debug").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  describe("auto-heal disabled", () => {
    it("skips without checking validity when the flag is false", async () => {
      const fakes = createFakes({ autoHeal: false });
      const result = await new HealingDecision(fakes.deps).perform(NOW);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.outcome).toBe("skipped");
      expect(result.trace).toEqual(["IDLE", "DONE"]);
      expect(result.report.isEmpty()).toBe(true);
      expect(fakes.calls).toEqual(["getAccount"]);
      expect(fakes.refresher.refresh).not.toHaveBeenCalled();
    });

    it("treats an absent flag as disabled", async () => {
      const fakes = createFakes();
      const result = await new HealingDecision(fakes.deps).perform(NOW);

      expect(result.ok && result.outcome).toBe("skipped");
      expect(fakes.validity.isValidAt).not.toHaveBeenCalled();
      expect(fakes.client.bind).not.toHaveBeenCalled();
    });

    it("audits the skip", async () => {
      const fakes = createFakes({ autoHeal: false });
      const result = await new HealingDecision(fakes.deps).perform(NOW);

      expect(fakes.auditLogger.log).toHaveBeenCalledTimes(1);
      expect(fakes.auditLogger.log).toHaveBeenCalledWith(
        "heal_skipped",
        { cycleId: result.report.cycleId, accountId: "acct-1" },
        "system",
      );
    });
  });

  describe("invalid today", () => {
    it("binds for now and skips the tomorrow check", async () => {
      const fakes = createFakes({ autoHeal: true, validNow: false });
      const result = await new HealingDecision(fakes.deps).perform(NOW);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.outcome).toBe("healed_today");
      expect(result.trace).toEqual(["IDLE", "CHECKING_TODAY", "REMEDIATING_TODAY", "DONE"]);
      expect(fakes.calls).toEqual([
        "getAccount",
        "isValidAt:2024-01-10T00:00:00.000Z",
        "hook:pre_auto_attach",
        "bind:2024-01-10T00:00:00.000Z",
        "hook:post_auto_attach",
        "refresh",
      ]);
      expect(fakes.validity.expiryInstant).not.toHaveBeenCalled();
    });

    it("records the bound grants in the report", async () => {
      const grants = [grant("g-1"), grant("g-2")];
      const fakes = createFakes({ autoHeal: true, validNow: false, grants });
      const result = await new HealingDecision(fakes.deps).perform(NOW);

      expect(result.report.grants.map((g) => g.id)).toEqual(["g-1", "g-2"]);
      expect(result.report.errors).toEqual([]);
    });

    it("passes the account to the pre hook and the grants to the post hook", async () => {
      const grants = [grant("g-1")];
      const fakes = createFakes({ autoHeal: true, validNow: false, grants });
      await new HealingDecision(fakes.deps).perform(NOW);

      expect(fakes.hookContexts).toEqual([
        { name: "pre_auto_attach", context: { accountId: "acct-1" } },
        { name: "post_auto_attach", context: { accountId: "acct-1", grants } },
      ]);
    });
  });

  describe("valid today", () => {
    it("binds for tomorrow when coverage ends before the horizon", async () => {
      const fakes = createFakes({
        autoHeal: true,
        validNow: true,
        compliantUntil: new Date("2024-01-10T12:00:00.000Z"),
      });
      const result = await new HealingDecision(fakes.deps).perform(NOW);

      expect(result.ok && result.outcome).toBe("healed_tomorrow");
      expect(result.trace).toEqual([
        "IDLE",
        "CHECKING_TODAY",
        "CHECKING_TOMORROW",
        "REMEDIATING_TOMORROW",
        "DONE",
      ]);
      expect(fakes.calls).toEqual([
        "getAccount",
        "isValidAt:2024-01-10T00:00:00.000Z",
        "expiryInstant",
        "hook:pre_auto_attach",
        "bind:2024-01-11T00:00:00.000Z",
        "hook:post_auto_attach",
        "refresh",
      ]);
    });

    it("does nothing when coverage reaches past tomorrow", async () => {
      const fakes = createFakes({
        autoHeal: true,
        validNow: true,
        compliantUntil: new Date("2024-02-01T00:00:00.000Z"),
      });
      const result = await new HealingDecision(fakes.deps).perform(NOW);

      expect(result.ok && result.outcome).toBe("valid_today_and_tomorrow");
      expect(result.trace).toEqual(["IDLE", "CHECKING_TODAY", "CHECKING_TOMORROW", "SATISFIED", "DONE"]);
      expect(result.report.isEmpty()).toBe(true);
      expect(result.report.warnings).toEqual([]);
      expect(fakes.calls).toEqual(["getAccount", "isValidAt:2024-01-10T00:00:00.000Z", "expiryInstant"]);
      expect(fakes.hooks.run).not.toHaveBeenCalled();
    });

    it("does nothing when coverage ends exactly at the horizon", async () => {
      const fakes = createFakes({ autoHeal: true, validNow: true, compliantUntil: TOMORROW });
      const result = await new HealingDecision(fakes.deps).perform(NOW);

      expect(result.ok && result.outcome).toBe("valid_today_and_tomorrow");
      expect(fakes.calls).toEqual(["getAccount", "isValidAt:2024-01-10T00:00:00.000Z", "expiryInstant"]);
      expect(fakes.hooks.run).not.toHaveBeenCalled();
    });

    it("binds when coverage ends one millisecond before the horizon", async () => {
      const fakes = createFakes({
        autoHeal: true,
        validNow: true,
        compliantUntil: new Date(TOMORROW.getTime() - 1),
      });
      const result = await new HealingDecision(fakes.deps).perform(NOW);

      expect(result.ok && result.outcome).toBe("healed_tomorrow");
      expect(fakes.client.bind).toHaveBeenCalledWith("acct-1", TOMORROW);
    });

    it("records a warning and binds nothing when the expiry is unknown", async () => {
      const fakes = createFakes({ autoHeal: true, validNow: true, compliantUntil: null });
      const result = await new HealingDecision(fakes.deps).perform(NOW);

      expect(result.ok && result.outcome).toBe("valid_today");
      expect(result.trace).toEqual(["IDLE", "CHECKING_TODAY", "CHECKING_TOMORROW", "SATISFIED", "DONE"]);
      expect(result.report.errors).toEqual([]);
      expect(result.report.warnings).toHaveLength(1);
      const warning = result.report.warnings[0];
      expect(warning).toBeInstanceOf(AnomalousState);
      expect(warning?.message).toBe("Got valid status from server but no valid until date.");
      expect(warning?.observedAt).toEqual(NOW);
      expect(fakes.calls).toEqual(["getAccount", "isValidAt:2024-01-10T00:00:00.000Z", "expiryInstant"]);
      expect(fakes.hooks.run).not.toHaveBeenCalled();
    });

    it("audits the check with the expiry", async () => {
      const until = new Date("2024-02-01T00:00:00.000Z");
      const fakes = createFakes({ autoHeal: true, validNow: true, compliantUntil: until });
      const result = await new HealingDecision(fakes.deps).perform(NOW);

      expect(fakes.auditLogger.log).toHaveBeenCalledWith(
        "heal_checked",
        {
          cycleId: result.report.cycleId,
          accountId: "acct-1",
          today: "2024-01-10T00:00:00.000Z",
          compliantUntil: "2024-02-01T00:00:00.000Z",
        },
        "system",
      );
    });
  });

  describe("failures", () => {
    it("keeps a ServiceError from bind as is", async () => {
      const bindError = new ServiceError("Entitlement service rejected request: 500 - boom", "POST /x", 500);
      const fakes = createFakes({ autoHeal: true, validNow: false, bindError });
      const result = await new HealingDecision(fakes.deps).perform(NOW);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.failedAt).toBe("REMEDIATING_TODAY");
      expect(result.errors).toEqual([bindError]);
      expect(result.errors[0]).toBe(bindError);
      expect(result.trace).toEqual(["IDLE", "CHECKING_TODAY", "REMEDIATING_TODAY", "DONE"]);
      expect(result.report.grants).toEqual([]);
    });

    it("does not run the post hook or refresh when bind fails", async () => {
      const fakes = createFakes({ autoHeal: true, validNow: false, bindError: new ServiceError("down") });
      await new HealingDecision(fakes.deps).perform(NOW);

      expect(fakes.calls).toEqual([
        "getAccount",
        "isValidAt:2024-01-10T00:00:00.000Z",
        "hook:pre_auto_attach",
        "bind:2024-01-10T00:00:00.000Z",
      ]);
    });

    it("wraps a plain error in a ServiceError", async () => {
      const fakes = createFakes({ autoHeal: true, validityError: new Error("socket hang up") });
      const result = await new HealingDecision(fakes.deps).perform(NOW);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.failedAt).toBe("CHECKING_TODAY");
      const [error] = result.errors;
      expect(error).toBeInstanceOf(ServiceError);
      expect(error?.message).toBe("socket hang up");
    });

    it("keeps an identity failure as its own kind", async () => {
      const fakes = createFakes({ autoHeal: true });
      const identityError = new IdentityError("No identity found at /tmp/id.json; is this client registered?", "/tmp/id.json");
      fakes.identity.getAccountId.mockRejectedValue(identityError);
      const result = await new HealingDecision(fakes.deps).perform(NOW);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.failedAt).toBe("IDLE");
      expect(result.errors).toEqual([identityError]);
      expect(result.errors[0]).toBeInstanceOf(IdentityError);
      expect(result.report.toJSON().errors).toEqual([
        "IdentityError: No identity found at /tmp/id.json; is this client registered?",
      ]);
      expect(fakes.client.getAccount).not.toHaveBeenCalled();
    });

    it("reports an account lookup failure at IDLE", async () => {
      const fakes = createFakes({ accountError: new ServiceError("unauthorized", "GET /consumers/acct-1", 401) });
      const result = await new HealingDecision(fakes.deps).perform(NOW);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.failedAt).toBe("IDLE");
      expect(result.trace).toEqual(["IDLE", "DONE"]);
      expect(fakes.validity.isValidAt).not.toHaveBeenCalled();
    });

    it("stops before bind when the pre hook fails", async () => {
      const fakes = createFakes({
        autoHeal: true,
        validNow: false,
        hookError: { hook: "pre_auto_attach", error: new Error("plugin refused") },
      });
      const result = await new HealingDecision(fakes.deps).perform(NOW);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      const [error] = result.errors;
      expect(error).toBeInstanceOf(HookError);
      expect(error instanceof HookError && error.hook).toBe("pre_auto_attach");
      expect(error?.message).toBe("plugin refused");
      expect(fakes.client.bind).not.toHaveBeenCalled();
      expect(fakes.refresher.refresh).not.toHaveBeenCalled();
    });

    it("still refreshes and keeps the grants when the post hook fails", async () => {
      const fakes = createFakes({
        autoHeal: true,
        validNow: false,
        grants: [grant("g-1")],
        hookError: { hook: "post_auto_attach", error: new HookError("late", "post_auto_attach") },
      });
      const result = await new HealingDecision(fakes.deps).perform(NOW);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.failedAt).toBe("REMEDIATING_TODAY");
      expect(result.report.grants.map((g) => g.id)).toEqual(["g-1"]);
      expect(result.errors).toHaveLength(1);
      expect(fakes.calls[fakes.calls.length - 1]).toBe("refresh");
    });

    it("leaves the cycle successful when the refresher throws", async () => {
      const fakes = createFakes({ autoHeal: true, validNow: false, refreshError: new Error("disk full") });
      const result = await new HealingDecision(fakes.deps).perform(NOW);

      expect(result.ok && result.outcome).toBe("healed_today");
      expect(result.report.errors).toEqual([]);
    });

    it("audits the failure with its phase", async () => {
      const fakes = createFakes({ autoHeal: true, validNow: false, bindError: new ServiceError("down") });
      const result = await new HealingDecision(fakes.deps).perform(NOW);

      expect(fakes.auditLogger.log).toHaveBeenLastCalledWith(
        "heal_failed",
        {
          cycleId: result.report.cycleId,
          accountId: "acct-1",
          phase: "REMEDIATING_TODAY",
          error: "ServiceError: down",
        },
        "system",
      );
    });

    it("survives an audit sink that throws", async () => {
      const fakes = createFakes({ autoHeal: false });
      fakes.auditLogger.log.mockRejectedValue(new Error("read-only fs"));
      const result = await new HealingDecision(fakes.deps).perform(NOW);

      expect(result.ok && result.outcome).toBe("skipped");
    });
  });

  describe("cycles", () => {
    it("seals every report it returns", async () => {
      const ok = await new HealingDecision(createFakes({ autoHeal: false }).deps).perform(NOW);
      const failed = await new HealingDecision(
        createFakes({ accountError: new Error("nope") }).deps,
      ).perform(NOW);

      expect(ok.report.isSealed()).toBe(true);
      expect(failed.report.isSealed()).toBe(true);
      expect(() => ok.report.addGrants([grant("late")])).toThrow(/is sealed/);
    });

    it("gives each cycle its own report", async () => {
      const decision = new HealingDecision(createFakes({ autoHeal: true, validNow: false }).deps);
      const first = await decision.perform(NOW);
      const second = await decision.perform(NOW);

      expect(first.report).not.toBe(second.report);
      expect(first.report.cycleId).not.toBe(second.report.cycleId);
      expect(second.report.grants).toHaveLength(1);
    });

    it("reads the clock when no instant is given", async () => {
      const fakes = createFakes({ autoHeal: true, validNow: false });
      const result = await new HealingDecision({ ...fakes.deps, clock: () => NOW }).perform();

      expect(result.report.startedAt).toEqual(NOW);
      expect(fakes.client.bind).toHaveBeenCalledWith("acct-1", NOW);
    });

    it("places tomorrow one horizon after now", () => {
      expect(NOW.getTime() + HEALING_HORIZON_MS).toBe(TOMORROW.getTime());
    });
  });
});

describe("describeOutcome", () => {
  it("names both instants when coverage holds", () => {
    expect(describeOutcome("valid_today_and_tomorrow", NOW, TOMORROW)).toBe(
      "Entitlement auto healing was checked and entitlements are valid today 2024-01-10T00:00:00.000Z" +
        " and tomorrow 2024-01-11T00:00:00.000Z",
    );
  });

  it("names the instant that was healed", () => {
    expect(describeOutcome("healed_tomorrow", NOW, TOMORROW)).toBe(
      "Entitlement auto healing attached coverage for tomorrow 2024-01-11T00:00:00.000Z",
    );
  });
});
