// ── Plan resolver tests ─────────────────────────────────────────────────────
//
//   - no subscription, free_10k, catalog hits (enterprise/standard)
//   - unknown, malformed and failing lookups fold into `unknown`
//   - exactly one diagnostic event per unknown resolution
//
import { describe, it, expect, vi } from "vitest";
import {
  UNKNOWN_PLAN_MESSAGE,
  UNLIMITED,
  createMemoryDiagnosticSink,
  numeric,
  resolvePlan,
  type PlanCatalog,
} from "../src/index.js";
import { FakeCatalog } from "./fakes.js";

const CATALOG = {
  "plan-growth-10k": {
    kind: "standard",
    planId: "plan-growth-10k",
    billingInterval: "monthly",
    siteLimit: 10,
    monthlyPageviewLimit: 10_000,
    teamMemberLimit: 3,
  },
  "plan-enterprise-acme": {
    kind: "enterprise",
    planId: "plan-enterprise-acme",
    billingInterval: "yearly",
    monthlyPageviewLimit: 20_000_000,
  },
  "plan-enterprise-open": {
    kind: "enterprise",
    planId: "plan-enterprise-open",
    monthlyPageviewLimit: "unlimited",
    siteLimit: null,
  },
  "plan-broken": {
    kind: "standard",
    planId: "plan-broken",
    siteLimit: -5,
    monthlyPageviewLimit: 10_000,
  },
};

function subscription(planId: string) {
  return { id: `sub-${planId}`, planId };
}

describe("resolvePlan", () => {
  it("resolves a missing subscription to no_plan without an event", async () => {
    const diagnostics = createMemoryDiagnosticSink();
    const catalog = new FakeCatalog(CATALOG);

    expect(await resolvePlan(null, { catalog, diagnostics })).toEqual({ kind: "no_plan" });
    expect(await resolvePlan(undefined, { catalog, diagnostics })).toEqual({ kind: "no_plan" });
    expect(diagnostics.events).toHaveLength(0);
    expect(catalog.lookups).toEqual([]);
  });

  it("resolves free_10k without consulting the catalog", async () => {
    const diagnostics = createMemoryDiagnosticSink();
    const catalog = new FakeCatalog(CATALOG);

    const plan = await resolvePlan(subscription("free_10k"), { catalog, diagnostics });

    expect(plan).toEqual({ kind: "free_10k" });
    expect(catalog.lookups).toEqual([]);
    expect(diagnostics.events).toHaveLength(0);
  });

  it("resolves a standard catalog record", async () => {
    const diagnostics = createMemoryDiagnosticSink();
    const plan = await resolvePlan(subscription("plan-growth-10k"), {
      catalog: new FakeCatalog(CATALOG),
      diagnostics,
    });

    expect(plan).toEqual({
      kind: "standard",
      planId: "plan-growth-10k",
      billingInterval: "monthly",
      siteLimit: 10,
      monthlyPageviewLimit: 10_000,
      teamMemberLimit: 3,
    });
    expect(diagnostics.events).toHaveLength(0);
  });

  it("resolves enterprise records, leaving unset overrides null", async () => {
    const diagnostics = createMemoryDiagnosticSink();
    const catalog = new FakeCatalog(CATALOG);

    expect(await resolvePlan(subscription("plan-enterprise-acme"), { catalog, diagnostics })).toEqual({
      kind: "enterprise",
      planId: "plan-enterprise-acme",
      billingInterval: "yearly",
      monthlyPageviewLimit: numeric(20_000_000),
      siteLimit: null,
      teamMemberLimit: null,
    });
    expect(await resolvePlan(subscription("plan-enterprise-open"), { catalog, diagnostics })).toEqual({
      kind: "enterprise",
      planId: "plan-enterprise-open",
      monthlyPageviewLimit: UNLIMITED,
      siteLimit: null,
      teamMemberLimit: null,
    });
  });

  it("captures unknown plans under the pageview-limit message", () => {
    expect(UNKNOWN_PLAN_MESSAGE).toBe("Unknown monthly pageview limit for plan");
  });

  it("folds a catalog miss into unknown and captures one event", async () => {
    const diagnostics = createMemoryDiagnosticSink();

    const plan = await resolvePlan(subscription("plan-retired-2019"), {
      catalog: new FakeCatalog(CATALOG),
      diagnostics,
    });

    expect(plan).toEqual({ kind: "unknown", planId: "plan-retired-2019" });
    expect(diagnostics.events).toEqual([
      {
        message: "Unknown monthly pageview limit for plan",
        context: { planId: "plan-retired-2019", subscriptionId: "sub-plan-retired-2019", reason: "not_found" },
      },
    ]);
  });

  it("treats a record that fails validation as unknown", async () => {
    const diagnostics = createMemoryDiagnosticSink();

    const plan = await resolvePlan(subscription("plan-broken"), {
      catalog: new FakeCatalog(CATALOG),
      diagnostics,
    });

    expect(plan).toEqual({ kind: "unknown", planId: "plan-broken" });
    expect(diagnostics.events).toHaveLength(1);
    expect(diagnostics.events[0]?.context.reason).toBe("malformed_record");
  });

  it("never rejects when the catalog lookup fails", async () => {
    const diagnostics = createMemoryDiagnosticSink();
    const catalog: PlanCatalog = {
      lookup: vi.fn().mockRejectedValue(new Error("catalog timeout")),
    };

    const plan = await resolvePlan(subscription("plan-growth-10k"), { catalog, diagnostics });

    expect(plan).toEqual({ kind: "unknown", planId: "plan-growth-10k" });
    expect(diagnostics.events).toHaveLength(1);
    expect(diagnostics.events[0]?.context).toEqual({
      planId: "plan-growth-10k",
      subscriptionId: "sub-plan-growth-10k",
      reason: "lookup_failed",
      error: "catalog timeout",
    });
  });

  it("treats a blank plan id as unknown without a lookup", async () => {
    const diagnostics = createMemoryDiagnosticSink();
    const catalog = new FakeCatalog(CATALOG);

    const plan = await resolvePlan({ id: "sub-blank", planId: "   " }, { catalog, diagnostics });

    expect(plan).toEqual({ kind: "unknown", planId: "   " });
    expect(catalog.lookups).toEqual([]);
    expect(diagnostics.events[0]?.context.reason).toBe("blank_plan_id");
  });

  it("stays total when the diagnostic sink throws", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const diagnostics = {
      capture: vi.fn(() => {
        throw new Error("sink down");
      }),
    };

    const plan = await resolvePlan(subscription("nope"), { catalog: new FakeCatalog(), diagnostics });

    expect(plan).toEqual({ kind: "unknown", planId: "nope" });
    expect(diagnostics.capture).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    errorSpy.mockRestore();
  });
});
