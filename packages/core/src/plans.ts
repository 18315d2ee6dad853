// ── Plan resolution ─────────────────────────────────────────────────────────
//
// Maps a subscription reference to exactly one Plan variant:
//
//   no subscription            → no_plan
//   planId "free_10k"          → free_10k
//   catalog record (validated) → enterprise | standard
//   anything else              → unknown  (+ one diagnostic event)
//
// Resolution never rejects. Catalog misses, malformed records and catalog
// failures all fold into `unknown`.
//
import crypto from "node:crypto";
import { z } from "zod";
import { FREE_10K_PLAN_ID } from "./constants.js";
import type { DiagnosticSink } from "./diagnostics.js";
import { UNLIMITED, numeric, type Limit } from "./limit.js";
import { logError } from "./log.js";
import type { SubscriptionRef } from "./types.js";

// ── Plan variants ───────────────────────────────────────────────────────────

export type BillingInterval = "monthly" | "yearly";

export type EnterprisePlan = {
  kind: "enterprise";
  planId: string;
  billingInterval?: BillingInterval;
  monthlyPageviewLimit: Limit;
  /** Stored override; `null` means unlimited sites. */
  siteLimit: Limit | null;
  /** Stored override; `null` means unlimited team members. */
  teamMemberLimit: Limit | null;
};

export type StandardPlan = {
  kind: "standard";
  planId: string;
  billingInterval?: BillingInterval;
  siteLimit: number;
  monthlyPageviewLimit: number;
  teamMemberLimit: number;
};

export type Free10kPlan = { kind: "free_10k" };
export type NoPlan = { kind: "no_plan" };
export type UnknownPlan = { kind: "unknown"; planId: string };

export type Plan = EnterprisePlan | StandardPlan | Free10kPlan | NoPlan | UnknownPlan;

// ── Catalog records ─────────────────────────────────────────────────────────

const nonNegativeInt = z.number().int().nonnegative();
const storedLimit = z.union([nonNegativeInt, z.literal("unlimited")]);
const billingInterval = z.enum(["monthly", "yearly"]);

const enterpriseRecordSchema = z.object({
  kind: z.literal("enterprise"),
  planId: z.string().trim().min(1),
  billingInterval: billingInterval.optional(),
  siteLimit: storedLimit.nullish(),
  monthlyPageviewLimit: storedLimit.nullish(),
  teamMemberLimit: storedLimit.nullish(),
});

const standardRecordSchema = z.object({
  kind: z.literal("standard"),
  planId: z.string().trim().min(1),
  billingInterval: billingInterval.optional(),
  siteLimit: nonNegativeInt,
  monthlyPageviewLimit: nonNegativeInt,
  teamMemberLimit: nonNegativeInt,
});

/** Shape a plan catalog must return for a known plan. */
export const catalogPlanSchema = z.discriminatedUnion("kind", [enterpriseRecordSchema, standardRecordSchema]);

export type CatalogPlanRecord = z.infer<typeof catalogPlanSchema>;

export interface PlanCatalog {
  /** Raw record for `planId`, or null when the catalog has no such plan. */
  lookup(planId: string): Promise<unknown>;
}

function toLimit(value: number | "unlimited"): Limit {
  return value === "unlimited" ? UNLIMITED : numeric(value);
}

export function planFromRecord(record: CatalogPlanRecord): EnterprisePlan | StandardPlan {
  switch (record.kind) {
    case "enterprise":
      return {
        kind: "enterprise",
        planId: record.planId,
        ...(record.billingInterval ? { billingInterval: record.billingInterval } : {}),
        monthlyPageviewLimit: record.monthlyPageviewLimit == null ? UNLIMITED : toLimit(record.monthlyPageviewLimit),
        siteLimit: record.siteLimit == null ? null : toLimit(record.siteLimit),
        teamMemberLimit: record.teamMemberLimit == null ? null : toLimit(record.teamMemberLimit),
      };
    case "standard":
      return {
        kind: "standard",
        planId: record.planId,
        ...(record.billingInterval ? { billingInterval: record.billingInterval } : {}),
        siteLimit: record.siteLimit,
        monthlyPageviewLimit: record.monthlyPageviewLimit,
        teamMemberLimit: record.teamMemberLimit,
      };
  }
}

// ── Resolver ────────────────────────────────────────────────────────────────

export const UNKNOWN_PLAN_MESSAGE = "Unknown monthly pageview limit for plan";

export type UnknownPlanReason = "not_found" | "malformed_record" | "lookup_failed" | "blank_plan_id";

export type PlanResolverDeps = {
  catalog: PlanCatalog;
  diagnostics: DiagnosticSink;
};

export async function resolvePlan(
  subscription: SubscriptionRef | null | undefined,
  deps: PlanResolverDeps,
): Promise<Plan> {
  if (!subscription) return { kind: "no_plan" };

  const planId = typeof subscription.planId === "string" ? subscription.planId.trim() : "";
  if (planId === FREE_10K_PLAN_ID) return { kind: "free_10k" };
  if (!planId) return unknownPlan(subscription, "blank_plan_id", deps.diagnostics);

  let raw: unknown;
  try {
    raw = await deps.catalog.lookup(planId);
  } catch (error) {
    return unknownPlan(subscription, "lookup_failed", deps.diagnostics, {
      error: error instanceof Error ? error.message : String(error),
    });
  }

  if (raw == null) return unknownPlan(subscription, "not_found", deps.diagnostics);

  const parsed = catalogPlanSchema.safeParse(raw);
  if (!parsed.success) {
    return unknownPlan(subscription, "malformed_record", deps.diagnostics, {
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
  }
  return planFromRecord(parsed.data);
}

function unknownPlan(
  subscription: SubscriptionRef,
  reason: UnknownPlanReason,
  diagnostics: DiagnosticSink,
  extra: Record<string, unknown> = {},
): UnknownPlan {
  const planId = typeof subscription.planId === "string" ? subscription.planId : String(subscription.planId);
  try {
    diagnostics.capture(UNKNOWN_PLAN_MESSAGE, {
      planId,
      subscriptionId: subscription.id,
      reason,
      ...extra,
    });
  } catch (error) {
    logError("billing.plan-resolver.diagnostics", crypto.randomUUID(), error);
  }
  return { kind: "unknown", planId };
}
