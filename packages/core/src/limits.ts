// ── Limit calculator ────────────────────────────────────────────────────────
//
// Derives the three entitlements from a resolved plan. Pure: deployment mode
// and grandfathering arrive as explicit flags, nothing is read from the
// process environment.
//
import {
  LIMIT_SITES_SINCE,
  MONTHLY_PAGEVIEW_LIMIT_FOR_FREE_10K,
  SITE_LIMIT_FOR_FREE_10K,
  SITE_LIMIT_FOR_TRIALS,
  TEAM_MEMBER_LIMIT_FOR_TRIALS,
} from "./constants.js";
import { MalformedInputError } from "./errors.js";
import { UNLIMITED, numeric, type Limit } from "./limit.js";
import type { Plan } from "./plans.js";
import { assertNever, type Account, type Limits } from "./types.js";

export type GrandfatheringFlags = {
  selfHosted: boolean;
  signedUpBeforeCutoff: boolean;
};

export function isGrandfathered(signedUpAt: Date): boolean {
  if (!(signedUpAt instanceof Date) || Number.isNaN(signedUpAt.getTime())) {
    throw new MalformedInputError("account.signedUpAt", "expected a valid date");
  }
  return signedUpAt.getTime() < LIMIT_SITES_SINCE.getTime();
}

export function grandfatheringFlags(
  account: Pick<Account, "signedUpAt">,
  deployment: { selfHosted: boolean },
): GrandfatheringFlags {
  return {
    selfHosted: deployment.selfHosted,
    signedUpBeforeCutoff: isGrandfathered(account.signedUpAt),
  };
}

/** Sites are the only grandfathered entitlement. */
export function siteLimit(plan: Plan, flags: GrandfatheringFlags): Limit {
  if (flags.selfHosted) return UNLIMITED;
  if (flags.signedUpBeforeCutoff) return UNLIMITED;

  switch (plan.kind) {
    case "enterprise":
      return plan.siteLimit ?? UNLIMITED;
    case "standard":
      return numeric(plan.siteLimit);
    case "free_10k":
      return numeric(SITE_LIMIT_FOR_FREE_10K);
    case "no_plan":
    case "unknown":
      return numeric(SITE_LIMIT_FOR_TRIALS);
    default:
      return assertNever(plan);
  }
}

export function monthlyPageviewLimit(plan: Plan): Limit {
  switch (plan.kind) {
    case "enterprise":
      return plan.monthlyPageviewLimit;
    case "standard":
      return numeric(plan.monthlyPageviewLimit);
    case "free_10k":
      return numeric(MONTHLY_PAGEVIEW_LIMIT_FOR_FREE_10K);
    case "no_plan":
    case "unknown":
      return UNLIMITED;
    default:
      return assertNever(plan);
  }
}

export function teamMemberLimit(plan: Plan): Limit {
  switch (plan.kind) {
    case "enterprise":
      return plan.teamMemberLimit ?? UNLIMITED;
    case "standard":
      return numeric(plan.teamMemberLimit);
    case "free_10k":
      return UNLIMITED;
    case "no_plan":
    case "unknown":
      return numeric(TEAM_MEMBER_LIMIT_FOR_TRIALS);
    default:
      return assertNever(plan);
  }
}

export function computeLimits(plan: Plan, flags: GrandfatheringFlags): Limits {
  return {
    siteLimit: siteLimit(plan, flags),
    monthlyPageviewLimit: monthlyPageviewLimit(plan),
    teamMemberLimit: teamMemberLimit(plan),
  };
}
