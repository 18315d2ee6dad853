// ── Entitlement constants ───────────────────────────────────────────────────
//
// Single source of truth for the fixed caps that do not come from the plan
// catalog. All limit derivations import from here — no magic numbers.
//

/** Accounts created before this instant keep unlimited sites. */
export const LIMIT_SITES_SINCE = new Date("2021-05-05T00:00:00.000Z");

export const SITE_LIMIT_FOR_TRIALS = 50;
export const SITE_LIMIT_FOR_FREE_10K = 50;

export const MONTHLY_PAGEVIEW_LIMIT_FOR_FREE_10K = 10_000;

export const TEAM_MEMBER_LIMIT_FOR_TRIALS = 5;

/** Reserved plan identifier for the free 10k tier; never looked up in the catalog. */
export const FREE_10K_PLAN_ID = "free_10k";

export const USAGE_WINDOW_DAYS = 30;
