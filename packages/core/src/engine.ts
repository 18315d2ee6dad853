// ── Quota engine ────────────────────────────────────────────────────────────
//
// Composes resolver → calculator → aggregator → evaluator for one account.
// Request-scoped and stateless: every call re-reads the catalog and stores,
// so concurrent evaluations for different accounts share nothing mutable.
//
//   computeLimits(account)            plan + grandfathering → Limits
//   computeUsage(account)             three concurrent store reads → Usage
//   evaluate(account)                 both of the above, per-resource verdicts
//   checkResource(account, resource)  one verdict, reading only that usage
//
import type { DiagnosticSink } from "./diagnostics.js";
import { withinLimit, type Limit } from "./limit.js";
import { computeLimits, grandfatheringFlags } from "./limits.js";
import { resolvePlan, type Plan, type PlanCatalog } from "./plans.js";
import { assertNever, type Account, type Limits, type QuotaResource, type SubscriptionRef, type Usage } from "./types.js";
import {
  assertAccount,
  computeUsage,
  monthlyPageviewUsage,
  siteUsage,
  teamMemberUsage,
  type MembershipStore,
  type OwnershipStore,
  type UsageMetrics,
} from "./usage.js";

export type QuotaEngineOptions = {
  catalog: PlanCatalog;
  ownership: OwnershipStore;
  memberships: MembershipStore;
  metrics: UsageMetrics;
  diagnostics: DiagnosticSink;
  /** Self-hosted deployments have no site cap. */
  selfHosted: boolean;
};

export type ResourceCheck = {
  resource: QuotaResource;
  limit: Limit;
  usage: number;
  allowed: boolean;
};

export type QuotaReport = {
  plan: Plan;
  limits: Limits;
  usage: Usage;
  within: Record<QuotaResource, boolean>;
  atLimit: boolean;
};

export type QuotaEngine = {
  resolvePlan(subscription?: SubscriptionRef | null): Promise<Plan>;
  computeLimits(account: Account): Promise<Limits>;
  computeUsage(account: Account): Promise<Usage>;
  withinLimit(usage: number, limit: Limit): boolean;
  evaluate(account: Account): Promise<QuotaReport>;
  checkResource(account: Account, resource: QuotaResource): Promise<ResourceCheck>;
};

export function limitFor(limits: Limits, resource: QuotaResource): Limit {
  switch (resource) {
    case "sites":
      return limits.siteLimit;
    case "monthly_pageviews":
      return limits.monthlyPageviewLimit;
    case "team_members":
      return limits.teamMemberLimit;
    default:
      return assertNever(resource);
  }
}

export function createQuotaEngine(options: QuotaEngineOptions): QuotaEngine {
  const { catalog, ownership, memberships, metrics, diagnostics } = options;
  const selfHosted = options.selfHosted;

  const resolve = (subscription?: SubscriptionRef | null) =>
    resolvePlan(subscription, { catalog, diagnostics });

  async function planAndLimits(account: Account): Promise<{ plan: Plan; limits: Limits }> {
    assertAccount(account);
    const flags = grandfatheringFlags(account, { selfHosted });
    const plan = await resolve(account.subscription);
    return { plan, limits: computeLimits(plan, flags) };
  }

  function readUsage(account: Account, resource: QuotaResource): Promise<number> {
    switch (resource) {
      case "sites":
        return siteUsage(account, { ownership });
      case "monthly_pageviews":
        return monthlyPageviewUsage(account, { metrics });
      case "team_members":
        return teamMemberUsage(account, { ownership, memberships });
      default:
        return assertNever(resource);
    }
  }

  return {
    resolvePlan: resolve,

    async computeLimits(account) {
      return (await planAndLimits(account)).limits;
    },

    computeUsage(account) {
      return computeUsage(account, { ownership, memberships, metrics });
    },

    withinLimit,

    async evaluate(account) {
      const [{ plan, limits }, usage] = await Promise.all([
        planAndLimits(account),
        computeUsage(account, { ownership, memberships, metrics }),
      ]);
      const within: Record<QuotaResource, boolean> = {
        sites: withinLimit(usage.siteUsage, limits.siteLimit),
        monthly_pageviews: withinLimit(usage.monthlyPageviewUsage, limits.monthlyPageviewLimit),
        team_members: withinLimit(usage.teamMemberUsage, limits.teamMemberLimit),
      };
      return {
        plan,
        limits,
        usage,
        within,
        atLimit: !within.sites || !within.monthly_pageviews || !within.team_members,
      };
    },

    async checkResource(account, resource) {
      assertAccount(account);
      const [{ limits }, usage] = await Promise.all([planAndLimits(account), readUsage(account, resource)]);
      const limit = limitFor(limits, resource);
      return { resource, limit, usage, allowed: withinLimit(usage, limit) };
    },
  };
}
