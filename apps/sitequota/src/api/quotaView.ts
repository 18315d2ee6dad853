// ── Wire shapes for quota state ─────────────────────────────────────────────
import {
  limitToJSON,
  type Limits,
  type Plan,
  type QuotaReport,
  type ResourceCheck,
  type Usage,
} from "@sitequota/core";

export type PlanView = { kind: Plan["kind"]; planId?: string };

export function planView(plan: Plan): PlanView {
  switch (plan.kind) {
    case "enterprise":
    case "standard":
    case "unknown":
      return { kind: plan.kind, planId: plan.planId };
    case "free_10k":
    case "no_plan":
      return { kind: plan.kind };
  }
}

export function limitsView(limits: Limits) {
  return {
    sites: limitToJSON(limits.siteLimit),
    monthly_pageviews: limitToJSON(limits.monthlyPageviewLimit),
    team_members: limitToJSON(limits.teamMemberLimit),
  };
}

export function usageView(usage: Usage) {
  return {
    sites: usage.siteUsage,
    monthly_pageviews: usage.monthlyPageviewUsage,
    team_members: usage.teamMemberUsage,
  };
}

export function reportView(report: QuotaReport) {
  return {
    plan: planView(report.plan),
    limits: limitsView(report.limits),
    usage: usageView(report.usage),
    within: report.within,
    at_limit: report.atLimit,
  };
}

export function checkView(check: ResourceCheck) {
  return {
    resource: check.resource,
    limit: limitToJSON(check.limit),
    usage: check.usage,
    allowed: check.allowed,
  };
}
