import type { Limit } from "./limit.js";

export type SubscriptionRef = {
  id: string;
  planId: string;
  status?: string;
};

export type Account = {
  id: string;
  email: string;
  signedUpAt: Date;
  subscription: SubscriptionRef | null;
};

export type Limits = {
  siteLimit: Limit;
  monthlyPageviewLimit: Limit;
  teamMemberLimit: Limit;
};

export type Usage = {
  siteUsage: number;
  monthlyPageviewUsage: number;
  teamMemberUsage: number;
};

export const QUOTA_RESOURCES = ["sites", "monthly_pageviews", "team_members"] as const;

export type QuotaResource = (typeof QUOTA_RESOURCES)[number];

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
