// ── Usage aggregator ────────────────────────────────────────────────────────
//
// Reads current consumption from the ownership, membership and metrics
// collaborators. Nothing is cached between calls. Collaborator rejections
// propagate as-is; a reading that is not a non-negative integer throws
// MalformedInputError rather than being clamped.
//
import { MalformedInputError } from "./errors.js";
import { isNonNegativeInteger } from "./limit.js";
import type { Account, Usage } from "./types.js";

// ── Collaborators ───────────────────────────────────────────────────────────

export interface OwnershipStore {
  countOwnedSites(accountId: string): Promise<number>;
  /** Ids of the sites where the account holds the owner role. */
  listOwnedSiteIds(accountId: string): Promise<string[]>;
}

export type EmailRecord = { email: string };

export interface MembershipStore {
  /** Memberships of any role on the given sites. */
  listMemberships(siteIds: readonly string[]): Promise<EmailRecord[]>;
  /** Invitations on the given sites that have not been accepted yet. */
  listPendingInvitations(siteIds: readonly string[]): Promise<EmailRecord[]>;
}

export interface UsageMetrics {
  /** Per-category event counts for the account's sites over the trailing 30 days. */
  usageBreakdown(accountId: string): Promise<readonly number[]>;
}

export type UsageDeps = {
  ownership: OwnershipStore;
  memberships: MembershipStore;
  metrics: UsageMetrics;
};

// ── Team member set ─────────────────────────────────────────────────────────

export function normalizeEmail(value: string): string {
  return value.trim().toLowerCase();
}

/**
 * Distinct emails across memberships and pending invitations, minus the
 * owner. A person invited to one site and a member of another counts once.
 */
export function teamMemberEmails(
  memberships: Iterable<EmailRecord>,
  invitations: Iterable<EmailRecord>,
  ownEmail: string,
): Set<string> {
  const emails = new Set<string>();
  const sources: Array<[string, Iterable<EmailRecord>]> = [
    ["memberships", memberships],
    ["invitations", invitations],
  ];
  for (const [label, source] of sources) {
    for (const record of source) {
      const raw: unknown = record.email;
      if (typeof raw !== "string") {
        throw new MalformedInputError(`${label}.email`, `expected a string, got ${String(raw)}`);
      }
      const email = normalizeEmail(raw);
      if (email) emails.add(email);
    }
  }
  emails.delete(normalizeEmail(ownEmail));
  return emails;
}

// ── Readings ────────────────────────────────────────────────────────────────

function checkReading(source: string, value: unknown): number {
  if (!isNonNegativeInteger(value)) {
    throw new MalformedInputError(source, `expected a non-negative integer, got ${String(value)}`);
  }
  return value;
}

export function assertAccount(account: Account): void {
  if (typeof account.id !== "string" || !account.id.trim()) {
    throw new MalformedInputError("account.id", "must be a non-empty string");
  }
  if (typeof account.email !== "string" || !account.email.trim()) {
    throw new MalformedInputError("account.email", "must be a non-empty string");
  }
}

export async function siteUsage(account: Account, deps: Pick<UsageDeps, "ownership">): Promise<number> {
  return checkReading("ownership.countOwnedSites", await deps.ownership.countOwnedSites(account.id));
}

export async function monthlyPageviewUsage(account: Account, deps: Pick<UsageDeps, "metrics">): Promise<number> {
  const breakdown: unknown = await deps.metrics.usageBreakdown(account.id);
  if (!Array.isArray(breakdown)) {
    throw new MalformedInputError("metrics.usageBreakdown", "expected an array of counts");
  }
  let total = 0;
  for (const [index, count] of breakdown.entries()) {
    total += checkReading(`metrics.usageBreakdown[${index}]`, count);
  }
  return total;
}

export async function teamMemberUsage(
  account: Account,
  deps: Pick<UsageDeps, "ownership" | "memberships">,
): Promise<number> {
  const siteIds = await deps.ownership.listOwnedSiteIds(account.id);
  if (siteIds.length === 0) return 0;

  const [memberships, invitations] = await Promise.all([
    deps.memberships.listMemberships(siteIds),
    deps.memberships.listPendingInvitations(siteIds),
  ]);
  return teamMemberEmails(memberships, invitations, account.email).size;
}

export async function computeUsage(account: Account, deps: UsageDeps): Promise<Usage> {
  assertAccount(account);
  const [sites, pageviews, teamMembers] = await Promise.all([
    siteUsage(account, deps),
    monthlyPageviewUsage(account, deps),
    teamMemberUsage(account, deps),
  ]);
  return { siteUsage: sites, monthlyPageviewUsage: pageviews, teamMemberUsage: teamMembers };
}
