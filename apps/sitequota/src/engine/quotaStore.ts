// ── Quota Store ─────────────────────────────────────────────────────────────
//
// SQLite-backed stand-in for the collaborators the quota engine reads:
//
//   PlanCatalog      plans table, rows shaped as catalog records
//   OwnershipStore   site_memberships with role = 'owner'
//   MembershipStore  site_memberships (any role) + unaccepted invitations
//   UsageMetrics     site_usage_daily, summed over the trailing 30 days
//
// The write helpers exist for seeding and tests; the engine only reads.
//
import fs from "node:fs";
import path from "node:path";
import crypto from "node:crypto";
import Database from "better-sqlite3";
import {
  USAGE_WINDOW_DAYS,
  type Account,
  type CatalogPlanRecord,
  type EmailRecord,
  type MembershipStore,
  type OwnershipStore,
  type PlanCatalog,
  type UsageMetrics,
} from "@sitequota/core";

// ── Types ───────────────────────────────────────────────────────────────────

export type SiteRole = "owner" | "admin" | "viewer";

export type AccountRow = {
  id: string;
  email: string;
  inserted_at: string;
};

export type SubscriptionRow = {
  id: string;
  account_id: string;
  plan_id: string;
  status: string;
  updated_at: string;
};

export type PlanRow = {
  plan_id: string;
  kind: "standard" | "enterprise";
  billing_interval: "monthly" | "yearly" | null;
  site_limit: number | null;
  monthly_pageview_limit: number | null;
  team_member_limit: number | null;
};

export type SiteRow = {
  id: string;
  domain: string;
  inserted_at: string;
};

export type InvitationRow = {
  id: string;
  site_id: string;
  email: string;
  role: SiteRole;
  invited_by: string;
  created_at: string;
  accepted_at: string | null;
};

export type QuotaStoreOptions = {
  /** Clock used for the usage window; defaults to the wall clock. */
  now?: () => Date;
};

const DAY_MS = 24 * 60 * 60 * 1000;

function isoDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function placeholders(count: number): string {
  return Array.from({ length: count }, () => "?").join(", ");
}

// ── Store ───────────────────────────────────────────────────────────────────

export class QuotaStore implements PlanCatalog, OwnershipStore, MembershipStore, UsageMetrics {
  readonly db: Database.Database;
  private readonly now: () => Date;

  constructor(dbPath: string, options: QuotaStoreOptions = {}) {
    if (dbPath === ":memory:") {
      this.db = new Database(dbPath);
    } else {
      const resolved = path.resolve(dbPath);
      fs.mkdirSync(path.dirname(resolved), { recursive: true });
      this.db = new Database(resolved);
      this.db.pragma("journal_mode = WAL");
      this.db.pragma("synchronous = NORMAL");
    }
    this.db.pragma("foreign_keys = ON");
    this.now = options.now ?? (() => new Date());
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS accounts (
        id TEXT PRIMARY KEY,
        email TEXT NOT NULL UNIQUE,
        inserted_at TEXT NOT NULL
      );
      CREATE TABLE IF NOT EXISTS plans (
        plan_id TEXT PRIMARY KEY,
        kind TEXT NOT NULL CHECK(kind IN ('standard','enterprise')),
        billing_interval TEXT CHECK(billing_interval IN ('monthly','yearly')),
        site_limit INTEGER,
        monthly_pageview_limit INTEGER,
        team_member_limit INTEGER
      );
      CREATE TABLE IF NOT EXISTS subscriptions (
        id TEXT PRIMARY KEY,
        account_id TEXT NOT NULL UNIQUE REFERENCES accounts(id),
        plan_id TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'active',
        updated_at TEXT NOT NULL
      );
      CREATE TABLE IF NOT EXISTS sites (
        id TEXT PRIMARY KEY,
        domain TEXT NOT NULL UNIQUE,
        inserted_at TEXT NOT NULL
      );
      CREATE TABLE IF NOT EXISTS site_memberships (
        id TEXT PRIMARY KEY,
        site_id TEXT NOT NULL REFERENCES sites(id),
        account_id TEXT NOT NULL REFERENCES accounts(id),
        role TEXT NOT NULL CHECK(role IN ('owner','admin','viewer')),
        inserted_at TEXT NOT NULL,
        UNIQUE(site_id, account_id)
      );
      CREATE INDEX IF NOT EXISTS idx_site_memberships_account ON site_memberships(account_id, role);
      CREATE TABLE IF NOT EXISTS invitations (
        id TEXT PRIMARY KEY,
        site_id TEXT NOT NULL REFERENCES sites(id),
        email TEXT NOT NULL,
        role TEXT NOT NULL CHECK(role IN ('owner','admin','viewer')),
        invited_by TEXT NOT NULL,
        created_at TEXT NOT NULL,
        accepted_at TEXT
      );
      CREATE INDEX IF NOT EXISTS idx_invitations_site ON invitations(site_id);
      CREATE TABLE IF NOT EXISTS site_usage_daily (
        site_id TEXT NOT NULL REFERENCES sites(id),
        day TEXT NOT NULL,
        pageviews INTEGER NOT NULL DEFAULT 0,
        custom_events INTEGER NOT NULL DEFAULT 0,
        PRIMARY KEY (site_id, day)
      );
    `);
  }

  close(): void {
    this.db.close();
  }

  // ── Accounts & subscriptions ────────────────────────────────────────────

  createAccount(input: { id?: string; email: string; insertedAt?: Date }): AccountRow {
    const row: AccountRow = {
      id: input.id ?? crypto.randomUUID(),
      email: input.email,
      inserted_at: (input.insertedAt ?? this.now()).toISOString(),
    };
    this.db
      .prepare(`INSERT INTO accounts (id, email, inserted_at) VALUES (@id, @email, @inserted_at)`)
      .run(row);
    return row;
  }

  setSubscription(accountId: string, planId: string, status: string = "active"): SubscriptionRow {
    const existing = this.getSubscriptionRow(accountId);
    const row: SubscriptionRow = {
      id: existing?.id ?? crypto.randomUUID(),
      account_id: accountId,
      plan_id: planId,
      status,
      updated_at: this.now().toISOString(),
    };
    this.db
      .prepare(
        `INSERT INTO subscriptions (id, account_id, plan_id, status, updated_at)
         VALUES (@id, @account_id, @plan_id, @status, @updated_at)
         ON CONFLICT(account_id) DO UPDATE SET
           plan_id = excluded.plan_id, status = excluded.status, updated_at = excluded.updated_at`,
      )
      .run(row);
    return row;
  }

  clearSubscription(accountId: string): void {
    this.db.prepare(`DELETE FROM subscriptions WHERE account_id = ?`).run(accountId);
  }

  private getSubscriptionRow(accountId: string): SubscriptionRow | null {
    return (
      this.db
        .prepare<[string], SubscriptionRow>(`SELECT * FROM subscriptions WHERE account_id = ?`)
        .get(accountId) ?? null
    );
  }

  /** The account as the engine sees it, or null when no such account exists. */
  getAccount(accountId: string): Account | null {
    const row = this.db.prepare<[string], AccountRow>(`SELECT * FROM accounts WHERE id = ?`).get(accountId);
    if (!row) return null;
    const subscription = this.getSubscriptionRow(accountId);
    return {
      id: row.id,
      email: row.email,
      signedUpAt: new Date(row.inserted_at),
      subscription: subscription
        ? { id: subscription.id, planId: subscription.plan_id, status: subscription.status }
        : null,
    };
  }

  // ── Plan catalog ────────────────────────────────────────────────────────

  upsertPlan(record: CatalogPlanRecord): void {
    const storedLimit = (value: number | "unlimited" | null | undefined): number | null =>
      typeof value === "number" ? value : null;
    this.db
      .prepare(
        `INSERT INTO plans (plan_id, kind, billing_interval, site_limit, monthly_pageview_limit, team_member_limit)
         VALUES (@plan_id, @kind, @billing_interval, @site_limit, @monthly_pageview_limit, @team_member_limit)
         ON CONFLICT(plan_id) DO UPDATE SET
           kind = excluded.kind,
           billing_interval = excluded.billing_interval,
           site_limit = excluded.site_limit,
           monthly_pageview_limit = excluded.monthly_pageview_limit,
           team_member_limit = excluded.team_member_limit`,
      )
      .run({
        plan_id: record.planId,
        kind: record.kind,
        billing_interval: record.billingInterval ?? null,
        site_limit: storedLimit(record.siteLimit),
        monthly_pageview_limit: storedLimit(record.monthlyPageviewLimit),
        team_member_limit: storedLimit(record.teamMemberLimit),
      });
  }

  async lookup(planId: string): Promise<unknown> {
    const row = this.db.prepare<[string], PlanRow>(`SELECT * FROM plans WHERE plan_id = ?`).get(planId);
    if (!row) return null;
    // NULL limits: unset (unlimited) on enterprise rows, malformed on standard rows.
    return {
      kind: row.kind,
      planId: row.plan_id,
      ...(row.billing_interval ? { billingInterval: row.billing_interval } : {}),
      siteLimit: row.site_limit,
      monthlyPageviewLimit: row.monthly_pageview_limit,
      teamMemberLimit: row.team_member_limit,
    };
  }

  // ── Sites, memberships & invitations ────────────────────────────────────

  createSite(input: { id?: string; domain: string; ownerId: string }): SiteRow {
    const row: SiteRow = {
      id: input.id ?? crypto.randomUUID(),
      domain: input.domain,
      inserted_at: this.now().toISOString(),
    };
    const insert = this.db.transaction(() => {
      this.db.prepare(`INSERT INTO sites (id, domain, inserted_at) VALUES (@id, @domain, @inserted_at)`).run(row);
      this.addMembership(row.id, input.ownerId, "owner");
    });
    insert();
    return row;
  }

  addMembership(siteId: string, accountId: string, role: SiteRole): void {
    this.db
      .prepare(
        `INSERT INTO site_memberships (id, site_id, account_id, role, inserted_at) VALUES (?, ?, ?, ?, ?)`,
      )
      .run(crypto.randomUUID(), siteId, accountId, role, this.now().toISOString());
  }

  createInvitation(siteId: string, email: string, role: SiteRole, invitedBy: string): InvitationRow {
    const row: InvitationRow = {
      id: crypto.randomUUID(),
      site_id: siteId,
      email,
      role,
      invited_by: invitedBy,
      created_at: this.now().toISOString(),
      accepted_at: null,
    };
    this.db
      .prepare(
        `INSERT INTO invitations (id, site_id, email, role, invited_by, created_at, accepted_at)
         VALUES (@id, @site_id, @email, @role, @invited_by, @created_at, @accepted_at)`,
      )
      .run(row);
    return row;
  }

  /** Marks the invitation accepted and adds the membership. Returns false for unknown or already-accepted invitations. */
  acceptInvitation(invitationId: string, accountId: string): boolean {
    const accept = this.db.transaction((): boolean => {
      const invitation = this.db
        .prepare<[string], InvitationRow>(`SELECT * FROM invitations WHERE id = ? AND accepted_at IS NULL`)
        .get(invitationId);
      if (!invitation) return false;
      this.db
        .prepare(`UPDATE invitations SET accepted_at = ? WHERE id = ?`)
        .run(this.now().toISOString(), invitationId);
      this.addMembership(invitation.site_id, accountId, invitation.role);
      return true;
    });
    return accept();
  }

  async countOwnedSites(accountId: string): Promise<number> {
    const row = this.db
      .prepare<[string], { count: number }>(
        `SELECT COUNT(*) AS count FROM site_memberships WHERE account_id = ? AND role = 'owner'`,
      )
      .get(accountId);
    return row?.count ?? 0;
  }

  async listOwnedSiteIds(accountId: string): Promise<string[]> {
    return this.db
      .prepare<[string], { site_id: string }>(
        `SELECT site_id FROM site_memberships WHERE account_id = ? AND role = 'owner' ORDER BY site_id`,
      )
      .all(accountId)
      .map((row) => row.site_id);
  }

  async listMemberships(siteIds: readonly string[]): Promise<EmailRecord[]> {
    if (siteIds.length === 0) return [];
    return this.db
      .prepare<string[], EmailRecord>(
        `SELECT a.email AS email
           FROM site_memberships m
           JOIN accounts a ON a.id = m.account_id
          WHERE m.site_id IN (${placeholders(siteIds.length)})`,
      )
      .all(...siteIds);
  }

  async listPendingInvitations(siteIds: readonly string[]): Promise<EmailRecord[]> {
    if (siteIds.length === 0) return [];
    return this.db
      .prepare<string[], EmailRecord>(
        `SELECT email FROM invitations
          WHERE site_id IN (${placeholders(siteIds.length)}) AND accepted_at IS NULL`,
      )
      .all(...siteIds);
  }

  // ── Usage metrics ───────────────────────────────────────────────────────

  recordDailyUsage(siteId: string, day: string, pageviews: number, customEvents: number = 0): void {
    this.db
      .prepare(
        `INSERT INTO site_usage_daily (site_id, day, pageviews, custom_events) VALUES (?, ?, ?, ?)
         ON CONFLICT(site_id, day) DO UPDATE SET
           pageviews = site_usage_daily.pageviews + excluded.pageviews,
           custom_events = site_usage_daily.custom_events + excluded.custom_events`,
      )
      .run(siteId, day, pageviews, customEvents);
  }

  /** [pageviews, custom events] for owned sites over the 30 days ending today (UTC). */
  async usageBreakdown(accountId: string): Promise<readonly number[]> {
    const today = this.now();
    const since = isoDay(new Date(today.getTime() - USAGE_WINDOW_DAYS * DAY_MS));
    const row = this.db
      .prepare<[string, string, string], { pageviews: number; custom_events: number }>(
        `SELECT COALESCE(SUM(u.pageviews), 0) AS pageviews,
                COALESCE(SUM(u.custom_events), 0) AS custom_events
           FROM site_usage_daily u
           JOIN site_memberships m ON m.site_id = u.site_id AND m.role = 'owner'
          WHERE m.account_id = ? AND u.day > ? AND u.day <= ?`,
      )
      .get(accountId, since, isoDay(today));
    return [row?.pageviews ?? 0, row?.custom_events ?? 0];
  }
}
