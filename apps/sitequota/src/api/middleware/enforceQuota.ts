// ── Quota Enforcement Middleware ────────────────────────────────────────────
//
// Checks the account's usage of one resource against its limit and returns
// 403 when it is already at capacity. Wire this in front of routes that add
// a site, invite a team member or accept traffic. Store failures reach the
// error handler, so the gated action is refused.
//
import type { Request, Response, NextFunction, RequestHandler } from "express";
import { limitToJSON, type Account, type QuotaEngine, type QuotaResource } from "@sitequota/core";
import { getCorrelationId } from "../serverMiddleware.js";

export type EnforceQuotaOptions = {
  engine: QuotaEngine;
  getAccount(accountId: string): Account | null;
  /** Where the account id comes from; defaults to the `accountId` route param. */
  accountIdFrom?: (req: Request) => string | undefined;
  upgradeUrl?: string;
};

export function enforceQuota(resource: QuotaResource, opts: EnforceQuotaOptions): RequestHandler {
  const accountIdFrom = opts.accountIdFrom ?? ((req: Request) => req.params.accountId);
  const upgradeUrl = opts.upgradeUrl ?? "/settings/billing/upgrade";

  return (req: Request, res: Response, next: NextFunction) => {
    const correlationId = getCorrelationId(res);
    const accountId = accountIdFrom(req);
    const account = accountId ? opts.getAccount(accountId) : null;
    if (!account) {
      res.status(404).json({ success: false, correlationId, error: "Account not found" });
      return;
    }

    opts.engine
      .checkResource(account, resource)
      .then((check) => {
        if (check.allowed) {
          next();
          return;
        }
        res.status(403).json({
          success: false,
          correlationId,
          error: "quota_limit",
          resource,
          limit: limitToJSON(check.limit),
          current: check.usage,
          upgrade_url: upgradeUrl,
        });
      })
      .catch(next);
  };
}
