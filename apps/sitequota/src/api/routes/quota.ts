// ── Quota Routes ────────────────────────────────────────────────────────────
//
//   GET  /accounts/:accountId/quota         plan, limits, usage, verdicts
//   POST /accounts/:accountId/quota/check   { resource } → allowed?
//
import express from "express";
import { z } from "zod";
import { QUOTA_RESOURCES, logInfo, type Account, type QuotaEngine } from "@sitequota/core";
import { getCorrelationId } from "../serverMiddleware.js";
import { checkView, reportView } from "../quotaView.js";

export type QuotaRouteOptions = {
  engine: QuotaEngine;
  getAccount(accountId: string): Account | null;
};

const checkBodySchema = z.object({
  resource: z.enum(QUOTA_RESOURCES),
});

export function createQuotaRoutes(opts: QuotaRouteOptions): express.Router {
  const router = express.Router();

  router.get("/accounts/:accountId/quota", (req, res, next) => {
    const correlationId = getCorrelationId(res);
    const account = opts.getAccount(req.params.accountId);
    if (!account) {
      res.status(404).json({ success: false, correlationId, error: "Account not found" });
      return;
    }

    opts.engine
      .evaluate(account)
      .then((report) => {
        res.json({ success: true, correlationId, data: reportView(report) });
      })
      .catch(next);
  });

  router.post("/accounts/:accountId/quota/check", (req, res, next) => {
    const correlationId = getCorrelationId(res);
    const parsed = checkBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        success: false,
        correlationId,
        error: "Invalid request body",
        issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      });
      return;
    }
    const account = opts.getAccount(req.params.accountId);
    if (!account) {
      res.status(404).json({ success: false, correlationId, error: "Account not found" });
      return;
    }

    opts.engine
      .checkResource(account, parsed.data.resource)
      .then((check) => {
        logInfo("quota.check", correlationId, {
          accountId: account.id,
          resource: check.resource,
          usage: check.usage,
          allowed: check.allowed,
        });
        res.json({ success: true, correlationId, data: checkView(check) });
      })
      .catch(next);
  });

  return router;
}
