// ── Quota service ───────────────────────────────────────────────────────────
//
// createApp() wires the quota routes onto an Express app; startServer()
// validates the environment, opens the store, seeds the plan catalog and
// listens.
//
import crypto from "node:crypto";
import path from "node:path";
import { fileURLToPath } from "node:url";
import express from "express";
import {
  createLogDiagnosticSink,
  createQuotaEngine,
  logError,
  logInfo,
  type QuotaEngine,
} from "@sitequota/core";
import { QuotaStore } from "../engine/quotaStore.js";
import { DEFAULT_PLAN_CATALOG_PATH, seedPlanCatalog } from "../engine/planCatalogSeed.js";
import { createQuotaRoutes } from "./routes/quota.js";
import { getCorrelationId, withCorrelationId } from "./serverMiddleware.js";
import { StartupConfigError, loadConfig, type AppConfig } from "./startupConfig.js";

const __filename = fileURLToPath(import.meta.url);

export type CreateAppOptions = {
  store: QuotaStore;
  engine: QuotaEngine;
  /** Extra routers mounted under /api, after the quota routes. */
  routers?: express.Router[];
};

export function createEngineForStore(store: QuotaStore, config: Pick<AppConfig, "SELF_HOSTED">): QuotaEngine {
  return createQuotaEngine({
    catalog: store,
    ownership: store,
    memberships: store,
    metrics: store,
    diagnostics: createLogDiagnosticSink("billing.quota"),
    selfHosted: config.SELF_HOSTED,
  });
}

export function createApp(options: CreateAppOptions): express.Express {
  const { store, engine } = options;
  const app = express();
  app.disable("x-powered-by");
  app.use(withCorrelationId);
  app.use(express.json({ limit: "16kb" }));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  const getAccount = (accountId: string) => store.getAccount(accountId);
  app.use("/api", createQuotaRoutes({ engine, getAccount }));
  for (const router of options.routers ?? []) {
    app.use("/api", router);
  }

  // ── Global error handler ──────────────────────────────────────────────
  app.use((error: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (error instanceof SyntaxError) { res.status(400).json({ error: "Invalid JSON body" }); return; }
    const correlationId = getCorrelationId(res);
    logError(`${req.method} ${req.path}`, correlationId, error);
    res.status(500).json({ error: "Internal server error", correlationId });
  });

  return app;
}

// ── Standalone launcher ─────────────────────────────────────────────────────
export function startServer(env: Record<string, string | undefined> = process.env): void {
  let config: AppConfig;
  try {
    config = loadConfig(env);
  } catch (err) {
    if (err instanceof StartupConfigError) {
      // eslint-disable-next-line no-console
      console.error(err.message);
      process.exit(1);
    }
    throw err;
  }

  const store = new QuotaStore(config.QUOTA_DB_PATH);
  const planCount = seedPlanCatalog(store, config.PLAN_CATALOG_PATH ?? DEFAULT_PLAN_CATALOG_PATH);
  const app = createApp({ store, engine: createEngineForStore(store, config) });

  app.listen(config.PORT, () => {
    logInfo("server.start", crypto.randomUUID(), {
      port: config.PORT,
      selfHosted: config.SELF_HOSTED,
      plans: planCount,
    });
  });
}

if (process.argv[1] && path.resolve(process.argv[1]) === __filename) {
  startServer();
}
