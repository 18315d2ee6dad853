// ── Plan catalog seed ───────────────────────────────────────────────────────
//
// Loads plan records from a JSON file into the store's plans table. The file
// is validated against the same schema the resolver applies at lookup time.
//
import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { catalogPlanSchema, type CatalogPlanRecord } from "@sitequota/core";
import type { QuotaStore } from "./quotaStore.js";

export const DEFAULT_PLAN_CATALOG_PATH = fileURLToPath(new URL("../../data/plans.json", import.meta.url));

const catalogFileSchema = z.object({ plans: z.array(catalogPlanSchema) });

export class PlanCatalogError extends Error {
  readonly issues: z.ZodIssue[];
  constructor(message: string, issues: z.ZodIssue[] = []) {
    super(message);
    this.name = "PlanCatalogError";
    this.issues = issues;
  }
}

export function readPlanCatalog(filePath: string): CatalogPlanRecord[] {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (error) {
    throw new PlanCatalogError(
      `Cannot read plan catalog ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  const result = catalogFileSchema.safeParse(raw);
  if (!result.success) {
    const messages = result.error.issues.map((issue) => `  • ${issue.path.join(".")}: ${issue.message}`);
    throw new PlanCatalogError(`Plan catalog ${filePath} is invalid:\n${messages.join("\n")}`, result.error.issues);
  }
  return result.data.plans;
}

/** Upserts every plan in the file; returns how many were written. */
export function seedPlanCatalog(store: QuotaStore, filePath: string = DEFAULT_PLAN_CATALOG_PATH): number {
  const plans = readPlanCatalog(filePath);
  const seed = store.db.transaction(() => {
    for (const plan of plans) store.upsertPlan(plan);
  });
  seed();
  return plans.length;
}
