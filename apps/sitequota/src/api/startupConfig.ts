// ── Startup configuration validation ────────────────────────────────────────
//
// Validates environment variables at process start using zod. On failure the
// launcher logs the formatted issues and exits non-zero.
//
import { z } from "zod";

// ── Schema ──────────────────────────────────────────────────────────────────

export const DEFAULT_QUOTA_DB_PATH = "./data/sitequota.db";
export const DEFAULT_PORT = 3002;

/** Optional path env that trims input and falls back to the provided default when missing or blank. */
const optionalPathWithDefault = (defaultPath: string) =>
  z.string().optional().transform((value) => (value ?? "").trim() || defaultPath);

const optionalPath = z
  .string()
  .optional()
  .transform((value) => (value ?? "").trim() || undefined);

/** "true"/"1" and "false"/"0", case-insensitive; blank or missing is false. */
const booleanFlag = z
  .string()
  .optional()
  .transform((value, ctx) => {
    const normalized = (value ?? "").trim().toLowerCase();
    if (normalized === "" || normalized === "false" || normalized === "0") return false;
    if (normalized === "true" || normalized === "1") return true;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected true/false/1/0, got "${value}"` });
    return z.NEVER;
  });

const port = z
  .string()
  .optional()
  .transform((value, ctx) => {
    const trimmed = (value ?? "").trim();
    if (!trimmed) return DEFAULT_PORT;
    const parsed = Number.parseInt(trimmed, 10);
    if (!/^\d+$/.test(trimmed) || parsed < 1 || parsed > 65535) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a port between 1 and 65535, got "${value}"` });
      return z.NEVER;
    }
    return parsed;
  });

export const startupConfigSchema = z.object({
  QUOTA_DB_PATH: optionalPathWithDefault(DEFAULT_QUOTA_DB_PATH),
  PLAN_CATALOG_PATH: optionalPath,
  SELF_HOSTED: booleanFlag,
  PORT: port,
  NODE_ENV: z.string().optional(),
});

export type AppConfig = z.infer<typeof startupConfigSchema>;

// ── Loader ──────────────────────────────────────────────────────────────────

/**
 * Parse and validate startup configuration from `process.env`.
 *
 * Throws a `StartupConfigError` with formatted messages on failure.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const result = startupConfigSchema.safeParse(env);

  if (!result.success) {
    const messages = result.error.issues.map(
      (issue) => `  • ${issue.path.join(".")}: ${issue.message}`,
    );
    throw new StartupConfigError(
      `Startup config validation failed:\n${messages.join("\n")}`,
      result.error.issues,
    );
  }

  return result.data;
}

/** Typed error thrown by loadConfig() so callers can inspect issues programmatically. */
export class StartupConfigError extends Error {
  readonly issues: z.ZodIssue[];
  constructor(message: string, issues: z.ZodIssue[]) {
    super(message);
    this.name = "StartupConfigError";
    this.issues = issues;
  }
}
