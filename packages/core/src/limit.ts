// ── Limit values & evaluator ────────────────────────────────────────────────
//
// A limit is either a non-negative integer cap or unlimited. Never a magic
// number: `Infinity`, -1 and null are not limits.
//
import { MalformedInputError } from "./errors.js";

export type UnlimitedLimit = { readonly kind: "unlimited" };
export type NumericLimit = { readonly kind: "numeric"; readonly value: number };
export type Limit = UnlimitedLimit | NumericLimit;

export const UNLIMITED: UnlimitedLimit = Object.freeze({ kind: "unlimited" });

export function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

export function numeric(value: number): NumericLimit {
  if (!isNonNegativeInteger(value)) {
    throw new MalformedInputError("limit", `expected a non-negative integer, got ${String(value)}`);
  }
  return { kind: "numeric", value };
}

export function isUnlimited(limit: Limit): limit is UnlimitedLimit {
  return limit.kind === "unlimited";
}

/** Wire form used by hosts: the cap itself, or the string "unlimited". */
export function limitToJSON(limit: Limit): number | "unlimited" {
  return limit.kind === "unlimited" ? "unlimited" : limit.value;
}

/**
 * Whether `usage` still leaves room under `limit`.
 *
 * Strict: usage equal to a numeric cap is already at capacity.
 */
export function withinLimit(usage: number, limit: Limit): boolean {
  if (!isNonNegativeInteger(usage)) {
    throw new MalformedInputError("usage", `expected a non-negative integer, got ${String(usage)}`);
  }
  switch (limit.kind) {
    case "unlimited":
      return true;
    case "numeric":
      return usage < limit.value;
  }
}
