// ── Correlation ID middleware ────────────────────────────────────────────────
import crypto from "node:crypto";
import type express from "express";

export const CORRELATION_ID_HEADER = "x-correlation-id";
export const CORRELATION_ID_PATTERN = /^[A-Za-z0-9._:-]{8,128}$/;

function normalizeCorrelationId(value: string | null | undefined): string | null {
  if (!value) return null;
  const trimmed = value.trim();
  if (!CORRELATION_ID_PATTERN.test(trimmed)) return null;
  return trimmed;
}

export function withCorrelationId(req: express.Request, res: express.Response, next: express.NextFunction): void {
  const incoming = normalizeCorrelationId(req.get(CORRELATION_ID_HEADER));
  const correlationId = incoming ?? crypto.randomUUID();
  res.locals.correlationId = correlationId;
  res.setHeader("X-Correlation-Id", correlationId);
  next();
}

export function getCorrelationId(res: express.Response): string {
  const fromLocals = typeof res.locals?.correlationId === "string" ? res.locals.correlationId : "";
  return fromLocals || crypto.randomUUID();
}
