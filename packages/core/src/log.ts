// ── Structured logging ──────────────────────────────────────────────────────
//
// One JSON object per line on stdout/stderr. Fields: level, scope,
// correlationId, timestamp, then whatever the caller passes.
//

export type LogDetails = Record<string, unknown>;

export function logInfo(scope: string, correlationId: string, details: LogDetails = {}): void {
  const serialized = {
    level: "info",
    scope,
    correlationId,
    timestamp: new Date().toISOString(),
    ...details,
  };
  // eslint-disable-next-line no-console
  console.info(JSON.stringify(serialized));
}

export function logWarn(scope: string, correlationId: string, details: LogDetails = {}): void {
  const serialized = {
    level: "warn",
    scope,
    correlationId,
    timestamp: new Date().toISOString(),
    ...details,
  };
  // eslint-disable-next-line no-console
  console.warn(JSON.stringify(serialized));
}

export function logError(scope: string, correlationId: string, error: unknown): void {
  const serialized = {
    level: "error",
    scope,
    correlationId,
    name: error instanceof Error ? error.name : "UnknownError",
    message: error instanceof Error ? error.message : "Unhandled error",
    timestamp: new Date().toISOString(),
  };
  // eslint-disable-next-line no-console
  console.error(JSON.stringify(serialized));
}
