// ── Diagnostic sink ─────────────────────────────────────────────────────────
//
// Fire-and-forget channel for events an operator should follow up on, such
// as a subscription pointing at a plan the catalog does not know.
//
import crypto from "node:crypto";
import { logWarn } from "./log.js";

export type DiagnosticContext = Record<string, unknown>;

export interface DiagnosticSink {
  capture(message: string, context: DiagnosticContext): void;
}

export type CapturedDiagnostic = {
  message: string;
  context: DiagnosticContext;
};

/** Writes each capture as a structured `warn` line. */
export function createLogDiagnosticSink(scope: string = "billing.quota"): DiagnosticSink {
  return {
    capture(message, context) {
      logWarn(scope, crypto.randomUUID(), { message, ...context });
    },
  };
}

/** Keeps captures in memory, for hosts that forward them elsewhere and for tests. */
export function createMemoryDiagnosticSink(): DiagnosticSink & { readonly events: CapturedDiagnostic[] } {
  const events: CapturedDiagnostic[] = [];
  return {
    events,
    capture(message, context) {
      events.push({ message, context });
    },
  };
}
