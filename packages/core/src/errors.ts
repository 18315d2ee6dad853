// ── Quota engine errors ─────────────────────────────────────────────────────
//
// Only malformed input is raised by the engine itself. Collaborator failures
// (store or metrics unavailable) propagate untouched so callers can choose to
// fail closed or retry; a plan the catalog cannot resolve is never an error.
//

export class QuotaEngineError extends Error {
  readonly code: string;
  constructor(code: string, message: string) {
    super(message);
    this.name = "QuotaEngineError";
    this.code = code;
  }
}

/** A value crossing the engine boundary that cannot be trusted: blank ids, negative usage, etc. */
export class MalformedInputError extends QuotaEngineError {
  readonly field: string;
  constructor(field: string, message: string) {
    super("malformed_input", `${field}: ${message}`);
    this.name = "MalformedInputError";
    this.field = field;
  }
}
