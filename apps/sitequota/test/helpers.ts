import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { createMemoryDiagnosticSink, createQuotaEngine, type QuotaEngineOptions } from "@sitequota/core";
import { QuotaStore } from "../src/engine/quotaStore.js";

/** Fixed "today" for usage windows: the window is 2026-03-02 .. 2026-03-31. */
export const NOW = new Date("2026-03-31T12:00:00.000Z");

export function makeTempStore(prefix: string): { store: QuotaStore; tmpDir: string; cleanup(): void } {
  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  const store = new QuotaStore(path.join(tmpDir, "sitequota.db"), { now: () => NOW });
  return {
    store,
    tmpDir,
    cleanup() {
      store.close();
      fs.rmSync(tmpDir, { recursive: true, force: true });
    },
  };
}

export function engineFor(store: QuotaStore, overrides: Partial<QuotaEngineOptions> = {}) {
  const diagnostics = createMemoryDiagnosticSink();
  const engine = createQuotaEngine({
    catalog: store,
    ownership: store,
    memberships: store,
    metrics: store,
    diagnostics,
    selfHosted: false,
    ...overrides,
  });
  return { engine, diagnostics };
}
