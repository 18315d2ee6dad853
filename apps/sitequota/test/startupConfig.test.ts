import { describe, it, expect } from "vitest";
import {
  DEFAULT_PORT,
  DEFAULT_QUOTA_DB_PATH,
  StartupConfigError,
  loadConfig,
} from "../src/api/startupConfig.js";

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    const config = loadConfig({});
    expect(config.QUOTA_DB_PATH).toBe(DEFAULT_QUOTA_DB_PATH);
    expect(config.PORT).toBe(DEFAULT_PORT);
    expect(config.SELF_HOSTED).toBe(false);
    expect(config.PLAN_CATALOG_PATH).toBeUndefined();
  });

  it("reads every variable", () => {
    const config = loadConfig({
      QUOTA_DB_PATH: " /var/lib/sitequota/quota.db ",
      PLAN_CATALOG_PATH: "/etc/sitequota/plans.json",
      SELF_HOSTED: "TRUE",
      PORT: "8080",
      NODE_ENV: "production",
    });
    expect(config).toEqual({
      QUOTA_DB_PATH: "/var/lib/sitequota/quota.db",
      PLAN_CATALOG_PATH: "/etc/sitequota/plans.json",
      SELF_HOSTED: true,
      PORT: 8080,
      NODE_ENV: "production",
    });
  });

  it("accepts 1 and 0 as flags", () => {
    expect(loadConfig({ SELF_HOSTED: "1" }).SELF_HOSTED).toBe(true);
    expect(loadConfig({ SELF_HOSTED: "0" }).SELF_HOSTED).toBe(false);
  });

  it("falls back to defaults for blank values", () => {
    const config = loadConfig({ QUOTA_DB_PATH: "   ", PORT: "", PLAN_CATALOG_PATH: " " });
    expect(config.QUOTA_DB_PATH).toBe(DEFAULT_QUOTA_DB_PATH);
    expect(config.PORT).toBe(DEFAULT_PORT);
    expect(config.PLAN_CATALOG_PATH).toBeUndefined();
  });

  it("rejects an unparseable flag", () => {
    expect(() => loadConfig({ SELF_HOSTED: "yes" })).toThrow(StartupConfigError);
  });

  it("rejects an invalid port and lists the issue", () => {
    try {
      loadConfig({ PORT: "80a" });
      expect.unreachable("loadConfig should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(StartupConfigError);
      if (!(err instanceof StartupConfigError)) return;
      expect(err.issues).toHaveLength(1);
      expect(err.issues[0]?.path).toEqual(["PORT"]);
      expect(err.message).toContain("PORT");
    }
  });
});
