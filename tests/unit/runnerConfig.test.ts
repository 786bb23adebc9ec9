/**
 * Unit tests for runner configuration
 */

import { describe, it, expect } from "vitest";
import { ConfigError, loadRunnerConfig } from "@/config";

describe("loadRunnerConfig", () => {
  it("uses defaults when nothing is set", () => {
    expect(loadRunnerConfig({})).toEqual({
      runMode: "once",
      logLevel: "info",
      dbPath: "data/app.db",
      ownersFile: "data/owners.json",
      crawlConcurrency: 1,
      ownerTimeoutMs: 300_000,
      cycleIntervalMs: 900_000,
    });
  });

  it("reads and normalizes overrides", () => {
    expect(
      loadRunnerConfig({
        RUN_MODE: " Forever ",
        LOG_LEVEL: "DEBUG",
        DB_PATH: "/tmp/crawl.db",
        OWNERS_FILE: "config/owners.json",
        CRAWL_CONCURRENCY: "4",
        OWNER_TIMEOUT_MS: "60000",
        CYCLE_INTERVAL_MS: "120000",
      }),
    ).toEqual({
      runMode: "forever",
      logLevel: "debug",
      dbPath: "/tmp/crawl.db",
      ownersFile: "config/owners.json",
      crawlConcurrency: 4,
      ownerTimeoutMs: 60_000,
      cycleIntervalMs: 120_000,
    });
  });

  it("treats blank values as unset", () => {
    expect(loadRunnerConfig({ CRAWL_CONCURRENCY: "  ", DB_PATH: "" })).toMatchObject({
      crawlConcurrency: 1,
      dbPath: "data/app.db",
    });
  });

  it.each(["0", "-1", "2.5", "four"])(
    "rejects CRAWL_CONCURRENCY=%j",
    (value) => {
      expect(() => loadRunnerConfig({ CRAWL_CONCURRENCY: value })).toThrow(
        `Invalid configuration: CRAWL_CONCURRENCY must be a positive integer, got "${value}"`,
      );
    },
  );

  it("rejects an unknown run mode", () => {
    expect(() => loadRunnerConfig({ RUN_MODE: "sometimes" })).toThrow(
      'Invalid configuration: RUN_MODE must be one of once, forever, got "sometimes"',
    );
  });

  it("rejects an unknown log level with a ConfigError", () => {
    try {
      loadRunnerConfig({ LOG_LEVEL: "verbose" });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      expect(err instanceof ConfigError && err.variable).toBe("LOG_LEVEL");
    }
  });
});
