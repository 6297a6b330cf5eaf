/**
 * Unit tests for environment configuration
 */

import { describe, it, expect } from "vitest";
import { loadConfig } from "@/config";
import { ConfigError } from "@/errors";

const baseEnv = { API_BASE_URL: "https://tickets.example.test/rest/api/2" };

describe("loadConfig", () => {
  it("applies defaults for unset variables", () => {
    expect(loadConfig(baseEnv)).toEqual({
      dbPath: "data/engine.db",
      apiBaseUrl: "https://tickets.example.test/rest/api/2",
      apiToken: undefined,
      apiTimeoutMs: 30000,
      mockMode: false,
      retry: { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 30000 },
      batch: { chunkSize: 50, concurrency: 5 },
      cacheDefaultTtlSeconds: 300,
      runLockTtlSeconds: 60,
    });
  });

  it("reads overrides and treats blank values as unset", () => {
    const config = loadConfig({
      ...baseEnv,
      DB_PATH: "/tmp/ops.db",
      API_TOKEN: " test-token ",
      API_TIMEOUT_MS: "5000",
      RETRY_MAX_ATTEMPTS: "5",
      RETRY_BASE_DELAY_MS: "250",
      RETRY_MAX_DELAY_MS: "4000",
      BATCH_CHUNK_SIZE: "3",
      BATCH_CONCURRENCY: " ",
      CACHE_DEFAULT_TTL_SECONDS: "60",
      RUN_LOCK_TTL_SECONDS: "30",
    });

    expect(config.dbPath).toBe("/tmp/ops.db");
    expect(config.apiToken).toBe("test-token");
    expect(config.apiTimeoutMs).toBe(5000);
    expect(config.retry).toEqual({ maxAttempts: 5, baseDelayMs: 250, maxDelayMs: 4000 });
    expect(config.batch).toEqual({ chunkSize: 3, concurrency: 5 });
    expect(config.cacheDefaultTtlSeconds).toBe(60);
    expect(config.runLockTtlSeconds).toBe(30);
  });

  it("requires API_BASE_URL outside mock mode", () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    try {
      loadConfig({});
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      expect(err instanceof ConfigError && err.variable).toBe("API_BASE_URL");
    }
  });

  it("allows a missing API_BASE_URL in mock mode or when the API is not needed", () => {
    expect(loadConfig({ API_MOCK_MODE: "true" }).apiBaseUrl).toBeUndefined();
    expect(loadConfig({ API_MOCK_MODE: "1" }).mockMode).toBe(true);
    expect(loadConfig({}, { requireApi: false }).mockMode).toBe(false);
  });

  it("rejects out-of-range integers", () => {
    expect(() => loadConfig({ ...baseEnv, BATCH_CHUNK_SIZE: "0" })).toThrow(
      "BATCH_CHUNK_SIZE=0 is out of allowed range [1..1000]",
    );
    expect(() => loadConfig({ ...baseEnv, RETRY_MAX_ATTEMPTS: "2.5" })).toThrow(
      "RETRY_MAX_ATTEMPTS=2.5 is out of allowed range [1..10]",
    );
  });

  it("rejects a max delay below the base delay", () => {
    expect(() =>
      loadConfig({ ...baseEnv, RETRY_BASE_DELAY_MS: "2000", RETRY_MAX_DELAY_MS: "1000" }),
    ).toThrow("RETRY_MAX_DELAY_MS=1000 must be >= RETRY_BASE_DELAY_MS=2000");
  });

  it("rejects malformed URLs and flags", () => {
    expect(() => loadConfig({ API_BASE_URL: "ftp://tickets.example.test" })).toThrow(
      "API_BASE_URL=ftp://tickets.example.test must use http or https",
    );
    expect(() => loadConfig({ API_BASE_URL: "not a url" })).toThrow(
      "API_BASE_URL=not a url is not a valid URL",
    );
    expect(() => loadConfig({ ...baseEnv, API_MOCK_MODE: "maybe" })).toThrow(
      "API_MOCK_MODE=maybe must be one of true, false, 1, 0",
    );
  });
});
