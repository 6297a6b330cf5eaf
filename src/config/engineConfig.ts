/**
 * Engine configuration from environment variables
 *
 * Every variable is optional except API_BASE_URL outside mock mode.
 * Unset or blank values take the documented default; malformed or
 * out-of-range values raise ConfigError.
 */

import type { EngineConfig } from "@/types";
import {
  DEFAULT_BASE_DELAY_MS,
  DEFAULT_BATCH_CONCURRENCY,
  DEFAULT_CACHE_TTL_SECONDS,
  DEFAULT_CHUNK_SIZE,
  DEFAULT_DB_PATH,
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_MAX_DELAY_MS,
  RUN_LOCK_TTL_SECONDS,
  batchCaps,
  configCaps,
} from "@/constants";
import { ConfigError } from "@/errors";

function readTrimmed(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;
  return raw.trim();
}

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number },
): number | undefined => {
  const raw = readTrimmed(env, name);
  if (raw === undefined) return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new ConfigError(
      name,
      `${name}=${raw} is out of allowed range [${range.min}..${range.max}]`,
    );
  }

  return value;
};

const parseBoolean = (env: NodeJS.ProcessEnv, name: string): boolean => {
  const raw = readTrimmed(env, name)?.toLowerCase();
  if (raw === undefined) return false;
  if (raw === "true" || raw === "1") return true;
  if (raw === "false" || raw === "0") return false;
  throw new ConfigError(name, `${name}=${raw} must be one of true, false, 1, 0`);
};

const validateHttpUrl = (name: string, raw: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(raw);
  } catch {
    throw new ConfigError(name, `${name}=${raw} is not a valid URL`);
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ConfigError(name, `${name}=${raw} must use http or https`);
  }
  return raw;
};

export type LoadConfigOptions = {
  /** Tools that never call the remote API (ops CLI) pass false */
  requireApi?: boolean;
};

export const loadConfig = (
  env: NodeJS.ProcessEnv = process.env,
  options: LoadConfigOptions = {},
): EngineConfig => {
  const mockMode = parseBoolean(env, "API_MOCK_MODE");
  const requireApi = options.requireApi ?? true;

  const rawBaseUrl = readTrimmed(env, "API_BASE_URL");
  if (rawBaseUrl === undefined && !mockMode && requireApi) {
    throw new ConfigError("API_BASE_URL", "API_BASE_URL is required unless API_MOCK_MODE is enabled");
  }
  const apiBaseUrl =
    rawBaseUrl === undefined ? undefined : validateHttpUrl("API_BASE_URL", rawBaseUrl);

  const retry = {
    maxAttempts:
      parseOptionalIntInRange(env, "RETRY_MAX_ATTEMPTS", configCaps.retryMaxAttempts) ??
      DEFAULT_MAX_ATTEMPTS,
    baseDelayMs:
      parseOptionalIntInRange(env, "RETRY_BASE_DELAY_MS", configCaps.retryBaseDelayMs) ??
      DEFAULT_BASE_DELAY_MS,
    maxDelayMs:
      parseOptionalIntInRange(env, "RETRY_MAX_DELAY_MS", configCaps.retryMaxDelayMs) ??
      DEFAULT_MAX_DELAY_MS,
  };
  if (retry.maxDelayMs < retry.baseDelayMs) {
    throw new ConfigError(
      "RETRY_MAX_DELAY_MS",
      `RETRY_MAX_DELAY_MS=${retry.maxDelayMs} must be >= RETRY_BASE_DELAY_MS=${retry.baseDelayMs}`,
    );
  }

  return {
    dbPath: readTrimmed(env, "DB_PATH") ?? DEFAULT_DB_PATH,
    apiBaseUrl,
    apiToken: readTrimmed(env, "API_TOKEN"),
    apiTimeoutMs:
      parseOptionalIntInRange(env, "API_TIMEOUT_MS", configCaps.apiTimeoutMs) ??
      DEFAULT_HTTP_TIMEOUT_MS,
    mockMode,
    retry,
    batch: {
      chunkSize:
        parseOptionalIntInRange(env, "BATCH_CHUNK_SIZE", batchCaps.chunkSize) ??
        DEFAULT_CHUNK_SIZE,
      concurrency:
        parseOptionalIntInRange(env, "BATCH_CONCURRENCY", batchCaps.concurrency) ??
        DEFAULT_BATCH_CONCURRENCY,
    },
    cacheDefaultTtlSeconds:
      parseOptionalIntInRange(env, "CACHE_DEFAULT_TTL_SECONDS", configCaps.cacheDefaultTtlSeconds) ??
      DEFAULT_CACHE_TTL_SECONDS,
    runLockTtlSeconds:
      parseOptionalIntInRange(env, "RUN_LOCK_TTL_SECONDS", configCaps.runLockTtlSeconds) ??
      RUN_LOCK_TTL_SECONDS,
  };
};
