/**
 * Configuration constants: env defaults and accepted ranges
 */

export const DEFAULT_DB_PATH = "data/engine.db";

export const configCaps = {
  apiTimeoutMs: { min: 1_000, max: 120_000 },
  retryMaxAttempts: { min: 1, max: 10 },
  retryBaseDelayMs: { min: 1, max: 60_000 },
  retryMaxDelayMs: { min: 1, max: 300_000 },
  cacheDefaultTtlSeconds: { min: 1, max: 604_800 },
  runLockTtlSeconds: { min: 1, max: 86_400 },
} as const;
