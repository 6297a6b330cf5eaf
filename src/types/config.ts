/**
 * Engine configuration type definitions
 */

export type EngineConfig = {
  /** SQLite file backing checkpoints and the cache (":memory:" allowed) */
  dbPath: string;
  /** Remote API base URL; undefined only in mock mode */
  apiBaseUrl?: string;
  /** Pre-acquired bearer token, sent as-is */
  apiToken?: string;
  apiTimeoutMs: number;
  /** Use the in-memory fake sender instead of the network */
  mockMode: boolean;
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
  };
  batch: {
    chunkSize: number;
    concurrency: number;
  };
  cacheDefaultTtlSeconds: number;
  runLockTtlSeconds: number;
};
