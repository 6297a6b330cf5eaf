/**
 * Public API
 */

export * from "./types";
export * from "./errors";
export {
  RetryingTransport,
  createFetchSender,
  buildUrl,
  HttpError,
  classifyRemoteError,
  computeBackoffDelay,
  computeRetryDelay,
  parseRetryAfter,
  resolveRetryPolicy,
} from "./clients/http";
export type { Transport, RetryingTransportDeps } from "./clients/http";
export { createInMemorySender } from "./clients/fake/inMemorySender";
export type { InMemorySender } from "./clients/fake/inMemorySender";
export { TtlCache, cacheKey } from "./cache";
export {
  BatchProcessor,
  CheckpointStore,
  RequestBatcher,
  resolveFinalStatus,
} from "./batch";
export type {
  BatchProcessorDeps,
  CheckpointStoreOptions,
  DispatchOptions,
  RequestBatcherDeps,
} from "./batch";
export { loadConfig } from "./config";
export { createEngine, createSender, withEngine } from "./engine";
export type { Engine, EngineDeps, ProcessorOptions } from "./engine";
export { openDb, closeDb, runMigrations } from "./db";
export type { Db } from "./db";
export { withContext, setLogLevel } from "./logger";
