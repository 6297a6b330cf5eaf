/**
 * Engine composition: builds every component over one explicitly opened
 * database and hands them back to the caller
 *
 * There is no process-wide instance: each createEngine() call owns its own
 * database handle, released by close() (or by withEngine on every exit path).
 */

import type {
  BatchOperation,
  ChunkProgress,
  EngineConfig,
  HttpSender,
  JsonValue,
  Logger,
  RetryPolicy,
} from "@/types";
import { closeDb, openDb, runMigrations, type Db } from "@/db";
import { RetryingTransport, createFetchSender } from "@/clients/http";
import { createInMemorySender } from "@/clients/fake/inMemorySender";
import { TtlCache } from "@/cache";
import { BatchProcessor, CheckpointStore, RequestBatcher } from "@/batch";
import { DEFAULT_RETRY_POLICY } from "@/constants";
import { ConfigError } from "@/errors";
import * as logger from "@/logger";

export type EngineDeps = {
  /** Replaces the sender chosen from config */
  sender?: HttpSender;
  logger?: Logger;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  migrationsDir?: string;
};

export type ProcessorOptions = {
  policy?: Partial<RetryPolicy>;
  onChunkPersisted?: (progress: ChunkProgress) => void;
};

export type Engine = {
  config: EngineConfig;
  db: Db;
  sender: HttpSender;
  transport: RetryingTransport;
  cache: TtlCache;
  batcher: RequestBatcher;
  store: CheckpointStore;
  /** Processor for one bulk operation, sharing this engine's components */
  processor<TInput extends JsonValue>(
    operation: BatchOperation<TInput>,
    options?: ProcessorOptions,
  ): BatchProcessor<TInput>;
  close(): void;
};

/**
 * Pick the fake sender in mock mode, the fetch sender otherwise
 */
export function createSender(config: EngineConfig): HttpSender {
  if (config.mockMode) {
    logger.info("API mock mode enabled, using in-memory sender");
    return createInMemorySender();
  }

  if (!config.apiBaseUrl) {
    throw new ConfigError("API_BASE_URL", "API_BASE_URL is required unless API_MOCK_MODE is enabled");
  }

  const headers: Record<string, string> = {};
  if (config.apiToken) {
    headers.Authorization = `Bearer ${config.apiToken}`;
  }

  return createFetchSender({
    baseUrl: config.apiBaseUrl,
    headers,
    timeoutMs: config.apiTimeoutMs,
  });
}

export function createEngine(config: EngineConfig, deps: EngineDeps = {}): Engine {
  const log = deps.logger ?? logger.rootLogger;
  const sender = deps.sender ?? createSender(config);

  const db = openDb(config.dbPath);
  try {
    runMigrations(db, deps.migrationsDir);
  } catch (err) {
    closeDb(db);
    throw err;
  }

  const transport = new RetryingTransport({
    send: sender,
    policy: { ...DEFAULT_RETRY_POLICY, ...config.retry },
    logger: log,
    sleep: deps.sleep,
    random: deps.random,
    now: deps.now,
  });
  const cache = new TtlCache(db, {
    defaultTtlSeconds: config.cacheDefaultTtlSeconds,
    now: deps.now,
  });
  const batcher = new RequestBatcher({
    transport,
    defaultConcurrency: config.batch.concurrency,
    logger: log,
  });
  const store = new CheckpointStore(db, { now: deps.now });

  log.debug("Engine ready", { dbPath: config.dbPath, mockMode: config.mockMode });

  return {
    config,
    db,
    sender,
    transport,
    cache,
    batcher,
    store,
    processor: (operation, options = {}) =>
      new BatchProcessor({
        store,
        batcher,
        operation,
        logger: log,
        lockTtlSeconds: config.runLockTtlSeconds,
        defaults: config.batch,
        policy: options.policy,
        onChunkPersisted: options.onChunkPersisted,
      }),
    close: () => closeDb(db),
  };
}

/**
 * Run `fn` with a fresh engine, closing its database afterwards even when
 * `fn` throws
 */
export async function withEngine<T>(
  config: EngineConfig,
  fn: (engine: Engine) => Promise<T> | T,
  deps: EngineDeps = {},
): Promise<T> {
  const engine = createEngine(config, deps);
  try {
    return await fn(engine);
  } finally {
    engine.close();
  }
}
