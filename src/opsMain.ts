/**
 * Ops entrypoint: inspect and manage batch runs and the cache
 *
 * Usage:
 *   npm run build && node dist/opsMain.js <command> [args]
 *   node dist/opsMain.js runs 10
 *   node dist/opsMain.js status <runId>
 *
 * Environment variables:
 *   - DB_PATH: Path to SQLite database file (optional, defaults to data/engine.db)
 *   - CACHE_DEFAULT_TTL_SECONDS: Default cache TTL (optional)
 *   - LOG_LEVEL: Logging level (debug, info, warn, error)
 */

import "dotenv/config";
import { loadConfig } from "./config";
import { closeDb, openDb, runMigrations } from "./db";
import { CheckpointStore } from "./batch";
import { TtlCache } from "./cache";
import { executeOpsCommand, parseOpsArgs } from "./ops/opsCommands";
import * as logger from "./logger";

export function main(argv: readonly string[] = process.argv.slice(2)): number {
  try {
    const invocation = parseOpsArgs(argv);
    const config = loadConfig(process.env, { requireApi: false });
    const db = openDb(config.dbPath);

    try {
      const appliedMigrations = runMigrations(db);
      const result = executeOpsCommand(
        {
          store: new CheckpointStore(db),
          cache: new TtlCache(db, { defaultTtlSeconds: config.cacheDefaultTtlSeconds }),
          appliedMigrations,
        },
        invocation,
      );
      logger.info(`ops ${invocation.command}`, result);
      return 0;
    } finally {
      closeDb(db);
    }
  } catch (error) {
    logger.error("Ops command failed", {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    return 1;
  }
}

if (require.main === module) {
  process.exit(main());
}
