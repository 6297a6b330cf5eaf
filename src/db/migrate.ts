/**
 * Database migration runner
 *
 * Applies SQL migrations from the migrations/ directory in order.
 */

import { readdirSync, readFileSync } from "fs";
import { join } from "path";
import type { Db } from "./connection";
import * as logger from "@/logger";

/**
 * Repository-level migrations/ directory (same relative depth from src/db and dist/db)
 */
export const DEFAULT_MIGRATIONS_DIR = join(__dirname, "..", "..", "migrations");

/**
 * Ensure schema_migrations table exists
 */
function ensureMigrationsTable(db: Db): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      version TEXT NOT NULL UNIQUE,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);
}

/**
 * Get list of applied migrations
 */
function getAppliedMigrations(db: Db): Set<string> {
  const rows = db.prepare("SELECT version FROM schema_migrations").all() as {
    version: string;
  }[];
  return new Set(rows.map((r) => r.version));
}

/**
 * Get pending migrations from the migrations directory
 */
function getPendingMigrations(
  migrationsDir: string,
  appliedMigrations: Set<string>,
): string[] {
  const sqlFiles = readdirSync(migrationsDir)
    .filter((f) => f.endsWith(".sql"))
    .sort();

  return sqlFiles.filter((f) => !appliedMigrations.has(f));
}

/**
 * Apply a single migration file atomically
 */
function applyMigration(db: Db, migrationsDir: string, filename: string): void {
  const sql = readFileSync(join(migrationsDir, filename), "utf-8");

  // Wrap migration + recording in a transaction
  const transaction = db.transaction(() => {
    db.exec(sql);
    db.prepare("INSERT INTO schema_migrations (version) VALUES (?)").run(filename);
  });

  transaction();
}

/**
 * Run all pending migrations
 *
 * @returns Filenames applied by this call
 */
export function runMigrations(
  db: Db,
  migrationsDir: string = DEFAULT_MIGRATIONS_DIR,
): string[] {
  ensureMigrationsTable(db);

  const pendingMigrations = getPendingMigrations(migrationsDir, getAppliedMigrations(db));

  if (pendingMigrations.length === 0) {
    logger.debug("No pending migrations");
    return [];
  }

  logger.info("Applying migrations", { count: pendingMigrations.length });

  for (const migration of pendingMigrations) {
    logger.debug("Applying migration", { migration });
    applyMigration(db, migrationsDir, migration);
  }

  return pendingMigrations;
}
