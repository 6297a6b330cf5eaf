/**
 * SQLite database connection
 *
 * Opens and closes connections explicitly; callers own the handle they get
 * back and pass it to the repositories.
 */

import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname, resolve } from "path";

export type Db = Database.Database;

/**
 * Ensure the parent directory exists (skip for :memory:)
 */
function prepareDbPath(dbPath: string): string {
  if (dbPath === ":memory:") {
    return dbPath;
  }
  const absolute = resolve(dbPath);
  mkdirSync(dirname(absolute), { recursive: true });
  return absolute;
}

/**
 * Open a database connection with required pragmas
 */
export function openDb(dbPath: string): Db {
  const db = new Database(prepareDbPath(dbPath));

  // Enable foreign keys (SQLite default is OFF)
  db.pragma("foreign_keys = ON");

  // WAL mode lets status readers run alongside an active batch writer
  if (dbPath !== ":memory:") {
    db.pragma("journal_mode = WAL");
  }

  // Wait instead of failing when another process holds the write lock
  db.pragma("busy_timeout = 5000");

  return db;
}

/**
 * Close a database connection (no-op if already closed)
 */
export function closeDb(db: Db): void {
  if (db.open) {
    db.close();
  }
}
