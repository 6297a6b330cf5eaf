/**
 * Cache entries repository
 *
 * Data access layer for the cache_entries table. Each write is a single
 * statement, so value and expiry of a key always change together.
 */

import type { CacheEntryRow } from "@/types";
import type { Db } from "../connection";

export function getCacheEntry(db: Db, key: string): CacheEntryRow | undefined {
  return db.prepare("SELECT * FROM cache_entries WHERE cache_key = ?").get(key) as
    | CacheEntryRow
    | undefined;
}

export function upsertCacheEntry(db: Db, entry: CacheEntryRow): void {
  db.prepare(
    `
    INSERT INTO cache_entries (cache_key, value_json, inserted_at, expires_at)
    VALUES (?, ?, ?, ?)
    ON CONFLICT(cache_key) DO UPDATE SET
      value_json = excluded.value_json,
      inserted_at = excluded.inserted_at,
      expires_at = excluded.expires_at
  `,
  ).run(entry.cache_key, entry.value_json, entry.inserted_at, entry.expires_at);
}

export function deleteCacheEntry(db: Db, key: string): boolean {
  return db.prepare("DELETE FROM cache_entries WHERE cache_key = ?").run(key).changes > 0;
}

/**
 * Delete an entry only if it is still the expired one that was read,
 * so a concurrent replacement is not lost
 */
export function deleteCacheEntryIfExpired(db: Db, key: string, nowMs: number): boolean {
  return (
    db
      .prepare("DELETE FROM cache_entries WHERE cache_key = ? AND expires_at <= ?")
      .run(key, nowMs).changes > 0
  );
}

export function deleteExpiredCacheEntries(db: Db, nowMs: number): number {
  return db.prepare("DELETE FROM cache_entries WHERE expires_at <= ?").run(nowMs).changes;
}

export function deleteAllCacheEntries(db: Db): number {
  return db.prepare("DELETE FROM cache_entries").run().changes;
}

export function countCacheEntries(db: Db): number {
  const row = db.prepare("SELECT COUNT(*) AS count FROM cache_entries").get() as {
    count: number;
  };
  return row.count;
}
