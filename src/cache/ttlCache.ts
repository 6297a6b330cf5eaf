/**
 * Persistent TTL cache over SQLite
 *
 * Holds idempotent lookups (field definitions, user directory entries, project
 * metadata) for a bounded time. Entries survive process restarts and are
 * evicted by time only.
 */

import type { Db } from "@/db";
import {
  countCacheEntries,
  deleteAllCacheEntries,
  deleteCacheEntry,
  deleteCacheEntryIfExpired,
  deleteExpiredCacheEntries,
  getCacheEntry,
  upsertCacheEntry,
} from "@/db";
import type { JsonValue, TtlCacheOptions } from "@/types";
import {
  CACHE_KEY_SEPARATOR,
  DEFAULT_CACHE_TTL_SECONDS,
  MAX_CACHE_TTL_SECONDS,
} from "@/constants";

/**
 * Build a composite key so different resource kinds never collide. Each
 * segment is URI-encoded, so a separator inside a segment cannot shift it.
 *
 * @example cacheKey("field", "customfield_10014") === "field:customfield_10014"
 */
export function cacheKey(kind: string, ...parts: Array<string | number>): string {
  return [kind, ...parts]
    .map((segment) => encodeURIComponent(String(segment)))
    .join(CACHE_KEY_SEPARATOR);
}

function assertValidTtl(ttlSeconds: number): void {
  if (!Number.isFinite(ttlSeconds) || ttlSeconds <= 0 || ttlSeconds > MAX_CACHE_TTL_SECONDS) {
    throw new RangeError(
      `Cache TTL must be > 0 and <= ${MAX_CACHE_TTL_SECONDS} seconds, got ${ttlSeconds}`,
    );
  }
}

export class TtlCache {
  private readonly db: Db;
  private readonly defaultTtlSeconds: number;
  private readonly now: () => number;
  private readonly loading = new Map<string, Promise<JsonValue>>();

  constructor(db: Db, options: TtlCacheOptions = {}) {
    this.db = db;
    this.defaultTtlSeconds = options.defaultTtlSeconds ?? DEFAULT_CACHE_TTL_SECONDS;
    this.now = options.now ?? Date.now;
    assertValidTtl(this.defaultTtlSeconds);
  }

  /**
   * @returns The stored value, or undefined if absent or expired
   */
  get(key: string): JsonValue | undefined {
    const row = getCacheEntry(this.db, key);
    if (!row) {
      return undefined;
    }

    const nowMs = this.now();
    if (nowMs >= row.expires_at) {
      deleteCacheEntryIfExpired(this.db, key, nowMs);
      return undefined;
    }

    const parsed: JsonValue = JSON.parse(row.value_json);
    return parsed;
  }

  put(key: string, value: JsonValue, ttlSeconds: number = this.defaultTtlSeconds): void {
    assertValidTtl(ttlSeconds);
    const nowMs = this.now();

    deleteExpiredCacheEntries(this.db, nowMs);
    upsertCacheEntry(this.db, {
      cache_key: key,
      value_json: JSON.stringify(value),
      inserted_at: nowMs,
      expires_at: nowMs + Math.round(ttlSeconds * 1000),
    });
  }

  invalidate(key: string): boolean {
    return deleteCacheEntry(this.db, key);
  }

  clear(): number {
    return deleteAllCacheEntries(this.db);
  }

  /**
   * @returns Number of entries removed
   */
  purgeExpired(): number {
    return deleteExpiredCacheEntries(this.db, this.now());
  }

  /**
   * Number of stored rows, expired ones included until purged
   */
  size(): number {
    return countCacheEntries(this.db);
  }

  /**
   * Read-through: return the cached value or load, store and return it.
   * Concurrent calls for the same key share one loader call. A rejected
   * load stores nothing.
   */
  async getOrLoad(
    key: string,
    loader: () => Promise<JsonValue>,
    ttlSeconds?: number,
  ): Promise<JsonValue> {
    const cached = this.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const pending = this.loading.get(key);
    if (pending) {
      return pending;
    }

    const load: Promise<JsonValue> = Promise.resolve()
      .then(() => loader())
      .then((value) => {
        this.put(key, value, ttlSeconds);
        return value;
      })
      .finally(() => {
        this.loading.delete(key);
      });

    this.loading.set(key, load);
    return load;
  }
}
