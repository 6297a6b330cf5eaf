/**
 * TTL cache type definitions
 */

/**
 * Cache entry row (database entity)
 */
export type CacheEntryRow = {
  /** Composite key, e.g. "field:customfield_10014" */
  cache_key: string;

  /** JSON-serialized value */
  value_json: string;

  /** Insertion time (epoch ms) */
  inserted_at: number;

  /** Expiry time (epoch ms); the entry is absent from this instant on */
  expires_at: number;
};

export type TtlCacheOptions = {
  /** TTL applied when put() is called without one */
  defaultTtlSeconds?: number;
  /** Clock (epoch ms), injectable for tests */
  now?: () => number;
};
