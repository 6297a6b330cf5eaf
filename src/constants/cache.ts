/**
 * TTL cache constants
 */

/**
 * Default freshness window for cached lookups (5 minutes)
 */
export const DEFAULT_CACHE_TTL_SECONDS = 300;

/**
 * Upper bound accepted for a TTL (7 days)
 */
export const MAX_CACHE_TTL_SECONDS = 604_800;

/**
 * Separator between composite key parts ("kind:id")
 */
export const CACHE_KEY_SEPARATOR = ":";
