/**
 * Run lock constants
 *
 * Configuration for the per-run lock (no concurrent run/resume of one run).
 */

/**
 * Lock TTL in seconds
 * The driving processor renews the lease on a heartbeat and with every write,
 * so the TTL only bounds how long a killed process keeps its run blocked.
 * Default: 1 minute.
 */
export const RUN_LOCK_TTL_SECONDS = 60;

/**
 * Heartbeat renewals per TTL period (20 s with the default TTL)
 */
export const RUN_LOCK_HEARTBEATS_PER_TTL = 3;
