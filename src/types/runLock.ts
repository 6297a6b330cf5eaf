/**
 * Run lock type definitions
 *
 * Types for the per-run lock (no two run/resume calls on the same run id).
 */

/**
 * Run lock row (database entity)
 */
export type RunLockRow = {
  /** Batch run the lock guards */
  run_id: string;

  /** Owner identifier (UUID of the processor instance) */
  owner_id: string;

  /** When the lock was acquired (ISO 8601 string) */
  acquired_at: string;

  /** When the lock expires (ISO 8601 string) */
  expires_at: string;
};

/**
 * Lock acquisition result
 */
export type RunLockAcquireResult =
  | { ok: true }
  | { ok: false; reason: "LOCKED"; heldBy: string; expiresAt: string };

/**
 * Result of a write made only while the caller still holds the run lock
 */
export type OwnedWrite<T> = { owned: true; value: T } | { owned: false };
