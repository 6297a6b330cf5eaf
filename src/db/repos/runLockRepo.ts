/**
 * Run lock repository
 *
 * Per-run lock guaranteeing that at most one run/resume call drives a given
 * batch run, across processes sharing the database. Locks carry a TTL so a
 * crashed owner cannot block its run forever.
 */

import type { RunLockAcquireResult, RunLockRow } from "@/types";
import type { Db } from "../connection";

function expiryFrom(nowMs: number, ttlSeconds: number): string {
  return new Date(nowMs + ttlSeconds * 1000).toISOString();
}

/**
 * Acquire the lock for a run
 *
 * Atomic via INSERT ... ON CONFLICT: a new lock is inserted, an expired lock
 * is taken over, and a live lock held by someone else is left untouched.
 *
 * @param ownerId - Unique owner identifier (UUID)
 * @param nowMs - Current time (epoch ms)
 */
export function acquireRunLock(
  db: Db,
  runId: string,
  ownerId: string,
  ttlSeconds: number,
  nowMs: number,
): RunLockAcquireResult {
  const now = new Date(nowMs).toISOString();

  const result = db
    .prepare(
      `
    INSERT INTO run_locks (run_id, owner_id, acquired_at, expires_at)
    VALUES (?, ?, ?, ?)
    ON CONFLICT(run_id) DO UPDATE SET
      owner_id = excluded.owner_id,
      acquired_at = excluded.acquired_at,
      expires_at = excluded.expires_at
    WHERE run_locks.expires_at <= excluded.acquired_at
  `,
    )
    .run(runId, ownerId, now, expiryFrom(nowMs, ttlSeconds));

  if (result.changes > 0) {
    return { ok: true };
  }

  const held = getRunLock(db, runId);
  return {
    ok: false,
    reason: "LOCKED",
    heldBy: held?.owner_id ?? "unknown",
    expiresAt: held?.expires_at ?? "unknown",
  };
}

/**
 * Extend the lock expiry if this owner holds it
 *
 * @returns true if refreshed, false if the lock is not owned by `ownerId`
 */
export function refreshRunLock(
  db: Db,
  runId: string,
  ownerId: string,
  ttlSeconds: number,
  nowMs: number,
): boolean {
  const result = db
    .prepare(
      `
    UPDATE run_locks
    SET expires_at = ?
    WHERE run_id = ?
      AND owner_id = ?
  `,
    )
    .run(expiryFrom(nowMs, ttlSeconds), runId, ownerId);

  return result.changes > 0;
}

/**
 * Release the lock if this owner holds it
 */
export function releaseRunLock(db: Db, runId: string, ownerId: string): boolean {
  const result = db
    .prepare("DELETE FROM run_locks WHERE run_id = ? AND owner_id = ?")
    .run(runId, ownerId);

  return result.changes > 0;
}

/**
 * Remove the lock whoever holds it
 *
 * For operators clearing a lock left behind by a killed process.
 */
export function deleteRunLock(db: Db, runId: string): boolean {
  return db.prepare("DELETE FROM run_locks WHERE run_id = ?").run(runId).changes > 0;
}

/**
 * Get current lock state for a run
 */
export function getRunLock(db: Db, runId: string): RunLockRow | null {
  const row = db
    .prepare("SELECT * FROM run_locks WHERE run_id = ?")
    .get(runId) as RunLockRow | undefined;

  return row ?? null;
}
