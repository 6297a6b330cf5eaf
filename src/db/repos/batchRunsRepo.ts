/**
 * Batch runs repository
 *
 * Data access layer for the batch_runs table.
 */

import type { BatchRunRow, BatchRunStatus } from "@/types";
import type { Db } from "../connection";

export type BatchRunInsert = {
  run_id: string;
  operation: string;
  chunk_size: number;
  concurrency: number;
  dry_run: boolean;
  item_count: number;
  created_at: string;
};

export function insertRun(db: Db, input: BatchRunInsert): void {
  db.prepare(
    `
    INSERT INTO batch_runs (
      run_id, operation, status, chunk_size, concurrency,
      dry_run, item_count, created_at, updated_at
    ) VALUES (?, ?, 'created', ?, ?, ?, ?, ?, ?)
  `,
  ).run(
    input.run_id,
    input.operation,
    input.chunk_size,
    input.concurrency,
    input.dry_run ? 1 : 0,
    input.item_count,
    input.created_at,
    input.created_at,
  );
}

export function getRunRow(db: Db, runId: string): BatchRunRow | undefined {
  return db.prepare("SELECT * FROM batch_runs WHERE run_id = ?").get(runId) as
    | BatchRunRow
    | undefined;
}

/**
 * Set run status; `finishedAt` is written only for final statuses
 */
export function updateRunStatus(
  db: Db,
  runId: string,
  status: BatchRunStatus,
  now: string,
  finishedAt: string | null = null,
): void {
  db.prepare(
    `
    UPDATE batch_runs
    SET status = ?,
        finished_at = ?,
        updated_at = ?
    WHERE run_id = ?
  `,
  ).run(status, finishedAt, now, runId);
}

/**
 * Persist (or clear) a cancel request, visible to the process driving the run
 *
 * @returns false if the run does not exist
 */
export function setCancelRequested(
  db: Db,
  runId: string,
  requested: boolean,
  now: string,
): boolean {
  const result = db
    .prepare(
      "UPDATE batch_runs SET cancel_requested = ?, updated_at = ? WHERE run_id = ?",
    )
    .run(requested ? 1 : 0, now, runId);
  return result.changes > 0;
}

export function isCancelRequested(db: Db, runId: string): boolean {
  const row = db
    .prepare("SELECT cancel_requested FROM batch_runs WHERE run_id = ?")
    .get(runId) as { cancel_requested: number } | undefined;
  return row?.cancel_requested === 1;
}

/**
 * List runs, newest first
 */
export function listRunRows(db: Db, limit: number): BatchRunRow[] {
  return db
    .prepare("SELECT * FROM batch_runs ORDER BY created_at DESC, run_id LIMIT ?")
    .all(limit) as BatchRunRow[];
}
