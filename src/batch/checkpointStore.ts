/**
 * Checkpoint store: durable state of batch runs
 *
 * Wraps the batch_runs, batch_items and run_locks repositories behind one
 * clock. Everything a resume needs is read back from SQLite; nothing is kept
 * in memory between calls.
 */

import type { Db } from "@/db";
import {
  acquireRunLock,
  countItemsByStatus,
  deleteRunLock,
  getRunLock,
  getRunRow,
  insertItems,
  insertRun,
  isCancelRequested,
  listItemRows,
  listRunRows,
  markItemsInFlight,
  recordTerminalStatus,
  refreshRunLock,
  releaseRunLock,
  revertInFlightItems,
  setCancelRequested,
  updateRunStatus,
} from "@/db";
import type {
  BatchItem,
  BatchItemRow,
  BatchItemStatus,
  BatchRun,
  BatchRunRow,
  BatchRunStatus,
  Checkpoint,
  JsonValue,
  NewBatchRun,
  OwnedWrite,
  ProgressSnapshot,
  RunLockAcquireResult,
  RunLockRow,
  StatusCounts,
  TerminalItemUpdate,
} from "@/types";
import { BATCH_ITEM_STATUSES, BATCH_RUN_STATUSES, batchCaps } from "@/constants";
import {
  BatchRunNotFoundError,
  BatchStateError,
  CheckpointCorruptionError,
} from "@/errors";

export type CheckpointStoreOptions = {
  /** Clock (epoch ms), injectable for tests */
  now?: () => number;
};

function isRunStatus(value: string): value is BatchRunStatus {
  return BATCH_RUN_STATUSES.some((status) => status === value);
}

function isItemStatus(value: string): value is BatchItemStatus {
  return BATCH_ITEM_STATUSES.some((status) => status === value);
}

function inRange(value: number, range: { min: number; max: number }): boolean {
  return Number.isInteger(value) && value >= range.min && value <= range.max;
}

export function emptyStatusCounts(): StatusCounts {
  return { pending: 0, in_flight: 0, succeeded: 0, failed: 0, skipped: 0 };
}

export function isFinishedStatus(status: BatchRunStatus): boolean {
  return status === "completed" || status === "partially_failed";
}

export function toSnapshot(run: BatchRun, counts: StatusCounts): ProgressSnapshot {
  return {
    runId: run.runId,
    operation: run.operation,
    status: run.status,
    dryRun: run.dryRun,
    total: run.itemCount,
    counts,
    createdAt: run.createdAt,
    updatedAt: run.updatedAt,
    finishedAt: run.finishedAt,
  };
}

function toBatchRun(row: BatchRunRow): BatchRun {
  const corrupt = (detail: string) => new CheckpointCorruptionError(row.run_id, detail);

  if (!isRunStatus(row.status)) {
    throw corrupt(`unknown run status "${row.status}"`);
  }
  if (!inRange(row.chunk_size, batchCaps.chunkSize)) {
    throw corrupt(`invalid chunk size ${row.chunk_size}`);
  }
  if (!inRange(row.concurrency, batchCaps.concurrency)) {
    throw corrupt(`invalid concurrency ${row.concurrency}`);
  }
  if (row.dry_run !== 0 && row.dry_run !== 1) {
    throw corrupt(`invalid dry_run flag ${row.dry_run}`);
  }
  if (!Number.isInteger(row.item_count) || row.item_count < 0) {
    throw corrupt(`invalid item count ${row.item_count}`);
  }

  return {
    runId: row.run_id,
    operation: row.operation,
    status: row.status,
    chunkSize: row.chunk_size,
    concurrency: row.concurrency,
    dryRun: row.dry_run === 1,
    itemCount: row.item_count,
    cancelRequested: row.cancel_requested === 1,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    finishedAt: row.finished_at,
  };
}

function toBatchItem(row: BatchItemRow, expectedPosition: number): BatchItem {
  const corrupt = (detail: string) =>
    new CheckpointCorruptionError(row.run_id, `item ${row.item_id}: ${detail}`);

  if (row.position !== expectedPosition) {
    throw corrupt(`expected position ${expectedPosition}, found ${row.position}`);
  }
  if (!isItemStatus(row.status)) {
    throw corrupt(`unknown item status "${row.status}"`);
  }
  if (!Number.isInteger(row.attempts) || row.attempts < 0) {
    throw corrupt(`invalid attempts ${row.attempts}`);
  }

  let input: JsonValue;
  try {
    input = JSON.parse(row.input_json);
  } catch (err) {
    throw corrupt(`unreadable input (${err instanceof Error ? err.message : String(err)})`);
  }

  return {
    itemId: row.item_id,
    position: row.position,
    input,
    status: row.status,
    reason: row.reason,
    attempts: row.attempts,
  };
}

export class CheckpointStore {
  readonly db: Db;
  private readonly clock: () => number;

  constructor(db: Db, options: CheckpointStoreOptions = {}) {
    this.db = db;
    this.clock = options.now ?? Date.now;
  }

  now(): number {
    return this.clock();
  }

  private timestamp(): string {
    return new Date(this.clock()).toISOString();
  }

  /**
   * Persist a new run with every item pending, in one transaction
   */
  createRun(run: NewBatchRun): void {
    const createdAt = this.timestamp();
    const transaction = this.db.transaction(() => {
      insertRun(this.db, {
        run_id: run.runId,
        operation: run.operation,
        chunk_size: run.chunkSize,
        concurrency: run.concurrency,
        dry_run: run.dryRun,
        item_count: run.items.length,
        created_at: createdAt,
      });
      insertItems(this.db, run.runId, run.items, createdAt);
    });

    transaction();
  }

  /**
   * @throws BatchRunNotFoundError if the run does not exist
   * @throws CheckpointCorruptionError if the run row is inconsistent
   */
  loadRun(runId: string): BatchRun {
    const row = getRunRow(this.db, runId);
    if (!row) {
      throw new BatchRunNotFoundError(runId);
    }
    return toBatchRun(row);
  }

  /**
   * Load and validate a run with its ordered items
   *
   * @throws BatchRunNotFoundError if the run does not exist
   * @throws CheckpointCorruptionError on any inconsistency
   */
  load(runId: string): Checkpoint {
    const read = this.db.transaction(() => ({
      runRow: getRunRow(this.db, runId),
      itemRows: listItemRows(this.db, runId),
    }));
    const { runRow, itemRows } = read();

    if (!runRow) {
      throw new BatchRunNotFoundError(runId);
    }

    const run = toBatchRun(runRow);
    if (itemRows.length !== run.itemCount) {
      throw new CheckpointCorruptionError(
        runId,
        `expected ${run.itemCount} items, found ${itemRows.length}`,
      );
    }

    return { run, items: itemRows.map((row, index) => toBatchItem(row, index)) };
  }

  setRunStatus(runId: string, status: BatchRunStatus, finished = false): void {
    const now = this.timestamp();
    updateRunStatus(this.db, runId, status, now, finished ? now : null);
  }

  markInFlight(runId: string, itemIds: readonly string[]): number {
    const now = this.timestamp();
    const transaction = this.db.transaction(() =>
      markItemsInFlight(this.db, runId, itemIds, now),
    );
    return transaction();
  }

  /**
   * @returns false if the item was already terminal
   */
  recordTerminal(runId: string, update: TerminalItemUpdate): boolean {
    return recordTerminalStatus(this.db, runId, update, this.timestamp());
  }

  revertInFlight(runId: string): number {
    return revertInFlightItems(this.db, runId, this.timestamp());
  }

  counts(runId: string): StatusCounts {
    const counts = emptyStatusCounts();
    for (const row of countItemsByStatus(this.db, runId)) {
      if (!isItemStatus(row.status)) {
        throw new CheckpointCorruptionError(runId, `unknown item status "${row.status}"`);
      }
      counts[row.status] = row.count;
    }
    return counts;
  }

  /**
   * Run row plus per-status counts, without touching either
   */
  snapshot(runId: string): ProgressSnapshot {
    return toSnapshot(this.loadRun(runId), this.counts(runId));
  }

  /**
   * Flag the run for cancellation; the process driving it stops before its
   * next chunk
   *
   * @throws BatchStateError if the run already finished
   */
  requestCancel(runId: string): BatchRun {
    const run = this.loadRun(runId);
    if (isFinishedStatus(run.status)) {
      throw new BatchStateError(runId, run.status, `Run ${runId} already finished (${run.status})`);
    }
    this.setCancelRequested(runId, true);
    return run;
  }

  /**
   * @returns false if the run does not exist
   */
  setCancelRequested(runId: string, requested: boolean): boolean {
    return setCancelRequested(this.db, runId, requested, this.timestamp());
  }

  isCancelRequested(runId: string): boolean {
    return isCancelRequested(this.db, runId);
  }

  listRuns(limit: number): BatchRun[] {
    return listRunRows(this.db, limit).map(toBatchRun);
  }

  acquireLock(runId: string, ownerId: string, ttlSeconds: number): RunLockAcquireResult {
    return acquireRunLock(this.db, runId, ownerId, ttlSeconds, this.clock());
  }

  refreshLock(runId: string, ownerId: string, ttlSeconds: number): boolean {
    return refreshRunLock(this.db, runId, ownerId, ttlSeconds, this.clock());
  }

  releaseLock(runId: string, ownerId: string): boolean {
    return releaseRunLock(this.db, runId, ownerId);
  }

  /**
   * Drop the lock regardless of its owner
   *
   * @returns false if the run was not locked
   */
  forceReleaseLock(runId: string): boolean {
    return deleteRunLock(this.db, runId);
  }

  /**
   * Run `write` only while `ownerId` still holds the run lock. The lease is
   * extended in the same transaction, so no other owner can take the run
   * between the check and the write.
   */
  whileOwner<T>(
    runId: string,
    ownerId: string,
    ttlSeconds: number,
    write: () => T,
  ): OwnedWrite<T> {
    const transaction = this.db.transaction((): OwnedWrite<T> => {
      if (!refreshRunLock(this.db, runId, ownerId, ttlSeconds, this.clock())) {
        return { owned: false };
      }
      return { owned: true, value: write() };
    });
    return transaction();
  }

  getLock(runId: string): RunLockRow | null {
    return getRunLock(this.db, runId);
  }
}
