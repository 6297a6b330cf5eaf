/**
 * Checkpointed batch processor
 *
 * Drives a bulk operation over many items in sequential chunks. Each chunk is
 * fanned out through the RequestBatcher and every item's terminal status is
 * written to SQLite as soon as its requests complete, so a later resume()
 * only redoes items whose outcome was never persisted.
 *
 * Runs are forward-only: succeeded items are never undone.
 */

import { randomUUID } from "crypto";
import type {
  ApiRequest,
  BatchExecuteOptions,
  BatchItem,
  BatchItemInput,
  BatchOperation,
  BatchRun,
  BatchRunReport,
  BatchRunStatus,
  BatchStartOptions,
  Checkpoint,
  ChunkProgress,
  FailureOutcome,
  ItemPlan,
  JsonValue,
  Logger,
  Outcome,
  OwnedWrite,
  ProgressSnapshot,
  RetryPolicy,
  StatusCounts,
  TerminalItemUpdate,
} from "@/types";
import {
  DEFAULT_BATCH_CONCURRENCY,
  DEFAULT_CHUNK_SIZE,
  DEFAULT_RUN_LIST_LIMIT,
  DRY_RUN_SKIP_REASON,
  EMPTY_PLAN_SKIP_REASON,
  ITEM_REASON_MAX_LENGTH,
  RUN_LOCK_HEARTBEATS_PER_TTL,
  RUN_LOCK_TTL_SECONDS,
  batchCaps,
} from "@/constants";
import {
  BatchInputError,
  BatchStateError,
  ConcurrentRunError,
} from "@/errors";
import * as logger from "@/logger";
import type { RequestBatcher } from "./requestBatcher";
import {
  CheckpointStore,
  emptyStatusCounts,
  isFinishedStatus,
  toSnapshot,
} from "./checkpointStore";

export type BatchProcessorDeps<TInput extends JsonValue> = {
  store: CheckpointStore;
  batcher: RequestBatcher;
  operation: BatchOperation<TInput>;
  logger?: Logger;
  /** Identifies this processor in run locks; defaults to a fresh UUID */
  ownerId?: string;
  lockTtlSeconds?: number;
  /** Lease renewal period while a run is driven; defaults to a third of the TTL */
  heartbeatIntervalMs?: number;
  /** Used by start() when the caller passes no chunkSize/concurrency */
  defaults?: { chunkSize?: number; concurrency?: number };
  /** Retry policy override for every request this processor dispatches */
  policy?: Partial<RetryPolicy>;
  /** Called after each chunk's outcomes are durable */
  onChunkPersisted?: (progress: ChunkProgress) => void;
  newRunId?: () => string;
};

/**
 * Run lock held by one run()/resume() call. Once `lost` is set nothing more
 * is written for the run.
 */
type Lease = {
  runId: string;
  lost: boolean;
};

type InFlightItem = {
  item: BatchItem;
  requests: ApiRequest[];
  outcomes: Array<Outcome | undefined>;
  remaining: number;
};

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function chunkItems<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    chunks.push(items.slice(start, start + size));
  }
  return chunks;
}

function truncateReason(reason: string): string {
  return reason.length > ITEM_REASON_MAX_LENGTH
    ? reason.slice(0, ITEM_REASON_MAX_LENGTH)
    : reason;
}

function assertOption(
  name: string,
  value: number,
  range: { min: number; max: number },
): void {
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new BatchInputError(
      `${name} must be an integer between ${range.min} and ${range.max}, got ${value}`,
    );
  }
}

/**
 * completed: every item succeeded or was skipped
 * partially_failed: every item terminal, at least one failed
 * interrupted: anything left pending
 */
export function resolveFinalStatus(counts: StatusCounts): BatchRunStatus {
  if (counts.pending > 0 || counts.in_flight > 0) {
    return "interrupted";
  }
  return counts.failed > 0 ? "partially_failed" : "completed";
}

/**
 * Fold an item's request outcomes into its terminal status.
 * The first failing request (in plan order) supplies the reason.
 */
function summarizeItem(entry: InFlightItem): TerminalItemUpdate {
  const attempts = entry.outcomes.reduce((sum, outcome) => sum + (outcome?.attempts ?? 0), 0);
  const failure = entry.outcomes.find(
    (outcome): outcome is FailureOutcome => outcome !== undefined && !outcome.ok,
  );

  if (failure) {
    return {
      itemId: entry.item.itemId,
      status: "failed",
      reason: `${failure.kind}: ${failure.message}`,
      attempts,
    };
  }
  return { itemId: entry.item.itemId, status: "succeeded", reason: null, attempts };
}

export class BatchProcessor<TInput extends JsonValue = JsonValue> {
  private readonly store: CheckpointStore;
  private readonly batcher: RequestBatcher;
  // Inputs come back from the checkpoint as stored by start()
  private readonly operation: BatchOperation;
  private readonly log: Logger;
  private readonly ownerId: string;
  private readonly lockTtlSeconds: number;
  private readonly heartbeatIntervalMs: number;
  private readonly defaultChunkSize: number;
  private readonly defaultConcurrency: number;
  private readonly policy?: Partial<RetryPolicy>;
  private readonly onChunkPersisted?: (progress: ChunkProgress) => void;
  private readonly newRunId: () => string;

  constructor(deps: BatchProcessorDeps<TInput>) {
    this.store = deps.store;
    this.batcher = deps.batcher;
    this.operation = deps.operation;
    this.log = deps.logger ?? logger.rootLogger;
    this.ownerId = deps.ownerId ?? randomUUID();
    this.lockTtlSeconds = deps.lockTtlSeconds ?? RUN_LOCK_TTL_SECONDS;
    this.heartbeatIntervalMs =
      deps.heartbeatIntervalMs ?? (this.lockTtlSeconds * 1000) / RUN_LOCK_HEARTBEATS_PER_TTL;
    this.defaultChunkSize = deps.defaults?.chunkSize ?? DEFAULT_CHUNK_SIZE;
    this.defaultConcurrency = deps.defaults?.concurrency ?? DEFAULT_BATCH_CONCURRENCY;
    this.policy = deps.policy;
    this.onChunkPersisted = deps.onChunkPersisted;
    this.newRunId = deps.newRunId ?? randomUUID;
  }

  /**
   * Create a run with every item pending
   *
   * @returns The new run id
   * @throws BatchInputError on empty or duplicate ids, or out-of-range options
   */
  start(items: readonly BatchItemInput<TInput>[], options: BatchStartOptions = {}): string {
    return this.createRun(items, options);
  }

  /**
   * Process a freshly created run
   *
   * @throws BatchStateError if the run is not in "created" status
   */
  run(runId: string, options: BatchExecuteOptions = {}): Promise<BatchRunReport> {
    return this.drive(runId, "run", options);
  }

  /**
   * Continue a run from its checkpoint. Items found in_flight are retried;
   * terminal items are never touched. A pending cancel request is cleared.
   */
  resume(runId: string, options: BatchExecuteOptions = {}): Promise<BatchRunReport> {
    return this.drive(runId, "resume", options);
  }

  /**
   * Read-only progress counts; safe while another process drives the run
   */
  status(runId: string): ProgressSnapshot {
    return this.store.snapshot(runId);
  }

  report(runId: string): BatchRunReport {
    const { run, items } = this.store.load(runId);
    const counts = emptyStatusCounts();
    for (const item of items) {
      counts[item.status] += 1;
    }

    return {
      ...toSnapshot(run, counts),
      items: items.map((item) => ({
        itemId: item.itemId,
        status: item.status,
        reason: item.reason,
        attempts: item.attempts,
      })),
    };
  }

  /**
   * Request cooperative cancellation. The driving process stops before its
   * next chunk and leaves the run interrupted.
   */
  cancel(runId: string): void {
    const run = this.store.requestCancel(runId);
    this.log.info("Batch run cancellation requested", { runId, status: run.status });
  }

  /**
   * Start a new run holding the failed items of a finished run
   *
   * @returns The new run id
   */
  retryFailed(runId: string, options: BatchStartOptions = {}): string {
    const { run, items } = this.store.load(runId);
    this.assertOperation(run);

    if (!isFinishedStatus(run.status)) {
      throw new BatchStateError(
        runId,
        run.status,
        `Run ${runId} is ${run.status}; only finished runs can be retried`,
      );
    }

    const failed = items.filter((item) => item.status === "failed");
    if (failed.length === 0) {
      throw new BatchStateError(runId, run.status, `Run ${runId} has no failed items`);
    }

    const retryRunId = this.createRun(
      failed.map((item) => ({ id: item.itemId, input: item.input })),
      {
        chunkSize: options.chunkSize ?? run.chunkSize,
        concurrency: options.concurrency ?? run.concurrency,
        dryRun: options.dryRun ?? run.dryRun,
      },
    );
    this.log.info("Created retry run for failed items", {
      runId,
      retryRunId,
      items: failed.length,
    });
    return retryRunId;
  }

  /**
   * Recent runs of every operation, newest first
   */
  listRuns(limit: number = DEFAULT_RUN_LIST_LIMIT): BatchRun[] {
    return this.store.listRuns(limit);
  }

  private createRun(items: readonly BatchItemInput[], options: BatchStartOptions): string {
    if (items.length === 0) {
      throw new BatchInputError("A batch run needs at least one item");
    }

    const seen = new Set<string>();
    for (const item of items) {
      if (item.id.trim() === "") {
        throw new BatchInputError("Item ids must be non-empty");
      }
      if (seen.has(item.id)) {
        throw new BatchInputError(`Duplicate item id: ${item.id}`);
      }
      seen.add(item.id);
    }

    const chunkSize = options.chunkSize ?? this.defaultChunkSize;
    const concurrency = options.concurrency ?? this.defaultConcurrency;
    assertOption("chunkSize", chunkSize, batchCaps.chunkSize);
    assertOption("concurrency", concurrency, batchCaps.concurrency);

    const runId = this.newRunId();
    const dryRun = options.dryRun ?? false;
    this.store.createRun({
      runId,
      operation: this.operation.name,
      chunkSize,
      concurrency,
      dryRun,
      items: [...items],
    });

    this.log.info("Batch run created", {
      runId,
      operation: this.operation.name,
      items: items.length,
      chunkSize,
      concurrency,
      dryRun,
    });
    return runId;
  }

  private assertOperation(run: BatchRun): void {
    if (run.operation !== this.operation.name) {
      throw new BatchStateError(
        run.runId,
        run.status,
        `Run ${run.runId} belongs to operation "${run.operation}", not "${this.operation.name}"`,
      );
    }
  }

  /**
   * Lock, load, process, unlock. Nothing is touched before the lock is held
   * and the checkpoint validated.
   */
  private async drive(
    runId: string,
    mode: "run" | "resume",
    options: BatchExecuteOptions,
  ): Promise<BatchRunReport> {
    const lock = this.store.acquireLock(runId, this.ownerId, this.lockTtlSeconds);
    if (!lock.ok) {
      throw new ConcurrentRunError(runId, lock.heldBy, lock.expiresAt);
    }

    const lease: Lease = { runId, lost: false };
    const heartbeat = setInterval(() => this.heartbeat(lease), this.heartbeatIntervalMs);

    try {
      const checkpoint = this.store.load(runId);
      this.assertOperation(checkpoint.run);

      if (mode === "run" && checkpoint.run.status !== "created") {
        throw new BatchStateError(
          runId,
          checkpoint.run.status,
          `Run ${runId} is ${checkpoint.run.status}; use resume() to continue it`,
        );
      }
      if (mode === "resume" && checkpoint.run.cancelRequested) {
        this.store.setCancelRequested(runId, false);
      }

      return await this.process(checkpoint, lease, options.signal);
    } finally {
      clearInterval(heartbeat);
      this.store.releaseLock(runId, this.ownerId);
    }
  }

  private async process(
    checkpoint: Checkpoint,
    lease: Lease,
    signal?: AbortSignal,
  ): Promise<BatchRunReport> {
    const { run } = checkpoint;
    const log = logger.withContext({ runId: run.runId, operation: run.operation }, this.log);

    const reverted = this.store.revertInFlight(run.runId);
    if (reverted > 0) {
      log.warn("Reverted in-flight items to pending", { count: reverted });
    }

    const remaining = checkpoint.items.filter(
      (item) => item.status === "pending" || item.status === "in_flight",
    );

    if (remaining.length === 0) {
      const status = resolveFinalStatus(this.store.counts(run.runId));
      if (status !== run.status) {
        this.store.setRunStatus(run.runId, status, true);
      }
      log.info("No pending items", { status });
      return this.report(run.runId);
    }

    this.store.setRunStatus(run.runId, "running");
    log.info("Batch run processing", {
      pending: remaining.length,
      chunkSize: run.chunkSize,
      concurrency: run.concurrency,
      dryRun: run.dryRun,
    });

    try {
      const chunks = chunkItems(remaining, run.chunkSize);
      for (const [index, chunk] of chunks.entries()) {
        if (signal?.aborted === true || this.store.isCancelRequested(run.runId)) {
          log.info("Batch run cancelled", { completedChunks: index, totalChunks: chunks.length });
          break;
        }

        await this.processChunk(run, chunk, lease, log);
        this.renewLease(lease);

        const counts = this.store.counts(run.runId);
        log.debug("Chunk persisted", { chunkNumber: index + 1, size: chunk.length, counts });
        this.onChunkPersisted?.({
          runId: run.runId,
          chunkNumber: index + 1,
          chunkSize: chunk.length,
          itemIds: chunk.map((item) => item.itemId),
          counts,
        });
      }
    } catch (err) {
      // The new owner drives the run now; its status is not ours to change
      if (err instanceof ConcurrentRunError) {
        log.warn("Batch run stopped: run lock lost", { error: err.message });
      } else {
        this.markInterrupted(lease, log);
        log.error("Batch run aborted", { error: errorMessage(err) });
      }
      throw err;
    }

    const counts = this.store.counts(run.runId);
    const status = resolveFinalStatus(counts);
    const saved = this.asOwner(lease, () =>
      this.store.setRunStatus(run.runId, status, status !== "interrupted"),
    );
    if (!saved.owned) {
      throw this.lostLeaseError(run.runId);
    }
    log.info("Batch run finished", { status, counts });

    return this.report(run.runId);
  }

  private async processChunk(
    run: BatchRun,
    chunk: readonly BatchItem[],
    lease: Lease,
    log: Logger,
  ): Promise<void> {
    const dispatchable: InFlightItem[] = [];

    const settle = (item: BatchItem, status: "failed" | "skipped", reason: string) =>
      this.persist(lease, { itemId: item.itemId, status, reason, attempts: 0 }, log);

    for (const item of chunk) {
      const plan = this.planItem(item);

      if (plan.action === "reject") {
        settle(item, "failed", `validation: ${plan.reason}`);
      } else if (plan.action === "skip") {
        settle(item, "skipped", plan.reason);
      } else if (plan.requests.length === 0) {
        settle(item, "skipped", EMPTY_PLAN_SKIP_REASON);
      } else if (run.dryRun) {
        settle(item, "skipped", DRY_RUN_SKIP_REASON);
      } else {
        dispatchable.push({
          item,
          requests: plan.requests,
          outcomes: new Array<Outcome | undefined>(plan.requests.length),
          remaining: plan.requests.length,
        });
      }
    }

    if (dispatchable.length === 0) {
      return;
    }

    const marked = this.asOwner(lease, () =>
      this.store.markInFlight(
        run.runId,
        dispatchable.map((entry) => entry.item.itemId),
      ),
    );
    if (!marked.owned) {
      throw this.lostLeaseError(run.runId);
    }

    const flat = dispatchable.flatMap((entry) =>
      entry.requests.map((request, requestIndex) => ({ entry, request, requestIndex })),
    );

    await this.batcher.dispatch(
      flat.map((slot) => slot.request),
      run.concurrency,
      {
        policy: this.policy,
        onResult: (result, index) => {
          const { entry, requestIndex } = flat[index];
          entry.outcomes[requestIndex] = result.outcome;
          entry.remaining -= 1;
          if (entry.remaining === 0) {
            this.persist(lease, summarizeItem(entry), log);
          }
        },
      },
    );
  }

  private planItem(item: BatchItem): ItemPlan {
    try {
      return this.operation.plan(item.input, item.itemId);
    } catch (err) {
      return { action: "reject", reason: errorMessage(err) };
    }
  }

  private persist(lease: Lease, update: TerminalItemUpdate, log: Logger): void {
    const reason = update.reason === null ? null : truncateReason(update.reason);
    const recorded = this.asOwner(lease, () =>
      this.store.recordTerminal(lease.runId, { ...update, reason }),
    );

    if (!recorded.owned) {
      log.warn("Run lock lost, outcome not recorded", { itemId: update.itemId });
      return;
    }
    if (!recorded.value) {
      log.warn("Item already terminal, outcome not recorded", { itemId: update.itemId });
      return;
    }
    if (update.status === "failed") {
      log.debug("Item failed", { itemId: update.itemId, reason });
    }
  }

  /**
   * Write only while this processor still holds the run lock; the first
   * failed check marks the lease lost for good
   */
  private asOwner<T>(lease: Lease, write: () => T): OwnedWrite<T> {
    if (lease.lost) {
      return { owned: false };
    }
    const result = this.store.whileOwner(lease.runId, this.ownerId, this.lockTtlSeconds, write);
    if (!result.owned) {
      lease.lost = true;
    }
    return result;
  }

  /**
   * @throws ConcurrentRunError if another owner has taken the run
   */
  private renewLease(lease: Lease): void {
    if (!this.asOwner(lease, () => undefined).owned) {
      throw this.lostLeaseError(lease.runId);
    }
  }

  private heartbeat(lease: Lease): void {
    if (lease.lost) {
      return;
    }
    try {
      if (!this.store.refreshLock(lease.runId, this.ownerId, this.lockTtlSeconds)) {
        lease.lost = true;
        this.log.warn("Run lock taken by another owner", { runId: lease.runId });
      }
    } catch (err) {
      this.log.error("Run lock heartbeat failed", {
        runId: lease.runId,
        error: errorMessage(err),
      });
    }
  }

  private lostLeaseError(runId: string): ConcurrentRunError {
    const held = this.store.getLock(runId);
    return new ConcurrentRunError(
      runId,
      held?.owner_id ?? "unknown",
      held?.expires_at ?? "unknown",
    );
  }

  private markInterrupted(lease: Lease, log: Logger): void {
    try {
      this.asOwner(lease, () => this.store.setRunStatus(lease.runId, "interrupted"));
    } catch (err) {
      log.error("Could not mark run interrupted", { error: errorMessage(err) });
    }
  }
}
