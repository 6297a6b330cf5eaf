/**
 * Batch run type definitions
 *
 * Types for checkpointed bulk operations: run and item rows as stored in
 * SQLite, the operation contract supplied by callers, and the progress views
 * handed back to them.
 */

import type { ApiRequest } from "@/types/clients/http";
import type { JsonValue } from "@/types/json";

/**
 * Run lifecycle
 *
 * created -> running -> completed | partially_failed | interrupted
 * An interrupted run can be resumed (back to running).
 */
export type BatchRunStatus =
  | "created"
  | "running"
  | "completed"
  | "partially_failed"
  | "interrupted";

/**
 * Item lifecycle
 *
 * pending -> in_flight -> succeeded | failed | skipped
 * Terminal states are never revisited.
 */
export type BatchItemStatus =
  | "pending"
  | "in_flight"
  | "succeeded"
  | "failed"
  | "skipped";

export type TerminalItemStatus = Extract<
  BatchItemStatus,
  "succeeded" | "failed" | "skipped"
>;

/**
 * Batch run row (database entity)
 */
export type BatchRunRow = {
  run_id: string;
  operation: string;
  status: string;
  chunk_size: number;
  concurrency: number;
  /** 0 | 1 */
  dry_run: number;
  item_count: number;
  /** 0 | 1, set by cancel() from any process */
  cancel_requested: number;
  created_at: string;
  updated_at: string;
  finished_at: string | null;
};

/**
 * Batch item row (database entity)
 */
export type BatchItemRow = {
  run_id: string;
  position: number;
  item_id: string;
  input_json: string;
  status: string;
  reason: string | null;
  attempts: number;
  updated_at: string;
};

/**
 * Validated view of a run row
 */
export type BatchRun = {
  runId: string;
  operation: string;
  status: BatchRunStatus;
  chunkSize: number;
  concurrency: number;
  dryRun: boolean;
  itemCount: number;
  cancelRequested: boolean;
  createdAt: string;
  updatedAt: string;
  finishedAt: string | null;
};

/**
 * Validated view of an item row
 */
export type BatchItem = {
  itemId: string;
  position: number;
  input: JsonValue;
  status: BatchItemStatus;
  reason: string | null;
  attempts: number;
};

/**
 * A run together with its ordered items, as loaded for resume
 */
export type Checkpoint = {
  run: BatchRun;
  items: BatchItem[];
};

/**
 * Item submitted by a caller when starting a run
 */
export type BatchItemInput<TInput extends JsonValue = JsonValue> = {
  /** Caller-defined identifier, unique within the run */
  id: string;
  input: TInput;
};

export type BatchStartOptions = {
  chunkSize?: number;
  concurrency?: number;
  dryRun?: boolean;
};

export type NewBatchRun = {
  runId: string;
  operation: string;
  chunkSize: number;
  concurrency: number;
  dryRun: boolean;
  items: BatchItemInput[];
};

/**
 * What to do with one item, decided by the operation
 */
export type ItemPlan =
  | { action: "dispatch"; requests: ApiRequest[] }
  | { action: "skip"; reason: string }
  | { action: "reject"; reason: string };

/**
 * Caller-supplied bulk operation (e.g. "transition issues to Done").
 *
 * `plan` turns an item's input into the requests to issue. It is called
 * again on resume, so it must be a pure function of the input.
 */
export interface BatchOperation<TInput extends JsonValue = JsonValue> {
  name: string;
  plan(input: TInput, itemId: string): ItemPlan;
}

export type TerminalItemUpdate = {
  itemId: string;
  status: TerminalItemStatus;
  reason: string | null;
  attempts: number;
};

export type StatusCounts = Record<BatchItemStatus, number>;

export type ProgressSnapshot = {
  runId: string;
  operation: string;
  status: BatchRunStatus;
  dryRun: boolean;
  total: number;
  counts: StatusCounts;
  createdAt: string;
  updatedAt: string;
  finishedAt: string | null;
};

export type BatchItemReport = {
  itemId: string;
  status: BatchItemStatus;
  reason: string | null;
  attempts: number;
};

/**
 * Final view of a run: every item with its status and failure reason
 */
export type BatchRunReport = ProgressSnapshot & {
  items: BatchItemReport[];
};

/**
 * Passed to onChunkPersisted after a chunk's outcomes are durable
 */
export type ChunkProgress = {
  runId: string;
  /** 1-based index within this run/resume call */
  chunkNumber: number;
  chunkSize: number;
  itemIds: string[];
  counts: StatusCounts;
};

export type BatchExecuteOptions = {
  /** Cooperative cancellation, checked before each chunk */
  signal?: AbortSignal;
};
