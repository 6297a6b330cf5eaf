/**
 * Batch processing constants
 */

import type { BatchItemStatus, BatchRunStatus } from "@/types";

export const DEFAULT_CHUNK_SIZE = 50;

/**
 * Small default to respect remote rate limits
 */
export const DEFAULT_BATCH_CONCURRENCY = 5;

export const batchCaps = {
  chunkSize: { min: 1, max: 1000 },
  concurrency: { min: 1, max: 50 },
} as const;

export const BATCH_RUN_STATUSES: readonly BatchRunStatus[] = [
  "created",
  "running",
  "completed",
  "partially_failed",
  "interrupted",
];

export const BATCH_ITEM_STATUSES: readonly BatchItemStatus[] = [
  "pending",
  "in_flight",
  "succeeded",
  "failed",
  "skipped",
];

export const DRY_RUN_SKIP_REASON = "dry-run";

export const EMPTY_PLAN_SKIP_REASON = "no requests to dispatch";

/**
 * Maximum stored length of an item failure reason
 */
export const ITEM_REASON_MAX_LENGTH = 500;

/**
 * Default number of runs returned by listRuns()
 */
export const DEFAULT_RUN_LIST_LIMIT = 20;
