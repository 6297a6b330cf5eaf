/**
 * Batch module public API
 */

export { RequestBatcher } from "./requestBatcher";
export type { DispatchOptions, RequestBatcherDeps } from "./requestBatcher";
export { CheckpointStore, emptyStatusCounts } from "./checkpointStore";
export type { CheckpointStoreOptions } from "./checkpointStore";
export { BatchProcessor, resolveFinalStatus } from "./batchProcessor";
export type { BatchProcessorDeps } from "./batchProcessor";
