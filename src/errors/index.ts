/**
 * Error classes public API
 */

export * from "./remoteErrors";
export * from "./batchErrors";
export * from "./configError";
