/**
 * Database module barrel exports
 */

export * from "./connection";
export * from "./migrate";
export * from "./repos/batchRunsRepo";
export * from "./repos/batchItemsRepo";
export * from "./repos/runLockRepo";
export * from "./repos/cacheRepo";
