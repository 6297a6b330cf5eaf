/**
 * Utils barrel exports
 */

export * from "./concurrency/limiter";
