export * from "./logger";
export * from "./clients/http";
export * from "./cache";
export * from "./batch";
export * from "./runLock";
export * from "./config";
