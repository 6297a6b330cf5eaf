export * from "./json";
export * from "./logger";
export * from "./config";
export * from "./clients/http";
export * from "./outcome";
export * from "./cache";
export * from "./runLock";
export * from "./batch";
