export { createEngine, createSender, withEngine } from "./createEngine";
export type { Engine, EngineDeps, ProcessorOptions } from "./createEngine";
