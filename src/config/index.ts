export { loadConfig } from "./engineConfig";
export type { LoadConfigOptions } from "./engineConfig";
