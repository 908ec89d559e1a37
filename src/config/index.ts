export * from "./types";
export { DEFAULT_CONFIG, loadConfig } from "./loadConfig";
