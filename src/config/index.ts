export { DEFAULT_CONFIG, loadConfig, validateConfig } from "./loadConfig";
export * from "./types";
