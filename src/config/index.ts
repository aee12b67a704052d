export { DEFAULT_CONFIG, loadConfig, parseYearRange } from "./loadConfig";
export * from "./types";
