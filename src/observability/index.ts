export { Logger, maskUsername } from "./logger";
export type { LoggerContext } from "./logger";
export { MetricsRegistry } from "./metrics";
export { createJobId, createRunId } from "./runId";
export * from "./types";
