export * from "./config";
export * from "./core/errors";
export * from "./crawl";
export * from "./download";
export * from "./observability";
export * from "./orchestrator";
export * from "./session";
export * from "./types";
export * from "./worker";
