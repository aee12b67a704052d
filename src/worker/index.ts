export { AsyncEventQueue } from "./eventQueue";
export * from "./messages";
export { runScrapeWorker } from "./scrapeWorker";
export type { ScrapeWorkerOptions, WorkerPortLike } from "./scrapeWorker";
export { ScrapeWorkerHost, spawnWorkerThread } from "./workerHost";
export type { ScrapeHandle, ScrapeWorkerChannel, WorkerHostDeps } from "./workerHost";
