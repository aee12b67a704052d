import { isMainThread, parentPort } from "node:worker_threads";
import { describeError } from "../core/errors";
import { Logger } from "../observability";
import { runScrapeWorker } from "./scrapeWorker";

if (!isMainThread && parentPort) {
  runScrapeWorker(parentPort).catch((error: unknown) => {
    new Logger({ component: "worker", runId: "worker_entry" }).error("worker_fatal", { error: describeError(error) });
    process.exitCode = 1;
  });
}
