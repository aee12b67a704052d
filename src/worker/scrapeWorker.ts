import { Dispatcher } from "undici";
import { describeError } from "../core/errors";
import { Logger, MetricsRegistry } from "../observability";
import { ScrapeOrchestrator } from "../orchestrator";
import { SessionManager } from "../session";
import { TerminalEvent } from "../types";
import { isScrapeCancelMessageV1, isScrapeStartMessageV1, ScrapeEventMessageV1, ScrapeStartMessageV1 } from "./messages";

/** The worker's end of the channel: `parentPort` in a worker thread. */
export interface WorkerPortLike {
  postMessage(message: ScrapeEventMessageV1): void;
  on(event: "message", listener: (message: unknown) => void): unknown;
  close(): void;
}

export interface ScrapeWorkerOptions {
  dispatcher?: Dispatcher;
}

/**
 * Worker-side body. Waits for one `scrape.start`, runs the orchestrator, posts
 * every event back in production order and closes the port after the
 * terminal event.
 */
export function runScrapeWorker(port: WorkerPortLike, options: ScrapeWorkerOptions = {}): Promise<TerminalEvent> {
  const cancellation = new AbortController();
  let bootLogger = new Logger({ component: "worker", runId: "worker_boot" });
  let activeJobId: string | undefined;
  const cancelledBeforeStart = new Set<string>();

  return new Promise<TerminalEvent>((resolve, reject) => {
    const start = (message: ScrapeStartMessageV1): void => {
      const { job, credentials, config, runId } = message;
      const logger = new Logger({ component: "worker", runId, level: config.logLevel });
      bootLogger = logger;
      activeJobId = job.id;
      if (cancelledBeforeStart.has(job.id)) {
        cancellation.abort();
      }

      const metrics = new MetricsRegistry();
      const session = new SessionManager({
        config,
        logger: logger.child("session"),
        metrics,
        dispatcher: options.dispatcher,
      });
      const orchestrator = new ScrapeOrchestrator({
        config,
        logger: logger.child("orchestrator"),
        metrics,
        session,
        signal: cancellation.signal,
        emit: (event) => port.postMessage({ version: "v1", type: "scrape.event", jobId: job.id, event }),
      });

      orchestrator
        .run(job, credentials)
        .then((terminal) => {
          metrics.logSummary(logger);
          port.close();
          resolve(terminal);
        })
        .catch((error: unknown) => {
          logger.error("worker_job_crashed", { jobId: job.id, error: describeError(error) });
          port.close();
          reject(error);
        });
    };

    port.on("message", (message: unknown) => {
      if (isScrapeStartMessageV1(message)) {
        if (activeJobId) {
          bootLogger.warn("worker_start_ignored", { jobId: message.job.id, activeJobId });
          return;
        }
        start(message);
        return;
      }

      if (isScrapeCancelMessageV1(message)) {
        if (!activeJobId) {
          cancelledBeforeStart.add(message.jobId);
          return;
        }
        if (message.jobId === activeJobId) {
          bootLogger.info("worker_cancel_requested", { jobId: message.jobId });
          cancellation.abort();
        }
        return;
      }

      bootLogger.warn("worker_message_invalid", { messageType: typeof message });
    });
  });
}
