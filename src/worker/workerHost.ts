import path from "node:path";
import { Worker } from "node:worker_threads";
import { AppConfig } from "../config";
import { Logger } from "../observability";
import { Credentials, deepFreeze, FailedEvent, isTerminalEvent, ProgressEvent, ScrapeJob, TerminalEvent } from "../types";
import { AsyncEventQueue } from "./eventQueue";
import { HostToWorkerMessage, isScrapeEventMessageV1 } from "./messages";

/** The host's end of the channel. `node:worker_threads` `Worker` satisfies it. */
export interface ScrapeWorkerChannel {
  postMessage(message: HostToWorkerMessage): void;
  on(event: "message", listener: (message: unknown) => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
  on(event: "exit", listener: (exitCode: number) => void): unknown;
  terminate(): Promise<number>;
}

export interface ScrapeHandle {
  readonly jobId: string;
  /** Ordered progress events, ending with exactly one `completed` or `failed`. */
  readonly events: AsyncIterable<ProgressEvent>;
  readonly outcome: Promise<TerminalEvent>;
  cancel(): void;
}

export interface WorkerHostDeps {
  config: AppConfig;
  logger: Logger;
  runId: string;
  spawn?: () => ScrapeWorkerChannel;
}

export function spawnWorkerThread(): ScrapeWorkerChannel {
  const entry = path.join(__dirname, `workerEntry${path.extname(__filename)}`);
  return new Worker(entry);
}

/**
 * UI-side boundary. Each job runs on its own worker thread with its own
 * session; the caller only enqueues the job and drains the event stream.
 */
export class ScrapeWorkerHost {
  private readonly config: AppConfig;
  private readonly logger: Logger;
  private readonly runId: string;
  private readonly spawn: () => ScrapeWorkerChannel;

  constructor(deps: WorkerHostDeps) {
    this.config = deps.config;
    this.logger = deps.logger;
    this.runId = deps.runId;
    this.spawn = deps.spawn ?? spawnWorkerThread;
  }

  start(job: ScrapeJob, credentials: Credentials): ScrapeHandle {
    const { logger } = this;
    const queue = new AsyncEventQueue<ProgressEvent>();
    const channel = this.spawn();
    let terminal: TerminalEvent | undefined;
    let resolveOutcome: (event: TerminalEvent) => void = () => undefined;
    const outcome = new Promise<TerminalEvent>((resolve) => {
      resolveOutcome = resolve;
    });

    const settle = (event: TerminalEvent): void => {
      if (terminal) {
        return;
      }
      terminal = event;
      queue.push(event);
      queue.close();
      resolveOutcome(event);
      logger.info("job_terminal_received", { jobId: job.id, type: event.type });
    };

    const failInternally = (message: string): void => {
      const event: FailedEvent = { type: "failed", jobId: job.id, reason: { kind: "internal", message } };
      settle(deepFreeze(event));
    };

    channel.on("message", (message: unknown) => {
      if (!isScrapeEventMessageV1(message) || message.jobId !== job.id) {
        logger.warn("worker_message_invalid", { jobId: job.id });
        return;
      }
      if (terminal) {
        logger.warn("worker_event_after_terminal", { jobId: job.id, type: message.event.type });
        return;
      }

      const event = deepFreeze(message.event);
      if (isTerminalEvent(event)) {
        settle(event);
        return;
      }
      if (!queue.push(event)) {
        logger.debug("job_event_dropped_consumer_gone", { jobId: job.id, type: event.type });
      }
    });

    channel.on("error", (error: Error) => {
      logger.error("worker_error", { jobId: job.id, error: error.message });
      failInternally(`scrape worker crashed: ${error.message}`);
      channel.terminate().catch((terminateError: unknown) => {
        logger.warn("worker_terminate_failed", { jobId: job.id, error: String(terminateError) });
      });
    });

    channel.on("exit", (exitCode: number) => {
      if (terminal) {
        logger.debug("worker_exit", { jobId: job.id, exitCode });
        return;
      }
      logger.error("worker_exit_without_terminal", { jobId: job.id, exitCode });
      failInternally(`scrape worker exited with code ${exitCode} before finishing`);
    });

    channel.postMessage({
      version: "v1",
      type: "scrape.start",
      runId: this.runId,
      job,
      credentials,
      config: this.config,
    });
    logger.info("job_enqueued", { jobId: job.id, courses: job.courses, destinationDir: job.destinationDir });

    return {
      jobId: job.id,
      events: queue,
      outcome,
      cancel: () => {
        if (terminal) {
          return;
        }
        logger.info("job_cancel_requested", { jobId: job.id });
        channel.postMessage({ version: "v1", type: "scrape.cancel", jobId: job.id });
      },
    };
  }
}
