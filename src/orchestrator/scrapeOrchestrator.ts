import { AppConfig } from "../config";
import { AuthError, describeError, NetworkError, NotFoundError } from "../core/errors";
import { courseListingUrl, crawlCatalogue, CrawlDependencies, extractNextPageUrl, fetchListingPage, parseListing } from "../crawl";
import { fetchDocument, processWithConcurrency } from "../download";
import { Logger, MetricsRegistry } from "../observability";
import { FetchedPage, SessionManager } from "../session";
import {
  Credentials,
  deepFreeze,
  FailedEvent,
  FailureKind,
  ItemOutcome,
  normalizeCourseCode,
  PageFailure,
  PaperRecord,
  paperKey,
  ProgressEvent,
  ScrapeJob,
  ScrapeSummary,
  TerminalEvent,
} from "../types";
import { ScrapeState, ScrapeStateMachine } from "./stateMachine";

export interface OrchestratorDeps {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  session: SessionManager;
  emit: (event: ProgressEvent) => void;
  /** Cancellation requested by the UI. Checked between pages and between downloads. */
  signal?: AbortSignal;
}

interface DiscoveryResult {
  records: PaperRecord[];
  pageFailures: PageFailure[];
  parseWarnings: number;
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}

function failureKind(error: unknown): FailureKind {
  if (error instanceof AuthError) {
    return "auth";
  }
  if (error instanceof NetworkError || error instanceof NotFoundError) {
    return "network";
  }
  return "internal";
}

/**
 * Runs one scrape job: log in, enumerate course pages, parse them, download
 * the selected papers, and report every step through `emit`.
 *
 * Page and item failures are isolated and end up in the summary. An
 * {@link AuthError} anywhere ends the job as `failed`. Every run emits exactly
 * one terminal event.
 */
export class ScrapeOrchestrator {
  private readonly deps: OrchestratorDeps;
  private readonly machine: ScrapeStateMachine;
  private terminal?: TerminalEvent;

  constructor(deps: OrchestratorDeps) {
    this.deps = deps;
    this.machine = new ScrapeStateMachine((from, to) => deps.logger.debug("state_transition", { from, to }));
  }

  get state(): ScrapeState {
    return this.machine.state;
  }

  async run(job: ScrapeJob, credentials: Credentials): Promise<TerminalEvent> {
    if (this.machine.state !== "idle") {
      throw new Error(`orchestrator already used for job ${job.id}`);
    }

    const startedAt = Date.now();
    const { logger, session } = this.deps;

    try {
      this.machine.transition("logging_in");
      this.emit({
        type: "started",
        jobId: job.id,
        courses: job.courses === "all" ? "all" : [...job.courses],
        destinationDir: job.destinationDir,
      });
      logger.info("job_start", { jobId: job.id, destinationDir: job.destinationDir });

      await session.login(credentials);
      this.machine.transition("enumerating");
      const courses = await this.resolveCourses(job);
      const discovery = await this.discover(job, courses);

      const selected = this.select(job, discovery.records);
      this.machine.transition("downloading");
      const outcome = await this.download(job, selected);
      if (outcome.fatal) {
        return this.fail(job.id, outcome.fatal);
      }

      const items = outcome.items;
      const summary: ScrapeSummary = {
        jobId: job.id,
        courses,
        destinationDir: job.destinationDir,
        discovered: discovery.records.length,
        selected: selected.length,
        downloaded: items.filter((item) => item.status === "downloaded").length,
        failed: items.filter((item) => item.status === "failed").length,
        skipped: selected.length - items.length,
        cancelled: this.cancelled(),
        items,
        pageFailures: discovery.pageFailures,
        parseWarnings: discovery.parseWarnings,
        durationMs: Date.now() - startedAt,
      };

      this.machine.transition("completed");
      logger.info("job_complete", {
        jobId: job.id,
        discovered: summary.discovered,
        downloaded: summary.downloaded,
        failed: summary.failed,
        skipped: summary.skipped,
        cancelled: summary.cancelled,
        durationMs: summary.durationMs,
      });
      return this.finish({ type: "completed", jobId: job.id, summary });
    } catch (error) {
      return this.fail(job.id, error);
    }
  }

  private cancelled(): boolean {
    return this.deps.signal?.aborted ?? false;
  }

  private emit(event: ProgressEvent): void {
    this.deps.emit(deepFreeze(event));
  }

  private finish(event: TerminalEvent): TerminalEvent {
    this.terminal = event;
    this.emit(event);
    return event;
  }

  private fail(jobId: string, error: unknown): TerminalEvent {
    if (this.terminal) {
      this.deps.logger.error("job_error_after_terminal", { jobId, error: describeError(error) });
      return this.terminal;
    }

    const kind = failureKind(error);
    const message = describeError(error);
    this.deps.logger.error("job_failed", { jobId, kind, state: this.machine.state, error: message });
    if (this.machine.state !== "failed" && this.machine.state !== "completed") {
      this.machine.transition("failed");
    }

    const event: FailedEvent = { type: "failed", jobId, reason: { kind, message } };
    return this.finish(event);
  }

  private crawlDeps(): CrawlDependencies {
    const { config, logger, metrics, session } = this.deps;
    return { config, logger: logger.child("crawl"), metrics, session };
  }

  private async resolveCourses(job: ScrapeJob): Promise<string[]> {
    if (job.courses === "all") {
      const modules = await crawlCatalogue(this.crawlDeps());
      return unique(modules.map((module) => module.code));
    }
    return unique(job.courses.map(normalizeCourseCode).filter((code) => code.length > 0));
  }

  private async discover(job: ScrapeJob, courses: string[]): Promise<DiscoveryResult> {
    const { config, logger, metrics } = this.deps;
    const crawlDeps = this.crawlDeps();
    const seen = new Map<string, PaperRecord>();
    const pageFailures: PageFailure[] = [];
    let parseWarnings = 0;
    let pageCount = 0;

    for (const courseCode of courses) {
      let pageUrl: string | undefined = courseListingUrl(config, courseCode);
      const visited = new Set<string>();
      let pageIndex = 0;

      while (pageUrl && pageIndex < config.maxPagesPerCourse) {
        if (this.cancelled()) {
          logger.info("job_cancelled_during_enumeration", { jobId: job.id, courseCode });
          return { records: [...seen.values()], pageFailures, parseWarnings };
        }

        this.machine.transition("enumerating");
        visited.add(pageUrl);
        pageIndex += 1;

        let page: FetchedPage;
        try {
          page = await fetchListingPage(crawlDeps, courseCode, pageUrl, pageIndex);
        } catch (error) {
          if (error instanceof AuthError) {
            throw error;
          }
          logger.error("crawl_page_failed", { jobId: job.id, courseCode, pageUrl, error: describeError(error) });
          pageFailures.push({ courseCode, pageUrl, error: describeError(error) });
          break;
        }

        pageCount += 1;
        this.emit({ type: "page_fetched", jobId: job.id, courseCode, pageUrl: page.url, pageCount });

        this.machine.transition("parsing");
        const parsed = parseListing(page.body, courseCode, page.url);
        for (const warning of parsed.warnings) {
          logger.warn("parse_warning", { jobId: job.id, pageUrl: page.url, ...warning });
        }
        parseWarnings += parsed.warnings.length;
        metrics.incrementCounter("parse_warnings", parsed.warnings.length);

        const fresh: PaperRecord[] = [];
        for (const record of parsed.records) {
          const key = paperKey(record);
          const earlier = seen.get(key);
          if (earlier) {
            const fields = { jobId: job.id, key, url: record.downloadUrl, earlierUrl: earlier.downloadUrl };
            if (earlier.downloadUrl === record.downloadUrl) {
              logger.debug("parse_duplicate_record", fields);
            } else {
              logger.warn("parse_duplicate_key", fields);
            }
            continue;
          }
          seen.set(key, record);
          fresh.push({ ...record });
        }
        metrics.incrementCounter("records_found", fresh.length);
        this.emit({ type: "records_found", jobId: job.id, courseCode, pageUrl: page.url, records: fresh });

        const next = extractNextPageUrl(page.body, page.url);
        pageUrl = next && !visited.has(next) ? next : undefined;
      }

      if (pageUrl) {
        logger.warn("crawl_max_pages_reached", { jobId: job.id, courseCode, maxPages: config.maxPagesPerCourse });
      }
    }

    return { records: [...seen.values()], pageFailures, parseWarnings };
  }

  private select(job: ScrapeJob, records: PaperRecord[]): PaperRecord[] {
    let selected = records;
    if (job.selection && job.selection !== "all") {
      const wanted = new Set(
        job.selection.map((key) => paperKey({ ...key, courseCode: normalizeCourseCode(key.courseCode) })),
      );
      selected = selected.filter((record) => wanted.has(paperKey(record)));
    }

    const yearRange = job.yearRange ?? this.deps.config.yearRange;
    if (yearRange) {
      selected = selected.filter((record) => record.year >= yearRange.from && record.year <= yearRange.to);
    }

    this.deps.logger.info("selection_complete", {
      jobId: job.id,
      discovered: records.length,
      selected: selected.length,
      yearRange,
    });
    return selected;
  }

  private async download(
    job: ScrapeJob,
    selected: PaperRecord[],
  ): Promise<{ items: ItemOutcome[]; fatal?: AuthError }> {
    const { config, logger, metrics, session } = this.deps;
    const downloadDeps = { config, logger: logger.child("download"), metrics, session };
    const concurrency = Math.max(1, job.maxConcurrency ?? config.downloadConcurrency);
    const inFlight = new AbortController();
    const outcomes = new Map<string, ItemOutcome>();
    let fatal: AuthError | undefined;

    logger.info("download_start", { jobId: job.id, selected: selected.length, concurrency });
    await processWithConcurrency(selected, concurrency, async (record) => {
      if (fatal || this.cancelled()) {
        return;
      }

      const key = paperKey(record);
      try {
        const downloaded = await fetchDocument(downloadDeps, record, job.destinationDir, {
          signal: inFlight.signal,
          onProgress: (bytes, totalBytes) =>
            this.emit({ type: "download_progress", jobId: job.id, record: { ...record }, bytes, totalBytes }),
        });
        outcomes.set(key, { key, record: downloaded, status: "downloaded" });
      } catch (error) {
        if (error instanceof AuthError && !fatal) {
          fatal = error;
          inFlight.abort();
        }
        logger.error("download_item_failed", { jobId: job.id, key, url: record.downloadUrl, error: describeError(error) });
        outcomes.set(key, { key, record: { ...record }, status: "failed", error: describeError(error) });
      }
    });

    const items = selected
      .map((record) => outcomes.get(paperKey(record)))
      .filter((item): item is ItemOutcome => item !== undefined);
    return { items, fatal };
  }
}
