import { AppConfig } from "../config";
import { Credentials, ProgressEvent, ScrapeJob } from "../types";

export type ScrapeStartMessageV1 = {
  version: "v1";
  type: "scrape.start";
  runId: string;
  job: ScrapeJob;
  credentials: Credentials;
  config: AppConfig;
};

export type ScrapeCancelMessageV1 = {
  version: "v1";
  type: "scrape.cancel";
  jobId: string;
};

export type ScrapeEventMessageV1 = {
  version: "v1";
  type: "scrape.event";
  jobId: string;
  event: ProgressEvent;
};

export type HostToWorkerMessage = ScrapeStartMessageV1 | ScrapeCancelMessageV1;

const EVENT_TYPES: ReadonlySet<string> = new Set([
  "started",
  "page_fetched",
  "records_found",
  "download_progress",
  "completed",
  "failed",
]);

function isString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function isScrapeJob(value: unknown): value is ScrapeJob {
  if (!isObject(value)) {
    return false;
  }
  const courses = value.courses;
  return (
    isString(value.id) &&
    isString(value.destinationDir) &&
    (courses === "all" || (Array.isArray(courses) && courses.every((course) => typeof course === "string")))
  );
}

export function isScrapeStartMessageV1(value: unknown): value is ScrapeStartMessageV1 {
  if (!isObject(value)) {
    return false;
  }
  const credentials = value.credentials;
  return (
    value.version === "v1" &&
    value.type === "scrape.start" &&
    isString(value.runId) &&
    isScrapeJob(value.job) &&
    isObject(credentials) &&
    typeof credentials.username === "string" &&
    typeof credentials.password === "string" &&
    isObject(value.config)
  );
}

export function isScrapeCancelMessageV1(value: unknown): value is ScrapeCancelMessageV1 {
  return isObject(value) && value.version === "v1" && value.type === "scrape.cancel" && isString(value.jobId);
}

export function isScrapeEventMessageV1(value: unknown): value is ScrapeEventMessageV1 {
  if (!isObject(value)) {
    return false;
  }
  const event = value.event;
  return (
    value.version === "v1" &&
    value.type === "scrape.event" &&
    isString(value.jobId) &&
    isObject(event) &&
    typeof event.type === "string" &&
    EVENT_TYPES.has(event.type) &&
    event.jobId === value.jobId
  );
}
