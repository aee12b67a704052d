import { YearRange } from "../config/types";

export interface Credentials {
  username: string;
  password: string;
}

export interface PaperKey {
  courseCode: string;
  year: number;
  title: string;
}

export interface PaperRecord extends PaperKey {
  downloadUrl: string;
  localPath?: string;
  bytes?: number;
  sha256?: string;
}

export type CourseSelector = "all" | string[];

export interface ScrapeJob {
  id: string;
  courses: CourseSelector;
  destinationDir: string;
  maxConcurrency?: number;
  selection?: "all" | PaperKey[];
  yearRange?: YearRange;
}

export type ParseWarningReason = "missing_link" | "invalid_year" | "no_entries";

export interface ParseWarning {
  courseCode: string;
  reason: ParseWarningReason;
  detail: string;
  entryIndex?: number;
}

export type FailureKind = "auth" | "network" | "internal";

export interface FailureReason {
  kind: FailureKind;
  message: string;
}

export interface ItemOutcome {
  key: string;
  record: PaperRecord;
  status: "downloaded" | "failed";
  error?: string;
}

export interface PageFailure {
  courseCode: string;
  pageUrl: string;
  error: string;
}

export interface ScrapeSummary {
  jobId: string;
  courses: string[];
  destinationDir: string;
  discovered: number;
  selected: number;
  downloaded: number;
  failed: number;
  skipped: number;
  cancelled: boolean;
  items: ItemOutcome[];
  pageFailures: PageFailure[];
  parseWarnings: number;
  durationMs: number;
}

export interface StartedEvent {
  type: "started";
  jobId: string;
  courses: CourseSelector;
  destinationDir: string;
}

export interface PageFetchedEvent {
  type: "page_fetched";
  jobId: string;
  courseCode: string;
  pageUrl: string;
  pageCount: number;
}

export interface RecordsFoundEvent {
  type: "records_found";
  jobId: string;
  courseCode: string;
  pageUrl: string;
  records: PaperRecord[];
}

export interface DownloadProgressEvent {
  type: "download_progress";
  jobId: string;
  record: PaperRecord;
  bytes: number;
  totalBytes?: number;
}

export interface CompletedEvent {
  type: "completed";
  jobId: string;
  summary: ScrapeSummary;
}

export interface FailedEvent {
  type: "failed";
  jobId: string;
  reason: FailureReason;
}

export type ProgressEvent =
  | StartedEvent
  | PageFetchedEvent
  | RecordsFoundEvent
  | DownloadProgressEvent
  | CompletedEvent
  | FailedEvent;

export type TerminalEvent = CompletedEvent | FailedEvent;

export interface CatalogueModule {
  code: string;
  name: string;
  semester: string;
  department: string;
}

/**
 * What a later text-processing step gets for each downloaded paper.
 * `text` stays empty until something extracts it.
 */
export interface DownloadedDocument {
  key: string;
  courseCode: string;
  year: number;
  title: string;
  localPath: string;
  text?: string;
}
