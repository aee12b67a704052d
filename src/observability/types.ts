export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogThreshold = LogLevel | "silent";

export interface LogFields {
  jobId?: string;
  courseCode?: string;
  url?: string;
  pageUrl?: string;
  attempt?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "pages_fetched"
  | "records_found"
  | "parse_warnings"
  | "requests_retried"
  | "downloads_ok"
  | "downloads_failed"
  | "auth_failures";

export type MetricTimerName = "login_ms" | "page_fetch_ms" | "download_ms";
