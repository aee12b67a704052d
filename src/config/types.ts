import { LogThreshold } from "../observability/types";

export interface YearRange {
  from: number;
  to: number;
}

export interface PortalConfig {
  baseUrl: string;
  loginPath: string;
  listingPath: string;
  courseQueryParam: string;
  catalogueUrl: string;
  catalogueDepartmentPattern: string;
}

export interface AppConfig {
  portal: PortalConfig;
  userAgent: string;
  ignoreHttpsErrors: boolean;
  requestTimeoutMs: number;
  downloadTimeoutMs: number;
  maxRequestAttempts: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  maxRedirects: number;
  downloadConcurrency: number;
  maxPagesPerCourse: number;
  progressIntervalBytes: number;
  outputDir: string;
  yearRange?: YearRange;
  logLevel: LogThreshold;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "portal">> & {
  portal?: Partial<PortalConfig>;
};
