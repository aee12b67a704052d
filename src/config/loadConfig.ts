import fs from "node:fs";
import path from "node:path";
import { LogThreshold } from "../observability/types";
import { AppConfig, ConfigOverrides, YearRange } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  portal: {
    baseUrl: "https://www.maynoothuniversity.ie",
    loginPath: "/library/exam-papers",
    listingPath: "/library/exam-papers",
    courseQueryParam: "code_value_1",
    catalogueUrl: "https://www.maynoothuniversity.ie/international/study-maynooth/available-courses",
    catalogueDepartmentPattern: "available-courses",
  },
  userAgent:
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36",
  ignoreHttpsErrors: false,
  requestTimeoutMs: 20_000,
  downloadTimeoutMs: 120_000,
  maxRequestAttempts: 3,
  retryBaseDelayMs: 500,
  retryMaxDelayMs: 8_000,
  maxRedirects: 5,
  downloadConcurrency: 3,
  maxPagesPerCourse: 20,
  progressIntervalBytes: 256 * 1024,
  outputDir: "papers",
  yearRange: undefined,
  logLevel: "info",
};

const LOG_THRESHOLDS: readonly LogThreshold[] = ["debug", "info", "warn", "error", "silent"];

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  const parsed: unknown = JSON.parse(raw);
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new Error(`Config file must contain a JSON object: ${absolutePath}`);
  }
  return parsed;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toLogThreshold(value: string | undefined, fallback: LogThreshold): LogThreshold {
  const normalized = value?.trim().toLowerCase();
  return LOG_THRESHOLDS.find((level) => level === normalized) ?? fallback;
}

/**
 * Parses `2020-2025` or a single `2024` into an inclusive range.
 */
export function parseYearRange(value: string | undefined): YearRange | undefined {
  if (!value) {
    return undefined;
  }

  const match = value.trim().match(/^(\d{4})(?:\s*-\s*(\d{4}))?$/);
  if (!match) {
    return undefined;
  }

  const from = Number.parseInt(match[1], 10);
  const to = match[2] ? Number.parseInt(match[2], 10) : from;
  return from <= to ? { from, to } : { from: to, to: from };
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    portal: {
      ...DEFAULT_CONFIG.portal,
      ...(fileConfig.portal ?? {}),
    },
  };

  return {
    ...merged,
    portal: {
      baseUrl: env.PORTAL_BASE_URL ?? merged.portal.baseUrl,
      loginPath: env.PORTAL_LOGIN_PATH ?? merged.portal.loginPath,
      listingPath: env.PORTAL_LISTING_PATH ?? merged.portal.listingPath,
      courseQueryParam: env.PORTAL_COURSE_PARAM ?? merged.portal.courseQueryParam,
      catalogueUrl: env.CATALOGUE_URL ?? merged.portal.catalogueUrl,
      catalogueDepartmentPattern: merged.portal.catalogueDepartmentPattern,
    },
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    downloadTimeoutMs: toInt(env.DOWNLOAD_TIMEOUT_MS, merged.downloadTimeoutMs),
    maxRequestAttempts: Math.max(1, toInt(env.MAX_REQUEST_ATTEMPTS, merged.maxRequestAttempts)),
    retryBaseDelayMs: toInt(env.RETRY_BASE_DELAY_MS, merged.retryBaseDelayMs),
    retryMaxDelayMs: toInt(env.RETRY_MAX_DELAY_MS, merged.retryMaxDelayMs),
    maxRedirects: toInt(env.MAX_REDIRECTS, merged.maxRedirects),
    downloadConcurrency: Math.max(1, toInt(env.DOWNLOAD_CONCURRENCY, merged.downloadConcurrency)),
    maxPagesPerCourse: Math.max(1, toInt(env.MAX_PAGES_PER_COURSE, merged.maxPagesPerCourse)),
    progressIntervalBytes: toInt(env.PROGRESS_INTERVAL_BYTES, merged.progressIntervalBytes),
    outputDir: env.OUTPUT_DIR ?? merged.outputDir,
    yearRange: parseYearRange(env.YEAR_RANGE) ?? merged.yearRange,
    logLevel: toLogThreshold(env.LOG_LEVEL, merged.logLevel),
  };
}

export { DEFAULT_CONFIG };
