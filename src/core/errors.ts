export type ScrapeErrorCode = "auth" | "network" | "not_found" | "download";

export abstract class ScrapeError extends Error {
  abstract readonly code: ScrapeErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad credentials, an expired session, or a 401/403 on any request. Job-fatal. */
export class AuthError extends ScrapeError {
  readonly code = "auth";
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.status = status;
  }
}

export class NetworkError extends ScrapeError {
  readonly code = "network";
  readonly status?: number;
  readonly retriable: boolean;

  constructor(message: string, options: { status?: number; retriable: boolean; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.status = options.status;
    this.retriable = options.retriable;
  }
}

export class NotFoundError extends ScrapeError {
  readonly code = "not_found";
  readonly status: number;

  constructor(message: string, status = 404) {
    super(message);
    this.status = status;
  }
}

/** Empty body, length mismatch or a failed write. Item-fatal. */
export class DownloadError extends ScrapeError {
  readonly code = "download";
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}
