import { Response } from "undici";

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

/** Read-only view of the authenticated context. Cookies stay inside the manager. */
export interface Session {
  readonly id: string;
  readonly baseUrl: string;
  readonly establishedAt: string;
  readonly authenticated: boolean;
  readonly headers: Readonly<Record<string, string>>;
  readonly retry: Readonly<RetryPolicy>;
}

export type QueryParams = Record<string, string | number | undefined>;

export interface FetchedPage {
  url: string;
  status: number;
  contentType?: string;
  body: string;
}

export interface StreamedResponse {
  url: string;
  response: Response;
}
