import crypto from "node:crypto";
import { CookieJar } from "tough-cookie";
import { Dispatcher, fetch, Response } from "undici";
import { AppConfig } from "../config";
import { AuthError, describeError, NetworkError, NotFoundError } from "../core/errors";
import { backoffDelay, getFetchDispatcher, sleep } from "../core/fetch";
import { Logger, maskUsername, MetricsRegistry } from "../observability";
import { Credentials } from "../types";
import { findLoginForm } from "./loginForm";
import { FetchedPage, QueryParams, RetryPolicy, Session, StreamedResponse } from "./types";

export interface SessionManagerDeps {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  dispatcher?: Dispatcher;
}

interface DispatchOptions {
  method: "GET" | "POST";
  accept: string;
  body?: string;
  contentType?: string;
  signal?: AbortSignal;
}

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);
const HTML_ACCEPT = "text/html,application/xhtml+xml";

/**
 * Owns the one authenticated session shared by every request of a job.
 *
 * Cookies live in a single jar that only this class writes to. GETs are
 * retried on timeouts, connection failures and 5xx responses; 4xx responses
 * are never retried.
 */
export class SessionManager {
  private readonly config: AppConfig;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly dispatcher?: Dispatcher;
  private readonly retry: RetryPolicy;
  private readonly defaultHeaders: Readonly<Record<string, string>>;
  private jar = new CookieJar();
  private current?: Session;

  constructor(deps: SessionManagerDeps) {
    this.config = deps.config;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.dispatcher = getFetchDispatcher(deps.config.ignoreHttpsErrors, deps.dispatcher);
    this.retry = Object.freeze({
      maxAttempts: Math.max(1, deps.config.maxRequestAttempts),
      baseDelayMs: deps.config.retryBaseDelayMs,
      maxDelayMs: deps.config.retryMaxDelayMs,
    });
    this.defaultHeaders = Object.freeze({
      "user-agent": deps.config.userAgent,
      "accept-language": "en-IE,en;q=0.9",
    });
  }

  get session(): Session | undefined {
    return this.current;
  }

  resolveUrl(pathOrUrl: string, params?: QueryParams): string {
    const url = new URL(pathOrUrl, this.config.portal.baseUrl);
    for (const [name, value] of Object.entries(params ?? {})) {
      if (value !== undefined) {
        url.searchParams.set(name, String(value));
      }
    }
    return url.toString();
  }

  async login(credentials: Credentials): Promise<Session> {
    this.reset();
    const loginUrl = this.resolveUrl(this.config.portal.loginPath);
    const stopTimer = this.metrics.startTimer("login_ms");
    this.logger.info("session_login_start", { url: loginUrl, username: maskUsername(credentials.username) });

    const loginPage = await this.get(loginUrl);
    const form = findLoginForm(loginPage.body, loginPage.url);
    if (!form) {
      this.logger.info("session_login_form_absent", { url: loginPage.url, durationMs: stopTimer() });
      return this.establish();
    }

    const body = new URLSearchParams({
      name: credentials.username,
      pass: credentials.password,
      form_id: form.formId,
      form_build_id: form.formBuildId,
    }).toString();

    let result: { status: number; url: string; html: string };
    try {
      result = await this.dispatch(
        form.actionUrl,
        {
          method: "POST",
          accept: HTML_ACCEPT,
          body,
          contentType: "application/x-www-form-urlencoded",
        },
        async ({ response, url }) => ({ status: response.status, url, html: await response.text() }),
      );
    } catch (error) {
      throw this.toNetworkError(error, form.actionUrl);
    }

    const { status, url, html } = result;
    if (status >= 500) {
      throw new NetworkError(`HTTP ${status} while submitting login form`, { status, retriable: false });
    }
    if (status >= 400) {
      this.rejectSession(`login rejected with HTTP ${status}`, url, status);
    }
    if (findLoginForm(html, url)) {
      this.rejectSession("login rejected: credentials were not accepted", url, status);
    }

    this.logger.info("session_login_ok", { url, durationMs: stopTimer() });
    return this.establish();
  }

  /** Fetches a page as text. Retried on transient failures; the timeout covers the body too. */
  async get(pathOrUrl: string, params?: QueryParams): Promise<FetchedPage> {
    const url = this.resolveUrl(pathOrUrl, params);
    return this.withRetry(url, undefined, () =>
      this.dispatch(url, { method: "GET", accept: HTML_ACCEPT }, async ({ response, url: finalUrl }) => {
        await this.assertOk(response, finalUrl);
        return {
          url: finalUrl,
          status: response.status,
          contentType: response.headers.get("content-type") ?? undefined,
          body: await response.text(),
        };
      }),
    );
  }

  /**
   * Opens a GET whose body the caller streams. Retries happen only before the
   * body is handed over.
   */
  async stream(url: string, options: { signal?: AbortSignal; accept?: string } = {}): Promise<StreamedResponse> {
    return this.withRetry(url, options.signal, () =>
      this.dispatch(
        url,
        {
          method: "GET",
          accept: options.accept ?? "application/pdf,*/*",
          signal: options.signal,
        },
        async (result) => {
          await this.assertOk(result.response, result.url);
          return result;
        },
      ),
    );
  }

  invalidate(reason: string): void {
    if (this.current) {
      this.logger.warn("session_invalidated", { sessionId: this.current.id, reason });
    }
    this.reset();
  }

  private reset(): void {
    this.current = undefined;
    this.jar = new CookieJar();
  }

  private establish(): Session {
    const session: Session = Object.freeze({
      id: crypto.randomUUID(),
      baseUrl: this.config.portal.baseUrl,
      establishedAt: new Date().toISOString(),
      authenticated: true,
      headers: this.defaultHeaders,
      retry: this.retry,
    });
    this.current = session;
    return session;
  }

  private rejectSession(message: string, url: string, status?: number): never {
    this.metrics.incrementCounter("auth_failures", 1);
    this.invalidate(message);
    this.logger.error("session_auth_failed", { url, status, error: message });
    throw new AuthError(message, status);
  }

  private async withRetry<T>(url: string, signal: AbortSignal | undefined, attemptFn: () => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt += 1) {
      try {
        return await attemptFn();
      } catch (error) {
        if (error instanceof AuthError || error instanceof NotFoundError || signal?.aborted) {
          throw error;
        }

        const networkError = this.toNetworkError(error, url);
        if (!networkError.retriable || attempt >= this.retry.maxAttempts) {
          throw networkError;
        }

        const delayMs = backoffDelay(attempt, this.retry.baseDelayMs, this.retry.maxDelayMs);
        this.metrics.incrementCounter("requests_retried", 1);
        this.logger.warn("session_request_retry", {
          url,
          attempt,
          delayMs,
          status: networkError.status,
          error: networkError.message,
        });
        await sleep(delayMs);
      }
    }
  }

  private async assertOk(response: Response, url: string): Promise<void> {
    if (response.ok) {
      return;
    }

    await discardBody(response);
    const status = response.status;
    if (status === 401 || status === 403 || status === 407) {
      this.rejectSession(`HTTP ${status} while fetching ${url}`, url, status);
    }
    if (status === 404 || status === 410) {
      throw new NotFoundError(`HTTP ${status} while fetching ${url}`, status);
    }
    throw new NetworkError(`HTTP ${status} while fetching ${url}`, { status, retriable: status >= 500 });
  }

  private toNetworkError(error: unknown, url: string): NetworkError {
    if (error instanceof NetworkError) {
      return error;
    }
    return new NetworkError(`request to ${url} failed: ${describeError(error)}`, { retriable: true, cause: error });
  }

  /**
   * One logical request: follows redirects by hand so the cookies set on
   * every hop reach the jar, then hands the final response to `consume`.
   * The request timeout runs until `consume` settles. The caller's signal
   * stays linked after return so it can still abort a body being streamed.
   */
  private async dispatch<T>(
    url: string,
    options: DispatchOptions,
    consume: (result: StreamedResponse) => Promise<T>,
  ): Promise<T> {
    const controller = new AbortController();
    const onAbort = (): void => controller.abort(options.signal?.reason);
    if (options.signal?.aborted) {
      controller.abort(options.signal.reason);
    } else {
      options.signal?.addEventListener("abort", onAbort, { once: true });
    }

    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.config.requestTimeoutMs);

    let currentUrl = url;
    let method = options.method;
    let body = options.body;

    try {
      for (let hop = 0; hop <= this.config.maxRedirects; hop += 1) {
        const headers: Record<string, string> = { ...this.defaultHeaders, accept: options.accept };
        const cookie = await this.jar.getCookieString(currentUrl);
        if (cookie) {
          headers.cookie = cookie;
        }
        if (body !== undefined && options.contentType) {
          headers["content-type"] = options.contentType;
        }

        const response = await fetch(currentUrl, {
          method,
          headers,
          body,
          redirect: "manual",
          signal: controller.signal,
          dispatcher: this.dispatcher,
        });
        await this.storeCookies(response, currentUrl);

        const location = response.headers.get("location");
        if (!REDIRECT_STATUSES.has(response.status) || !location) {
          return await consume({ response, url: currentUrl });
        }

        await discardBody(response);
        this.logger.debug("session_redirect", { url: currentUrl, status: response.status, location });
        currentUrl = new URL(location, currentUrl).toString();
        if (response.status === 303 || (method === "POST" && (response.status === 301 || response.status === 302))) {
          method = "GET";
          body = undefined;
        }
      }
    } catch (error) {
      if (timedOut) {
        throw new NetworkError(`request to ${currentUrl} timed out after ${this.config.requestTimeoutMs}ms`, {
          retriable: true,
          cause: error,
        });
      }
      throw error;
    } finally {
      clearTimeout(timeout);
    }

    throw new NetworkError(`too many redirects starting at ${url}`, { retriable: false });
  }

  private async storeCookies(response: Response, url: string): Promise<void> {
    for (const raw of response.headers.getSetCookie()) {
      await this.jar.setCookie(raw, url, { ignoreError: true });
    }
  }
}

async function discardBody(response: Response): Promise<void> {
  if (response.body && !response.bodyUsed) {
    await response.body.cancel();
  }
}
