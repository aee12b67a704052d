import fs from "node:fs";
import http from "node:http";
import os from "node:os";
import path from "node:path";
import { MockAgent } from "undici";
import { AppConfig, DEFAULT_CONFIG } from "../config";
import { Logger, MetricsRegistry } from "../observability";
import { SessionManager } from "../session";

export const PORTAL_ORIGIN = "https://portal.example.com";

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    ...DEFAULT_CONFIG,
    portal: {
      ...DEFAULT_CONFIG.portal,
      baseUrl: PORTAL_ORIGIN,
      catalogueUrl: `${PORTAL_ORIGIN}/study/available-courses`,
    },
    retryBaseDelayMs: 1,
    retryMaxDelayMs: 5,
    logLevel: "silent",
    ...overrides,
  };
}

export function silentLogger(component = "test"): Logger {
  return new Logger({ component, runId: "run_test", level: "silent" });
}

export function createMockAgent(): MockAgent {
  const agent = new MockAgent();
  agent.disableNetConnect();
  return agent;
}

export function createSession(agent: MockAgent, config: AppConfig = testConfig()): SessionManager {
  return new SessionManager({ config, logger: silentLogger("session"), metrics: new MetricsRegistry(), dispatcher: agent });
}

export async function makeTempDir(): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), "exam-papers-test-"));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.promises.rm(dir, { recursive: true, force: true });
}

export interface TestServer {
  origin: string;
  /** `host:port`, as MockAgent's `enableNetConnect` matches it. */
  host: string;
  close(): Promise<void>;
}

/** A local HTTP server for responses MockAgent cannot produce, such as a body that stalls. */
export async function startTestServer(handler: http.RequestListener): Promise<TestServer> {
  const server = http.createServer(handler);
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("test server is not listening on a port");
  }

  const host = `127.0.0.1:${address.port}`;
  return {
    origin: `http://${host}`,
    host,
    close: () => {
      server.closeAllConnections();
      return new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
    },
  };
}

export interface ListingEntry {
  title: string;
  year: number;
  href: string;
}

/** A listing page in the portal's table layout, with an optional pager link. */
export function listingPage(courseCode: string, entries: ListingEntry[], nextHref?: string): string {
  const rows = entries
    .map(
      (entry) =>
        `<tr><td>${courseCode}</td><td>${entry.title} (${entry.year})</td><td><a href="${entry.href}">${entry.title}</a></td></tr>`,
    )
    .join("\n");
  const pager = nextHref ? `<ul class="pager"><li class="pager-next"><a href="${nextHref}">next</a></li></ul>` : "";
  return `<html><body><table><thead><tr><th>Code</th><th>Paper</th><th>File</th></tr></thead><tbody>${rows}</tbody></table>${pager}</body></html>`;
}

export const LOGIN_PAGE = `<html><body>
<form action="/search" method="get"><input name="keys"><input type="hidden" name="form_build_id" value="form-search"></form>
<form action="/user/login" method="post" id="user-login">
  <input name="name"><input type="password" name="pass">
  <input type="hidden" name="form_build_id" value="form-test-build">
  <input type="hidden" name="form_id" value="user_login">
</form>
</body></html>`;
