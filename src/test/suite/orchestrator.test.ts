import assert from "node:assert";
import fs from "node:fs";
import path from "node:path";
import { MockAgent } from "undici";
import { AppConfig } from "../../config";
import { MetricsRegistry } from "../../observability";
import { canTransition, isFinalState, ScrapeOrchestrator, ScrapeStateMachine } from "../../orchestrator";
import { ProgressEvent, RecordsFoundEvent, ScrapeJob } from "../../types";
import {
  createMockAgent,
  createSession,
  ListingEntry,
  listingPage,
  LOGIN_PAGE,
  makeTempDir,
  PORTAL_ORIGIN,
  removeDir,
  silentLogger,
  startTestServer,
  testConfig,
} from "../helpers";

const CREDENTIALS = { username: "student", password: "test-secret" };
const LISTING_PATH = "/library/exam-papers?code_value_1=CS101";

function papers(first: number, count: number): ListingEntry[] {
  return Array.from({ length: count }, (_, offset) => {
    const number = first + offset;
    const year = 2013 + number;
    return { title: `Paper ${number}`, year, href: `/files/cs101-${year}.pdf` };
  });
}

interface Harness {
  orchestrator: ScrapeOrchestrator;
  events: ProgressEvent[];
}

function createHarness(
  agent: MockAgent,
  config: AppConfig,
  options: { signal?: AbortSignal; onEvent?: (event: ProgressEvent) => void } = {},
): Harness {
  const events: ProgressEvent[] = [];
  const orchestrator = new ScrapeOrchestrator({
    config,
    logger: silentLogger("orchestrator"),
    metrics: new MetricsRegistry(),
    session: createSession(agent, config),
    emit: (event) => {
      events.push(event);
      options.onEvent?.(event);
    },
    signal: options.signal,
  });
  return { orchestrator, events };
}

function recordsFound(events: ProgressEvent[]): RecordsFoundEvent[] {
  return events.filter((event): event is RecordsFoundEvent => event.type === "records_found");
}

suite("Scrape Orchestrator Test Suite", () => {
  let agent: MockAgent;
  let dir: string;
  let job: ScrapeJob;

  setup(async () => {
    agent = createMockAgent();
    dir = await makeTempDir();
    job = { id: "job_test", courses: ["cs101"], destinationDir: path.join(dir, "out") };
  });

  teardown(async () => {
    await agent.close();
    await removeDir(dir);
  });

  function interceptLogin(): void {
    const portal = agent.get(PORTAL_ORIGIN);
    portal.intercept({ path: "/library/exam-papers", method: "GET" }).reply(200, LOGIN_PAGE);
    portal
      .intercept({ path: "/user/login", method: "POST" })
      .reply(200, "<p>Welcome back</p>", { headers: { "set-cookie": "SSESS=test-session; Path=/; HttpOnly" } });
  }

  function interceptPapers(entries: ListingEntry[]): void {
    const portal = agent.get(PORTAL_ORIGIN);
    for (const entry of entries) {
      portal.intercept({ path: entry.href, method: "GET" }).reply(200, `%PDF ${entry.year}`);
    }
  }

  test("scrapes two listing pages and downloads every paper", async () => {
    interceptLogin();
    const portal = agent.get(PORTAL_ORIGIN);
    portal
      .intercept({ path: LISTING_PATH, method: "GET", headers: { cookie: "SSESS=test-session" } })
      .reply(200, listingPage("CS101", papers(1, 5), "?code_value_1=CS101&amp;page=1"));
    portal
      .intercept({ path: `${LISTING_PATH}&page=1`, method: "GET" })
      .reply(200, listingPage("CS101", papers(6, 5)));
    interceptPapers(papers(1, 10));
    const { orchestrator, events } = createHarness(agent, testConfig());

    const terminal = await orchestrator.run(job, CREDENTIALS);

    assert.strictEqual(events[0].type, "started");
    assert.deepStrictEqual(
      events.filter((event) => event.type === "page_fetched").map((event) => event.type === "page_fetched" && event.pageCount),
      [1, 2],
    );
    assert.deepStrictEqual(
      recordsFound(events).map((event) => event.records.length),
      [5, 5],
    );
    assert.strictEqual(events.filter((event) => event.type === "download_progress").length, 10);
    assert.strictEqual(events.filter((event) => event.type === "completed" || event.type === "failed").length, 1);
    assert.strictEqual(events[events.length - 1], terminal);
    assert.ok(events.every((event) => Object.isFrozen(event)));

    assert.strictEqual(terminal.type, "completed");
    if (terminal.type !== "completed") {
      return;
    }
    const { summary } = terminal;
    assert.deepStrictEqual(summary.courses, ["CS101"]);
    assert.strictEqual(summary.discovered, 10);
    assert.strictEqual(summary.downloaded, 10);
    assert.strictEqual(summary.failed, 0);
    assert.strictEqual(summary.skipped, 0);
    assert.strictEqual(summary.cancelled, false);
    assert.strictEqual(summary.items[0].key, "CS101|2014|Paper 1");
    assert.strictEqual(
      fs.readFileSync(path.join(dir, "out", "CS101", "2014-Paper_1.pdf"), "utf-8"),
      "%PDF 2014",
    );
    assert.strictEqual(fs.readdirSync(path.join(dir, "out", "CS101")).length, 10);
    assert.strictEqual(orchestrator.state, "completed");
  });

  test("a rejected login emits one failed event and nothing else", async () => {
    agent.get(PORTAL_ORIGIN).intercept({ path: "/library/exam-papers", method: "GET" }).reply(401, "denied");
    const { orchestrator, events } = createHarness(agent, testConfig());

    const terminal = await orchestrator.run(job, CREDENTIALS);

    assert.deepStrictEqual(
      events.map((event) => event.type),
      ["started", "failed"],
    );
    assert.strictEqual(terminal.type, "failed");
    if (terminal.type === "failed") {
      assert.strictEqual(terminal.reason.kind, "auth");
    }
    assert.strictEqual(fs.existsSync(path.join(dir, "out")), false);
    assert.strictEqual(orchestrator.state, "failed");
  });

  test("an auth failure during downloads fails the job", async () => {
    interceptLogin();
    const entries = papers(1, 2);
    const portal = agent.get(PORTAL_ORIGIN);
    portal.intercept({ path: LISTING_PATH, method: "GET" }).reply(200, listingPage("CS101", entries));
    portal.intercept({ path: entries[0].href, method: "GET" }).reply(403, "expired");
    const { orchestrator, events } = createHarness(agent, testConfig());

    const terminal = await orchestrator.run({ ...job, maxConcurrency: 1 }, CREDENTIALS);

    assert.deepStrictEqual(
      events.map((event) => event.type),
      ["started", "page_fetched", "records_found", "failed"],
    );
    assert.strictEqual(terminal.type === "failed" && terminal.reason.kind, "auth");
    assert.strictEqual(fs.existsSync(path.join(dir, "out")), false);
  });

  test("an auth failure aborts in-flight downloads and removes their partial files", async () => {
    let slowRequests = 0;
    const server = await startTestServer((_request, response) => {
      slowRequests += 1;
      response.writeHead(200, { "content-type": "application/pdf" });
      response.write("%PDF partial");
    });
    agent.enableNetConnect(server.host);
    interceptLogin();
    const entries: ListingEntry[] = [
      { title: "Paper 1", year: 2014, href: `${server.origin}/files/cs101-2014.pdf` },
      { title: "Paper 2", year: 2015, href: "/files/cs101-2015.pdf" },
    ];
    const portal = agent.get(PORTAL_ORIGIN);
    portal.intercept({ path: LISTING_PATH, method: "GET" }).reply(200, listingPage("CS101", entries));
    portal.intercept({ path: "/files/cs101-2015.pdf", method: "GET" }).reply(403, "expired").delay(100);
    const { orchestrator, events } = createHarness(agent, testConfig());

    try {
      const terminal = await orchestrator.run({ ...job, maxConcurrency: 2 }, CREDENTIALS);

      assert.deepStrictEqual(
        events.map((event) => event.type),
        ["started", "page_fetched", "records_found", "failed"],
      );
      assert.strictEqual(terminal.type === "failed" && terminal.reason.kind, "auth");
      assert.strictEqual(slowRequests, 1);
      assert.deepStrictEqual(fs.readdirSync(path.join(dir, "out", "CS101")), []);
    } finally {
      await server.close();
    }
  });

  test("an auth failure on a catalogue department fails the job", async () => {
    interceptLogin();
    const portal = agent.get(PORTAL_ORIGIN);
    portal
      .intercept({ path: "/study/available-courses", method: "GET" })
      .reply(
        200,
        `<a href="/study/available-courses/computer-science">CS</a><a href="/study/available-courses/history">History</a>`,
      );
    portal.intercept({ path: "/study/available-courses/computer-science", method: "GET" }).reply(403, "expired");
    const { orchestrator, events } = createHarness(agent, testConfig());

    const terminal = await orchestrator.run({ ...job, courses: "all" }, CREDENTIALS);

    assert.deepStrictEqual(
      events.map((event) => event.type),
      ["started", "failed"],
    );
    assert.strictEqual(terminal.type === "failed" && terminal.reason.kind, "auth");
    assert.strictEqual(orchestrator.state, "failed");
  });

  test("'all' scrapes every catalogue module and skips a missing department", async () => {
    interceptLogin();
    const portal = agent.get(PORTAL_ORIGIN);
    portal
      .intercept({ path: "/study/available-courses", method: "GET" })
      .reply(
        200,
        `<a href="/study/available-courses/computer-science">CS</a><a href="/study/available-courses/history">History</a>`,
      );
    portal
      .intercept({ path: "/study/available-courses/computer-science", method: "GET" })
      .reply(200, "<table><tbody><tr><td>Programming</td><td>cs101</td><td>Semester 1</td></tr></tbody></table>");
    portal.intercept({ path: "/study/available-courses/history", method: "GET" }).reply(404, "gone");
    const entries = papers(1, 1);
    portal.intercept({ path: LISTING_PATH, method: "GET" }).reply(200, listingPage("CS101", entries));
    interceptPapers(entries);
    const { orchestrator, events } = createHarness(agent, testConfig());

    const terminal = await orchestrator.run({ ...job, courses: "all" }, CREDENTIALS);

    assert.deepStrictEqual(
      events.map((event) => event.type),
      ["started", "page_fetched", "records_found", "download_progress", "completed"],
    );
    assert.strictEqual(terminal.type, "completed");
    if (terminal.type === "completed") {
      assert.deepStrictEqual(terminal.summary.courses, ["CS101"]);
      assert.strictEqual(terminal.summary.downloaded, 1);
    }
  });

  test("a failing course page is recorded and the other course continues", async () => {
    interceptLogin();
    const portal = agent.get(PORTAL_ORIGIN);
    portal.intercept({ path: LISTING_PATH, method: "GET" }).reply(404, "no such course");
    portal
      .intercept({ path: "/library/exam-papers?code_value_1=MA201", method: "GET" })
      .reply(200, listingPage("MA201", [{ title: "Algebra", year: 2020, href: "/files/ma201-2020.pdf" }]));
    portal.intercept({ path: "/files/ma201-2020.pdf", method: "GET" }).reply(200, "%PDF algebra");
    const { orchestrator } = createHarness(agent, testConfig());
    const courses = ["CS101", "ma201", "CS101"];

    const terminal = await orchestrator.run({ ...job, courses }, CREDENTIALS);

    assert.strictEqual(Object.isFrozen(courses), false);
    assert.strictEqual(terminal.type, "completed");
    if (terminal.type !== "completed") {
      return;
    }
    assert.deepStrictEqual(terminal.summary.courses, ["CS101", "MA201"]);
    assert.deepStrictEqual(
      terminal.summary.pageFailures.map((failure) => failure.courseCode),
      ["CS101"],
    );
    assert.strictEqual(terminal.summary.downloaded, 1);
  });

  test("a failed item does not stop the others", async () => {
    interceptLogin();
    const entries = papers(1, 3);
    const portal = agent.get(PORTAL_ORIGIN);
    portal.intercept({ path: LISTING_PATH, method: "GET" }).reply(200, listingPage("CS101", entries));
    portal.intercept({ path: entries[0].href, method: "GET" }).reply(200, "%PDF one");
    portal.intercept({ path: entries[1].href, method: "GET" }).reply(404, "missing");
    portal.intercept({ path: entries[2].href, method: "GET" }).reply(200, "%PDF three");
    const { orchestrator } = createHarness(agent, testConfig());

    const terminal = await orchestrator.run(job, CREDENTIALS);

    assert.strictEqual(terminal.type, "completed");
    if (terminal.type !== "completed") {
      return;
    }
    assert.deepStrictEqual(
      terminal.summary.items.map((item) => item.status),
      ["downloaded", "failed", "downloaded"],
    );
    assert.strictEqual(terminal.summary.failed, 1);
  });

  test("selection and year range narrow the downloads", async () => {
    interceptLogin();
    const entries = papers(1, 5);
    agent.get(PORTAL_ORIGIN).intercept({ path: LISTING_PATH, method: "GET" }).reply(200, listingPage("CS101", entries));
    interceptPapers([entries[2]]);
    const { orchestrator } = createHarness(agent, testConfig());

    const terminal = await orchestrator.run(
      {
        ...job,
        selection: [
          { courseCode: "cs101", year: 2016, title: "Paper 3" },
          { courseCode: "CS101", year: 2018, title: "Paper 5" },
        ],
        yearRange: { from: 2015, to: 2017 },
      },
      CREDENTIALS,
    );

    assert.strictEqual(terminal.type, "completed");
    if (terminal.type !== "completed") {
      return;
    }
    assert.strictEqual(terminal.summary.discovered, 5);
    assert.strictEqual(terminal.summary.selected, 1);
    assert.strictEqual(terminal.summary.items[0].key, "CS101|2016|Paper 3");
  });

  test("cancelling stops enumeration and skips downloads", async () => {
    interceptLogin();
    agent
      .get(PORTAL_ORIGIN)
      .intercept({ path: LISTING_PATH, method: "GET" })
      .reply(200, listingPage("CS101", papers(1, 5), "?code_value_1=CS101&amp;page=1"));
    const controller = new AbortController();
    const { orchestrator, events } = createHarness(agent, testConfig(), {
      signal: controller.signal,
      onEvent: (event) => {
        if (event.type === "records_found") {
          controller.abort();
        }
      },
    });

    const terminal = await orchestrator.run(job, CREDENTIALS);

    assert.deepStrictEqual(
      events.map((event) => event.type),
      ["started", "page_fetched", "records_found", "completed"],
    );
    assert.strictEqual(terminal.type, "completed");
    if (terminal.type !== "completed") {
      return;
    }
    assert.strictEqual(terminal.summary.cancelled, true);
    assert.strictEqual(terminal.summary.discovered, 5);
    assert.strictEqual(terminal.summary.downloaded, 0);
    assert.strictEqual(terminal.summary.skipped, 5);
  });

  test("cancelling mid-download lets in-flight items finish and starts no more", async () => {
    interceptLogin();
    const entries = papers(1, 3);
    const portal = agent.get(PORTAL_ORIGIN);
    portal.intercept({ path: LISTING_PATH, method: "GET" }).reply(200, listingPage("CS101", entries));
    portal.intercept({ path: entries[0].href, method: "GET" }).reply(200, "%PDF 2014");
    portal.intercept({ path: entries[1].href, method: "GET" }).reply(200, "%PDF 2015").delay(50);
    const controller = new AbortController();
    const { orchestrator, events } = createHarness(agent, testConfig(), {
      signal: controller.signal,
      onEvent: (event) => {
        if (event.type === "download_progress") {
          controller.abort();
        }
      },
    });

    const terminal = await orchestrator.run({ ...job, maxConcurrency: 2 }, CREDENTIALS);

    assert.deepStrictEqual(
      events.map((event) => (event.type === "download_progress" ? `progress:${event.record.title}` : event.type)),
      ["started", "page_fetched", "records_found", "progress:Paper 1", "progress:Paper 2", "completed"],
    );
    assert.strictEqual(terminal.type, "completed");
    if (terminal.type !== "completed") {
      return;
    }
    assert.strictEqual(terminal.summary.cancelled, true);
    assert.deepStrictEqual(
      terminal.summary.items.map((item) => [item.key, item.status]),
      [
        ["CS101|2014|Paper 1", "downloaded"],
        ["CS101|2015|Paper 2", "downloaded"],
      ],
    );
    assert.strictEqual(terminal.summary.skipped, 1);
    assert.deepStrictEqual(fs.readdirSync(path.join(dir, "out", "CS101")).sort(), ["2014-Paper_1.pdf", "2015-Paper_2.pdf"]);
  });

  test("run() refuses to reuse an orchestrator", async () => {
    agent.get(PORTAL_ORIGIN).intercept({ path: "/library/exam-papers", method: "GET" }).reply(401, "denied");
    const { orchestrator } = createHarness(agent, testConfig());
    await orchestrator.run(job, CREDENTIALS);

    await assert.rejects(orchestrator.run(job, CREDENTIALS), /already used/);
  });
});

suite("Scrape State Machine Test Suite", () => {
  test("follows the happy path and records it", () => {
    const seen: string[] = [];
    const machine = new ScrapeStateMachine((from, to) => seen.push(`${from}->${to}`));

    machine.transition("logging_in");
    machine.transition("enumerating");
    machine.transition("parsing");
    machine.transition("enumerating");
    machine.transition("enumerating");
    machine.transition("downloading");
    machine.transition("completed");

    assert.deepStrictEqual(machine.visited, [
      "idle",
      "logging_in",
      "enumerating",
      "parsing",
      "enumerating",
      "downloading",
      "completed",
    ]);
    assert.strictEqual(seen[0], "idle->logging_in");
    assert.strictEqual(isFinalState(machine.state), true);
  });

  test("rejects illegal transitions", () => {
    const machine = new ScrapeStateMachine();

    assert.throws(() => machine.transition("downloading"), /illegal scrape state transition idle -> downloading/);
    assert.strictEqual(canTransition("completed", "failed"), false);
    assert.strictEqual(canTransition("parsing", "failed"), true);
  });
});
