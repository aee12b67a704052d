import fs from "node:fs";
import path from "node:path";
import { AppConfig, loadConfig, parseYearRange, YearRange } from "../config";
import { crawlCatalogue } from "../crawl";
import { createJobId, createRunId, Logger, LogFields, MetricsRegistry } from "../observability";
import { SessionManager } from "../session";
import { CourseSelector, Credentials, ProgressEvent, ScrapeJob } from "../types";
import { ScrapeWorkerHost, ScrapeWorkerChannel } from "../worker";

export type CommandName = "scrape" | "courses";

export interface ParsedCliArgs {
  command: CommandName;
  courses: string[];
  outPath?: string;
  concurrency?: number;
  years?: YearRange;
  username?: string;
  configPath?: string;
  ignoreHttpsErrors: boolean;
}

export interface CliOptions {
  env?: NodeJS.ProcessEnv;
  spawn?: () => ScrapeWorkerChannel;
}

const HELP_TEXT = `
Usage:
  exam-papers <command> [options]

Commands:
  scrape <COURSE...|all>  Download past papers for the given module codes
  courses                 List the module catalogue as JSON

Options:
  --out <path>            Destination directory (scrape) or JSON file (courses)
  --concurrency <n>       Simultaneous downloads
  --years <from-to>       Only download papers from these years, e.g. 2020-2025
                          (default: YEAR_RANGE, otherwise every year)
  --username <id>         Portal username (default: PORTAL_USERNAME)
  --config <path>         Optional path to JSON config file
  --ignore-https-errors   Ignore TLS certificate errors (use only when required)
  -h, --help              Show this help

The password is read from PORTAL_PASSWORD.
`;

const VALUE_FLAGS = new Set(["--out", "--concurrency", "--years", "--username", "--config"]);

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "scrape" || raw === "courses") {
    return raw;
  }
  return undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  const values = new Map<string, string>();
  const courses: string[] = [];
  let ignoreHttpsErrors = false;
  for (let index = 1; index < argv.length; index += 1) {
    const token = argv[index];
    if (VALUE_FLAGS.has(token)) {
      const value = argv[index + 1];
      if (value !== undefined) {
        values.set(token, value);
      }
      index += 1;
      continue;
    }
    if (token === "--ignore-https-errors") {
      ignoreHttpsErrors = true;
      continue;
    }
    if (!token.startsWith("-")) {
      courses.push(token);
    }
  }

  const concurrencyRaw = values.get("--concurrency");
  const concurrencyParsed = concurrencyRaw ? Number.parseInt(concurrencyRaw, 10) : undefined;
  return {
    command,
    courses,
    outPath: values.get("--out"),
    concurrency: Number.isFinite(concurrencyParsed) ? concurrencyParsed : undefined,
    years: parseYearRange(values.get("--years")),
    username: values.get("--username"),
    configPath: values.get("--config"),
    ignoreHttpsErrors,
  };
}

export function buildScrapeJob(parsed: ParsedCliArgs, config: AppConfig): ScrapeJob {
  const courses: CourseSelector = parsed.courses.some((course) => course.toLowerCase() === "all")
    ? "all"
    : parsed.courses;
  return {
    id: createJobId(),
    courses,
    destinationDir: path.resolve(parsed.outPath ?? config.outputDir),
    maxConcurrency: parsed.concurrency,
    selection: "all",
    yearRange: parsed.years ?? config.yearRange,
  };
}

/** Turns one progress event into the log line the terminal shows. */
export function describeEvent(event: ProgressEvent): { msg: string; fields: LogFields } {
  switch (event.type) {
    case "started":
      return { msg: "scrape_started", fields: { jobId: event.jobId, destinationDir: event.destinationDir } };
    case "page_fetched":
      return {
        msg: "page_fetched",
        fields: { jobId: event.jobId, courseCode: event.courseCode, pageUrl: event.pageUrl, pageCount: event.pageCount },
      };
    case "records_found":
      return {
        msg: "records_found",
        fields: { jobId: event.jobId, courseCode: event.courseCode, count: event.records.length },
      };
    case "download_progress":
      return {
        msg: "download_progress",
        fields: { jobId: event.jobId, title: event.record.title, bytes: event.bytes, totalBytes: event.totalBytes },
      };
    case "completed":
      return {
        msg: "scrape_completed",
        fields: {
          jobId: event.jobId,
          downloaded: event.summary.downloaded,
          failed: event.summary.failed,
          skipped: event.summary.skipped,
          cancelled: event.summary.cancelled,
          destinationDir: event.summary.destinationDir,
        },
      };
    case "failed":
      return { msg: "scrape_failed", fields: { jobId: event.jobId, kind: event.reason.kind, error: event.reason.message } };
  }
}

function readCredentials(parsed: ParsedCliArgs, env: NodeJS.ProcessEnv): Credentials | undefined {
  const username = parsed.username ?? env.PORTAL_USERNAME;
  const password = env.PORTAL_PASSWORD;
  if (!username || !password) {
    return undefined;
  }
  return { username, password };
}

async function runScrape(
  parsed: ParsedCliArgs,
  config: AppConfig,
  logger: Logger,
  runId: string,
  options: CliOptions,
): Promise<number> {
  const credentials = readCredentials(parsed, options.env ?? process.env);
  if (!credentials) {
    console.error("Set PORTAL_USERNAME (or --username) and PORTAL_PASSWORD before scraping.");
    return 1;
  }
  if (parsed.courses.length === 0) {
    console.error("Give at least one module code, or 'all'.");
    return 1;
  }

  const host = new ScrapeWorkerHost({ config, logger: logger.child("host"), runId, spawn: options.spawn });
  const handle = host.start(buildScrapeJob(parsed, config), credentials);
  const onInterrupt = (): void => handle.cancel();
  process.once("SIGINT", onInterrupt);

  try {
    for await (const event of handle.events) {
      const { msg, fields } = describeEvent(event);
      if (event.type === "failed") {
        logger.error(msg, fields);
      } else {
        logger.info(msg, fields);
      }
    }
    const terminal = await handle.outcome;
    return terminal.type === "completed" ? 0 : 1;
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }
}

async function runCourses(parsed: ParsedCliArgs, config: AppConfig, logger: Logger): Promise<number> {
  const metrics = new MetricsRegistry();
  const session = new SessionManager({ config, logger: logger.child("session"), metrics });
  const modules = await crawlCatalogue({ config, logger: logger.child("catalogue"), metrics, session });
  const json = JSON.stringify(modules, null, 4);

  if (parsed.outPath) {
    const target = path.resolve(parsed.outPath);
    await fs.promises.mkdir(path.dirname(target), { recursive: true });
    await fs.promises.writeFile(target, `${json}\n`, "utf-8");
    logger.info("courses_written", { path: target, modules: modules.length });
  } else {
    console.log(json);
  }
  return 0;
}

export async function runCli(argv: string[], options: CliOptions = {}): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    if (argv.length === 0 || argv.includes("-h") || argv.includes("--help")) {
      console.log(HELP_TEXT.trim());
      return 0;
    }
    console.error(`Unknown command: ${argv[0]}\n\n${HELP_TEXT.trim()}`);
    return 1;
  }

  let config = loadConfig(parsed.configPath, options.env ?? process.env);
  if (parsed.ignoreHttpsErrors) {
    config = {
      ...config,
      ignoreHttpsErrors: true,
    };
  }

  const runId = createRunId();
  const logger = new Logger({ component: "cli", runId, level: config.logLevel });
  logger.info("command_start", {
    command: parsed.command,
    courses: parsed.courses,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
  });

  const exitCode =
    parsed.command === "scrape"
      ? await runScrape(parsed, config, logger, runId, options)
      : await runCourses(parsed, config, logger);
  logger.info("command_complete", { command: parsed.command, exitCode });
  return exitCode;
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
