import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { Readable, Transform } from "node:stream";
import { pipeline } from "node:stream/promises";
import { AppConfig } from "../config";
import { describeError, DownloadError, isAbortError, ScrapeError } from "../core/errors";
import { Logger, MetricsRegistry } from "../observability";
import { SessionManager } from "../session";
import { PaperRecord } from "../types";
import { paperFilePath } from "./fileNames";

export interface DownloaderDeps {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  session: SessionManager;
}

export interface FetchDocumentOptions {
  signal?: AbortSignal;
  onProgress?: (bytes: number, totalBytes?: number) => void;
}

function parseContentLength(value: string | null): number | undefined {
  if (!value) {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : undefined;
}

async function removeIfPresent(filePath: string): Promise<void> {
  await fs.promises.rm(filePath, { force: true });
}

/**
 * Runs `worker` over `items` with at most `concurrency` in flight. Items are
 * taken in order.
 */
export async function processWithConcurrency<T>(
  items: T[],
  concurrency: number,
  worker: (item: T) => Promise<void>,
): Promise<void> {
  let index = 0;
  const slots = new Array(Math.max(1, concurrency)).fill(null).map(async () => {
    while (true) {
      const current = index;
      index += 1;
      if (current >= items.length) {
        break;
      }
      await worker(items[current]);
    }
  });
  await Promise.all(slots);
}

/**
 * Streams one paper to disk and returns the record with `localPath` set.
 *
 * The body goes to `<target>.part` and is renamed over the target once it is
 * complete, so a re-download replaces the previous file. An empty body, a
 * length that disagrees with `content-length`, an abort or a write failure
 * removes the partial file and fails with {@link DownloadError}. Auth and
 * not-found errors from the session pass through unchanged.
 */
export async function fetchDocument(
  deps: DownloaderDeps,
  record: PaperRecord,
  destinationDir: string,
  options: FetchDocumentOptions = {},
): Promise<PaperRecord> {
  const { config, logger, metrics, session } = deps;
  const finalPath = paperFilePath(record, destinationDir);
  const tempPath = `${finalPath}.part`;
  const stopTimer = metrics.startTimer("download_ms");

  const controller = new AbortController();
  const onAbort = (): void => controller.abort(options.signal?.reason);
  if (options.signal?.aborted) {
    controller.abort(options.signal.reason);
  } else {
    options.signal?.addEventListener("abort", onAbort, { once: true });
  }
  const timeout = setTimeout(() => controller.abort(), config.downloadTimeoutMs);

  try {
    logger.info("download_item_start", { courseCode: record.courseCode, url: record.downloadUrl });
    const { response } = await session.stream(record.downloadUrl, { signal: controller.signal });
    const expectedBytes = parseContentLength(response.headers.get("content-length"));
    if (!response.body) {
      throw new DownloadError(`empty response body for ${record.downloadUrl}`);
    }

    await fs.promises.mkdir(path.dirname(finalPath), { recursive: true });
    const hash = crypto.createHash("sha256");
    let bytes = 0;
    let reportedAt = 0;
    const meter = new Transform({
      transform(chunk: Uint8Array, _encoding, callback) {
        hash.update(chunk);
        bytes += chunk.length;
        if (options.onProgress && config.progressIntervalBytes > 0 && bytes - reportedAt >= config.progressIntervalBytes) {
          reportedAt = bytes;
          options.onProgress(bytes, expectedBytes);
        }
        callback(null, chunk);
      },
    });

    try {
      await pipeline(Readable.fromWeb(response.body), meter, fs.createWriteStream(tempPath, { flags: "w" }));
    } catch (error) {
      if (isAbortError(error) || controller.signal.aborted) {
        throw new DownloadError(`download aborted for ${record.downloadUrl}`, { cause: error });
      }
      throw new DownloadError(`failed writing ${record.downloadUrl}: ${describeError(error)}`, { cause: error });
    }

    if (bytes === 0) {
      throw new DownloadError(`empty document at ${record.downloadUrl}`);
    }
    if (expectedBytes !== undefined && bytes !== expectedBytes) {
      throw new DownloadError(`expected ${expectedBytes} bytes from ${record.downloadUrl} but received ${bytes}`);
    }

    await fs.promises.rename(tempPath, finalPath);
    if (options.onProgress && reportedAt !== bytes) {
      options.onProgress(bytes, expectedBytes);
    }

    const durationMs = stopTimer();
    metrics.incrementCounter("downloads_ok", 1);
    logger.info("download_item_ok", {
      courseCode: record.courseCode,
      url: record.downloadUrl,
      localPath: finalPath,
      bytes,
      durationMs,
    });
    return { ...record, localPath: finalPath, bytes, sha256: hash.digest("hex") };
  } catch (error) {
    await removeIfPresent(tempPath);
    stopTimer();
    metrics.incrementCounter("downloads_failed", 1);
    if (error instanceof ScrapeError) {
      throw error;
    }
    if (isAbortError(error) || controller.signal.aborted) {
      throw new DownloadError(`download aborted for ${record.downloadUrl}`, { cause: error });
    }
    throw new DownloadError(`download of ${record.downloadUrl} failed: ${describeError(error)}`, { cause: error });
  } finally {
    clearTimeout(timeout);
    options.signal?.removeEventListener("abort", onAbort);
  }
}
