import { DownloadedDocument, PaperKey, ProgressEvent, ScrapeSummary, TerminalEvent } from "./models";

export function paperKey(key: PaperKey): string {
  return `${key.courseCode}|${key.year}|${key.title}`;
}

export function normalizeCourseCode(value: string): string {
  return value.trim().toUpperCase();
}

export function isTerminalEvent(event: ProgressEvent): event is TerminalEvent {
  return event.type === "completed" || event.type === "failed";
}

/**
 * Freezes a value and everything reachable from it. Events and records are
 * snapshots once emitted.
 */
export function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

export function documentsFromSummary(summary: ScrapeSummary): DownloadedDocument[] {
  const documents: DownloadedDocument[] = [];
  for (const item of summary.items) {
    if (item.status !== "downloaded" || !item.record.localPath) {
      continue;
    }
    documents.push({
      key: item.key,
      courseCode: item.record.courseCode,
      year: item.record.year,
      title: item.record.title,
      localPath: item.record.localPath,
    });
  }
  return documents;
}
