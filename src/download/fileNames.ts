import crypto from "node:crypto";
import path from "node:path";
import { PaperKey, PaperRecord, paperKey } from "../types";

const MAX_SEGMENT_LENGTH = 100;
const DOCUMENT_EXTENSIONS = new Set([".pdf", ".doc", ".docx"]);

export function sanitizeSegment(value: string): string {
  const cleaned = value
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .replace(/[<>:"/\\|?*\u0000-\u001f]+/g, " ")
    .trim()
    .replace(/\s+/g, "_")
    .replace(/^[._]+|[._]+$/g, "")
    .slice(0, MAX_SEGMENT_LENGTH);
  return cleaned || "untitled";
}

function keyHash(key: PaperKey): string {
  return crypto.createHash("sha256").update(paperKey(key)).digest("hex").slice(0, 8);
}

function documentExtension(downloadUrl: string): string {
  let extension = "";
  try {
    extension = path.extname(new URL(downloadUrl).pathname).toLowerCase();
  } catch {
    extension = path.extname(downloadUrl).toLowerCase();
  }
  return DOCUMENT_EXTENSIONS.has(extension) ? extension : ".pdf";
}

/**
 * `<dest>/<COURSE>/<year>-<title><ext>`. The same key always lands on the
 * same path. A title is kept readable only when turning its underscores back
 * into spaces gives the original title; any other title gets a short hash of
 * the key, so "Paper A" and "Paper_A" never share a file.
 */
export function paperFilePath(record: PaperRecord, destinationDir: string): string {
  const title = sanitizeSegment(record.title);
  const lossless = title.replace(/_/g, " ") === record.title;
  const baseName = lossless ? `${record.year}-${title}` : `${record.year}-${title}-${keyHash(record)}`;
  return path.resolve(destinationDir, sanitizeSegment(record.courseCode), `${baseName}${documentExtension(record.downloadUrl)}`);
}
