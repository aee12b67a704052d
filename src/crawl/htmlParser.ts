import { load } from "cheerio";
import { CatalogueModule, PaperRecord, ParseWarning, normalizeCourseCode } from "../types";

export interface ListingParseResult {
  records: PaperRecord[];
  warnings: ParseWarning[];
}

const DOCUMENT_HREF = /\.(pdf|docx?)(?:[?#].*)?$/i;
const YEAR_PATTERN = /(?<!\d)(19\d{2}|20\d{2})(?!\d)/;
const ENTRY_SELECTOR = "tr, li, .views-row";
const GENERIC_LINK_TEXT = /^(download|view|open|pdf|docx?|file|link|here|click here)$/i;
const WARNING_SNIPPET_LENGTH = 80;

function sanitizeText(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

function snippet(value: string): string {
  return value.length > WARNING_SNIPPET_LENGTH ? `${value.slice(0, WARNING_SNIPPET_LENGTH)}...` : value;
}

function normalizeUrl(baseUrl: string, href: string): string {
  return new URL(href, baseUrl).toString();
}

export function isDocumentHref(href: string | undefined): boolean {
  return Boolean(href && DOCUMENT_HREF.test(href.trim()));
}

export function extractYear(text: string): number | undefined {
  const match = text.match(YEAR_PATTERN);
  return match ? Number.parseInt(match[1], 10) : undefined;
}

function fileNameOf(url: string): string {
  const last = new URL(url).pathname.split("/").pop() ?? "";
  try {
    return decodeURIComponent(last);
  } catch {
    return last;
  }
}

function stripExtension(fileName: string): string {
  return fileName.replace(/\.[a-z0-9]+$/i, "");
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

interface ListingCandidate {
  entryText: string;
  linkText: string;
  fileName: string;
  year: number;
  downloadUrl: string;
}

/** Entry text left once the course code, the year and the link text are taken out. */
function describedTitle(candidate: ListingCandidate, codePattern: RegExp): string {
  const remainder = candidate.entryText
    .replace(candidate.linkText, " ")
    .replace(codePattern, " ")
    .replace(new RegExp(YEAR_PATTERN.source, "g"), " ")
    .replace(/\(\s*\)|\[\s*\]/g, " ");
  return sanitizeText(remainder).replace(/^[\s|:,;\u2013-]+|[\s|:,;\u2013-]+$/g, "");
}

function countBy(values: string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return counts;
}

/**
 * Link text is the title unless it is generic ("Download", "PDF") or shared
 * by several papers of the same year. Those fall back to the entry's own
 * description, then to the file name.
 */
function assignTitles(candidates: ListingCandidate[], codePattern: RegExp): string[] {
  const linkCounts = countBy(candidates.map((candidate) => `${candidate.year}|${candidate.linkText}`));
  const titles = candidates.map((candidate) => {
    const linkText = candidate.linkText;
    if (linkText && !GENERIC_LINK_TEXT.test(linkText) && linkCounts.get(`${candidate.year}|${linkText}`) === 1) {
      return linkText;
    }
    return describedTitle(candidate, codePattern) || stripExtension(candidate.fileName);
  });

  const titleCounts = countBy(titles.map((title, index) => `${candidates[index].year}|${title}`));
  return titles.map((title, index) =>
    (titleCounts.get(`${candidates[index].year}|${title}`) ?? 0) > 1 ? stripExtension(candidates[index].fileName) : title,
  );
}

/**
 * Extracts paper records from one listing page.
 *
 * The portal's markup is not stable, so entries are found structurally: the
 * innermost table rows, list items or view rows that hold a document link or
 * mention the course code, plus document links sitting outside all of them.
 * An entry without a usable link or year becomes a warning and is skipped.
 * Records keep document order.
 */
export function parseListing(html: string, courseCode: string, pageUrl: string): ListingParseResult {
  const $ = load(html);
  const code = normalizeCourseCode(courseCode);
  const mentionsCourse = new RegExp(`\\b${escapeRegExp(code)}\\b`, "i");
  const codePattern = new RegExp(`(?<![a-z0-9])${escapeRegExp(code)}(?![a-z0-9])`, "gi");
  const candidates: ListingCandidate[] = [];
  const warnings: ParseWarning[] = [];
  const seenUrls = new Set<string>();

  // Cell and block boundaries become spaces so "CS101" and "2021" in adjacent cells stay apart.
  $("td, th, div, p, br").after(" ");

  const rows = $(ENTRY_SELECTOR)
    .filter((_, element) => $(element).find(ENTRY_SELECTOR).length === 0)
    .filter((_, element) => {
      const row = $(element);
      const hasDocument = row
        .find("a[href]")
        .toArray()
        .some((anchor) => isDocumentHref($(anchor).attr("href")));
      return hasDocument || mentionsCourse.test(row.text());
    });
  const rowSet = new Set(rows.toArray());
  const looseAnchors = $("a[href]").filter(
    (_, anchor) =>
      isDocumentHref($(anchor).attr("href")) &&
      !$(anchor)
        .parents()
        .toArray()
        .some((parent) => rowSet.has(parent)),
  );
  const entries = rows.add(looseAnchors).toArray();

  if (entries.length === 0) {
    warnings.push({
      courseCode: code,
      reason: "no_entries",
      detail: `no listing entries found at ${pageUrl}`,
    });
    return { records: [], warnings };
  }

  entries.forEach((element, entryIndex) => {
    const entry = $(element);
    const entryText = sanitizeText(entry.text());
    const anchor = entry.is("a")
      ? entry
      : entry
          .find("a[href]")
          .filter((_, candidate) => isDocumentHref($(candidate).attr("href")))
          .first();
    const href = anchor.attr("href");

    if (anchor.length === 0 || !href) {
      warnings.push({
        courseCode: code,
        reason: "missing_link",
        detail: `entry has no document link: "${snippet(entryText)}"`,
        entryIndex,
      });
      return;
    }

    let downloadUrl: string;
    try {
      downloadUrl = normalizeUrl(pageUrl, href.trim());
    } catch {
      warnings.push({
        courseCode: code,
        reason: "missing_link",
        detail: `entry link is not a valid URL: "${snippet(href)}"`,
        entryIndex,
      });
      return;
    }

    const fileName = fileNameOf(downloadUrl);
    const year = extractYear(entryText.replace(codePattern, " ")) ?? extractYear(fileName.replace(codePattern, " "));
    if (year === undefined) {
      warnings.push({
        courseCode: code,
        reason: "invalid_year",
        detail: `no year found for "${snippet(entryText || fileName)}"`,
        entryIndex,
      });
      return;
    }

    if (seenUrls.has(downloadUrl)) {
      return;
    }
    seenUrls.add(downloadUrl);

    const linkText = sanitizeText(anchor.text()) || sanitizeText(anchor.attr("title") ?? "");
    candidates.push({ entryText, linkText, fileName, year, downloadUrl });
  });

  const titles = assignTitles(candidates, codePattern);
  const records: PaperRecord[] = candidates.map((candidate, index) => ({
    courseCode: code,
    year: candidate.year,
    title: titles[index],
    downloadUrl: candidate.downloadUrl,
  }));
  return { records, warnings };
}

export function extractNextPageUrl(html: string, pageUrl: string): string | undefined {
  const $ = load(html);

  const explicitNext =
    $("a[rel='next']").attr("href") ||
    $(".pager-next a, .pager__item--next a").attr("href") ||
    $(".pagination a.next").attr("href") ||
    $("nav.pagination a:contains('Next'), ul.pager a:contains('next')").attr("href");

  if (explicitNext) {
    return normalizeUrl(pageUrl, explicitNext);
  }

  return undefined;
}

export function extractDepartmentLinks(html: string, pageUrl: string, pattern: string): string[] {
  const $ = load(html);
  const self = pageUrl.replace(/\/+$/, "");
  const links: string[] = [];
  const seen = new Set<string>();

  $("a[href]").each((_, element) => {
    const href = $(element).attr("href");
    if (!href || !href.includes(pattern)) {
      return;
    }

    const url = normalizeUrl(pageUrl, href).replace(/#.*$/, "");
    const key = url.replace(/\/+$/, "");
    if (key === self || seen.has(key)) {
      return;
    }
    seen.add(key);
    links.push(url);
  });

  return links;
}

export function departmentName(departmentUrl: string): string {
  const segment = new URL(departmentUrl).pathname.replace(/\/+$/, "").split("/").pop() ?? "";
  return segment.replace(/-/g, " ").replace(/\b\w/g, (letter) => letter.toUpperCase());
}

/**
 * Module rows of a department page: the first table body, one module per row
 * with name, code and semester cells.
 */
export function parseCatalogueModules(html: string, department: string): CatalogueModule[] {
  const $ = load(html);
  const body = $("tbody").first();
  const modules: CatalogueModule[] = [];

  body.find("tr").each((_, row) => {
    const cells = $(row).find("td");
    if (cells.length < 3) {
      return;
    }

    const code = normalizeCourseCode(sanitizeText(cells.eq(1).text()));
    if (!code) {
      return;
    }
    modules.push({
      code,
      name: sanitizeText(cells.eq(0).text()),
      semester: sanitizeText(cells.eq(2).text()),
      department,
    });
  });

  return modules;
}
