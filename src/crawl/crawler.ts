import { AppConfig } from "../config";
import { AuthError, describeError } from "../core/errors";
import { Logger, MetricsRegistry } from "../observability";
import { FetchedPage, SessionManager } from "../session";
import { CatalogueModule } from "../types";
import { departmentName, extractDepartmentLinks, parseCatalogueModules } from "./htmlParser";

export interface CrawlDependencies {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  session: SessionManager;
}

export function courseListingUrl(config: AppConfig, courseCode: string): string {
  const url = new URL(config.portal.listingPath, config.portal.baseUrl);
  url.searchParams.set(config.portal.courseQueryParam, courseCode);
  return url.toString();
}

export async function fetchListingPage(
  deps: CrawlDependencies,
  courseCode: string,
  pageUrl: string,
  pageIndex: number,
): Promise<FetchedPage> {
  const { logger, metrics, session } = deps;
  logger.info("crawl_page_start", { courseCode, pageUrl, pageIndex });
  const stopTimer = metrics.startTimer("page_fetch_ms");

  const page = await session.get(pageUrl);
  metrics.incrementCounter("pages_fetched", 1);
  logger.info("crawl_page_fetched", {
    courseCode,
    pageUrl: page.url,
    pageIndex,
    bytes: page.body.length,
    durationMs: stopTimer(),
  });
  return page;
}

/**
 * Walks the public module catalogue: the index page links to one page per
 * department, each holding a table of modules. A department that fails to
 * load is logged and skipped, except on an {@link AuthError}, which ends the
 * crawl.
 */
export async function crawlCatalogue(deps: CrawlDependencies): Promise<CatalogueModule[]> {
  const { config, logger, session } = deps;
  const indexPage = await session.get(config.portal.catalogueUrl);
  const departmentUrls = extractDepartmentLinks(
    indexPage.body,
    indexPage.url,
    config.portal.catalogueDepartmentPattern,
  );
  logger.info("catalogue_departments_found", { pageUrl: indexPage.url, departments: departmentUrls.length });

  const modules: CatalogueModule[] = [];
  for (const departmentUrl of departmentUrls) {
    try {
      const page = await session.get(departmentUrl);
      const found = parseCatalogueModules(page.body, departmentName(departmentUrl));
      if (found.length === 0) {
        logger.warn("catalogue_department_without_modules", { pageUrl: departmentUrl });
      }
      modules.push(...found);
    } catch (error) {
      if (error instanceof AuthError) {
        throw error;
      }
      logger.error("catalogue_department_failed", { pageUrl: departmentUrl, error: describeError(error) });
    }
  }

  modules.sort((left, right) => left.code.localeCompare(right.code));
  logger.info("catalogue_complete", { modules: modules.length });
  return modules;
}
