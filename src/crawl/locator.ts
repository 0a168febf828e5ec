import { AppConfig } from "../config";
import { Logger, MetricsRegistry, errorMessage } from "../observability";
import { HttpSession, QueryParams } from "../session";
import { parseSearchResultsHtml } from "./htmlParser";
import { parseSearchApiResponse } from "./searchApi";

/** Lists presentation detail-page URLs for one search page. An empty result ends pagination. */
export interface PresentationLocator {
  readonly strategy: "html" | "api";
  listPresentations(pageIndex: number): Promise<string[]>;
}

interface LocatorDeps {
  session: HttpSession;
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
}

export function buildHtmlSearchQuery(pageIndex: number, pageSize: number): QueryParams {
  return {
    keyword: "",
    type: "slide",
    desc: "true",
    page: pageIndex,
    page_size: pageSize,
    sortmode: "Date",
    matching: "AND",
    searched: "true",
  };
}

export function buildApiSearchQuery(pageIndex: number, pageSize: number): QueryParams {
  return {
    keyword: "",
    type: "slide",
    subtype: "",
    subtype_sub_level: "",
    topic: "",
    subtopic: "",
    year: "",
    conference: "",
    page: pageIndex,
    page_size: pageSize,
    sortmode: "Date",
    desc: "true",
  };
}

export class HtmlSearchLocator implements PresentationLocator {
  readonly strategy = "html";

  constructor(private readonly deps: LocatorDeps) {}

  async listPresentations(pageIndex: number): Promise<string[]> {
    const { session, config, logger, metrics } = this.deps;
    const searchUrl = new URL(config.searchPath, config.baseUrl).toString();
    const stopTimer = metrics.startTimer("page_fetch_ms");

    try {
      const response = await session.get(searchUrl, {
        query: buildHtmlSearchQuery(pageIndex, config.pageSize),
        headers: { accept: "text/html,application/xhtml+xml" },
      });
      const durationMs = stopTimer();
      if (response.status !== 200) {
        await response.body?.cancel();
        logger.error("listing_bad_status", { url: searchUrl, pageIndex, status: response.status, durationMs });
        return [];
      }

      const parsed = parseSearchResultsHtml(await response.text(), config.baseUrl);
      metrics.incrementCounter("pages_listed", 1);
      if (!parsed.hasContent) {
        logger.error("listing_content_block_missing", { url: searchUrl, pageIndex });
        return [];
      }
      if (parsed.resultBlocks === 0) {
        logger.info("listing_no_results", { url: searchUrl, pageIndex });
        return [];
      }
      if (parsed.presentationUrls.length === 0) {
        logger.warn("listing_results_without_slide_links", { url: searchUrl, pageIndex, resultBlocks: parsed.resultBlocks });
      }

      for (const url of parsed.presentationUrls) {
        logger.debug("listing_presentation_found", { url, pageIndex });
      }
      logger.info("listing_page_complete", { pageIndex, found: parsed.presentationUrls.length, durationMs });
      return parsed.presentationUrls;
    } catch (error) {
      logger.error("listing_fetch_failed", { url: searchUrl, pageIndex, error: errorMessage(error) });
      return [];
    }
  }
}

export class ApiSearchLocator implements PresentationLocator {
  readonly strategy = "api";

  constructor(private readonly deps: LocatorDeps) {}

  async listPresentations(pageIndex: number): Promise<string[]> {
    const { session, config, logger, metrics } = this.deps;
    const apiUrl = new URL(config.searchApiPath, config.baseUrl).toString();
    const origin = new URL(config.baseUrl).origin;
    const stopTimer = metrics.startTimer("page_fetch_ms");

    try {
      const response = await session.get(apiUrl, {
        query: buildApiSearchQuery(pageIndex, config.pageSize),
        headers: {
          accept: "application/json, text/javascript, */*; q=0.01",
          referer: `${origin}/search`,
          "x-requested-with": "XMLHttpRequest",
        },
      });
      const durationMs = stopTimer();
      if (response.status !== 200) {
        await response.body?.cancel();
        logger.error("listing_bad_status", { url: apiUrl, pageIndex, status: response.status, durationMs });
        return [];
      }

      const urls = parseSearchApiResponse(await response.json(), config.baseUrl);
      metrics.incrementCounter("pages_listed", 1);
      logger.info("listing_page_complete", { pageIndex, found: urls.length, durationMs });
      return urls;
    } catch (error) {
      logger.error("listing_fetch_failed", { url: apiUrl, pageIndex, error: errorMessage(error) });
      return [];
    }
  }
}

export function createLocator(deps: LocatorDeps): PresentationLocator {
  return deps.config.listingStrategy === "api" ? new ApiSearchLocator(deps) : new HtmlSearchLocator(deps);
}
