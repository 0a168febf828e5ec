import { AppConfig } from "../config";
import { Logger, MetricsRegistry, errorMessage } from "../observability";
import { HttpSession } from "../session";
import { extractPdfHref } from "./htmlParser";

interface AssetResolverDeps {
  session: HttpSession;
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
}

export class AssetResolver {
  constructor(private readonly deps: AssetResolverDeps) {}

  /** The PDF href of a presentation page, verbatim (relative or absolute), or undefined. */
  async resolvePdfUrl(presentationUrl: string): Promise<string | undefined> {
    const { session, config, logger, metrics } = this.deps;

    let html: string;
    try {
      const response = await session.get(presentationUrl, {
        headers: { accept: "text/html,application/xhtml+xml" },
      });
      if (response.status !== 200) {
        await response.body?.cancel();
        logger.error("resolve_bad_status", { url: presentationUrl, status: response.status });
        return undefined;
      }
      html = await response.text();
    } catch (error) {
      logger.error("resolve_fetch_failed", { url: presentationUrl, error: errorMessage(error) });
      return undefined;
    }

    logger.debug("resolve_page_html", { url: presentationUrl, html: html.slice(0, 2000) });
    const href = extractPdfHref(html, { requireTracking: config.pdfLinkMode === "tracked" });
    if (!href) {
      metrics.incrementCounter("pdf_links_missing", 1);
      logger.warn("resolve_pdf_link_missing", { url: presentationUrl, pdfLinkMode: config.pdfLinkMode });
      return undefined;
    }

    metrics.incrementCounter("pdf_links_resolved", 1);
    logger.info("resolve_pdf_link_found", { url: presentationUrl, pdfUrl: href });
    return href;
  }
}
