import { load } from "cheerio";

export const SEARCH_CONTENT_SELECTOR = "div#block-tctmd-content";
export const SEARCH_RESULT_SELECTOR = "div.search-page__results";
export const PDF_TRACKING_ATTRIBUTE = "data-feathr-click-track";

export interface SearchPageParse {
  /** False when the page has no main content block at all. */
  hasContent: boolean;
  resultBlocks: number;
  presentationUrls: string[];
}

function normalizeUrl(baseUrl: string, href: string): string | undefined {
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return undefined;
  }
}

/**
 * Collects slide detail-page links from a search results page, one per result block,
 * absolute and de-duplicated in page order.
 */
export function parseSearchResultsHtml(html: string, baseUrl: string): SearchPageParse {
  const $ = load(html);
  const content = $(SEARCH_CONTENT_SELECTOR).first();
  if (content.length === 0) {
    return { hasContent: false, resultBlocks: 0, presentationUrls: [] };
  }

  const blocks = content.find(SEARCH_RESULT_SELECTOR);
  const seen = new Set<string>();
  const presentationUrls: string[] = [];

  blocks.each((_, block) => {
    const link = $(block)
      .find("a[href]")
      .toArray()
      .map((anchor) => normalizeUrl(baseUrl, $(anchor).attr("href") ?? ""))
      .find((url) => url !== undefined && new URL(url).pathname.includes("/slide/"));

    if (link && !seen.has(link)) {
      seen.add(link);
      presentationUrls.push(link);
    }
  });

  return { hasContent: true, resultBlocks: blocks.length, presentationUrls };
}

export interface PdfHrefOptions {
  /** Only accept anchors carrying the download tracking attribute. */
  requireTracking: boolean;
}

/** First anchor whose href ends in `.pdf`, returned exactly as written in the page. */
export function extractPdfHref(html: string, options: PdfHrefOptions): string | undefined {
  const $ = load(html);
  const selector = options.requireTracking ? `a[href$='.pdf'][${PDF_TRACKING_ATTRIBUTE}='true']` : "a[href$='.pdf']";
  return $(selector).first().attr("href");
}
