import { load } from "cheerio";

export type LoginMarkerMatch = "root_class" | "page_source" | "none";

/**
 * Looks for the class the site adds to an authenticated page, first on `<html>`/`<body>`,
 * then anywhere in the raw source.
 */
export function findLoginMarker(html: string, marker: string): LoginMarkerMatch {
  const $ = load(html);
  if ($("html").hasClass(marker) || $("body").hasClass(marker)) {
    return "root_class";
  }
  if (html.includes(marker)) {
    return "page_source";
  }
  return "none";
}
