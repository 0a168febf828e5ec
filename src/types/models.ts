export interface HarvestSummary {
  authenticated: boolean;
  pagesVisited: number;
  presentationsFound: number;
  pdfLinksResolved: number;
  skippedNoPdf: number;
  downloaded: number;
  failed: number;
  stoppedBy: "empty_page" | "max_pages" | "test_mode_limit";
}

export interface ListSummary {
  pageIndex: number;
  presentationUrls: string[];
}
