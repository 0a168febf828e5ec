export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  url?: string;
  pageIndex?: number;
  status?: number;
  attempt?: number;
  [key: string]: unknown;
}

export interface LogRecord extends LogFields {
  ts: string;
  level: LogLevel;
  msg: string;
  component: string;
  runId: string;
}

export type MetricCounterName =
  | "pages_listed"
  | "presentations_found"
  | "pdf_links_resolved"
  | "pdf_links_missing"
  | "downloads_ok"
  | "downloads_failed"
  | "downloads_skipped";

export type MetricTimerName = "page_fetch_ms" | "download_ms" | "login_ms";
