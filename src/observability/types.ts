export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  url?: string;
  pageUrl?: string;
  filename?: string;
  attempt?: number;
  [key: string]: unknown;
}

export type LogWriter = (level: LogLevel, line: string) => void;

export type MetricCounterName =
  | "pages_crawled"
  | "pages_failed"
  | "docs_discovered"
  | "downloads_ok"
  | "downloads_failed"
  | "downloads_skipped"
  | "fetch_retries";

export type MetricTimerName = "page_fetch_ms" | "download_ms";
