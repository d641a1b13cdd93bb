export interface DocumentLink {
  url: string;
  sourcePage: string;
  title?: string;
}

export interface DownloadTask {
  url: string;
  targetFilename: string;
  attemptCount: number;
}

export type LedgerStatus = "completed" | "failed";

export interface LedgerEntry {
  url: string;
  filename: string;
  status: LedgerStatus;
  timestamp: string;
  attempts?: number;
  bytes?: number;
  sha256?: string;
  sourcePage?: string;
  title?: string;
  error?: string;
}

export interface FailedPage {
  url: string;
  error: string;
}

export interface CrawlResult {
  documents: DocumentLink[];
  pagesVisited: string[];
  failedPages: FailedPage[];
}

export interface DownloadSummary {
  total: number;
  succeeded: number;
  failed: number;
  skipped: number;
  cancelled: number;
  failedUrls: string[];
}

export interface DownloadProgress {
  total: number;
  completed: number;
  remaining: number;
  succeeded: number;
  failed: number;
}

export interface RunReport {
  documentsDiscovered: number;
  pagesVisited: number;
  pagesFailed: number;
  succeeded: number;
  failed: number;
  skipped: number;
  cancelled: number;
  failedUrls: string[];
}
