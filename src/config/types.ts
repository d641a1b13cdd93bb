import { LogLevel } from "../observability/types";

export type LedgerBackend = "json" | "sqlite";

/** How subpage hosts are compared with the page they were found on. */
export type SameSitePolicy = "exact_host" | "include_subdomains";

export interface RetrySettings {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
}

export interface AppConfig {
  baseUrl: string;
  userAgent: string;
  ignoreHttpsErrors: boolean;
  requestTimeoutMs: number;
  downloadConcurrency: number;
  crawlConcurrency: number;
  maxPages: number;
  maxDepth: number;
  contentSelector?: string;
  documentExtensions: string[];
  sameSitePolicy: SameSitePolicy;
  validatePdfSignature: boolean;
  verifyDownloadedFilesOnStartup: boolean;
  retry: RetrySettings;
  outputDir: string;
  ledgerBackend: LedgerBackend;
  ledgerPath: string;
  logLevel: LogLevel;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "retry">> & {
  retry?: Partial<RetrySettings>;
};
