import { AppConfig } from "../config";
import { crawlSite } from "../crawl";
import { DocumentStorage, DownloadManager } from "../download";
import { Logger, MetricsRegistry } from "../observability";
import { DownloadLedger, LedgerStats } from "../store";
import { CrawlResult, DocumentLink, DownloadSummary, RunReport } from "../types";
import { HttpFetch } from "./fetch";
import { Fetcher } from "./fetcher";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  ledger: DownloadLedger;
  storage: DocumentStorage;
  logger: Logger;
  metrics: MetricsRegistry;
  signal?: AbortSignal;
  httpFetch?: HttpFetch;
}

export interface PipelineOptions {
  force?: boolean;
  maxDocs?: number;
}

export interface StatusReport extends LedgerStats {
  failedUrls: string[];
}

const PROGRESS_LOG_EVERY = 10;

export function createFetcher(ctx: CommandContext): Fetcher {
  return new Fetcher({
    userAgent: ctx.config.userAgent,
    timeoutMs: ctx.config.requestTimeoutMs,
    retryPolicy: ctx.config.retry,
    ignoreHttpsErrors: ctx.config.ignoreHttpsErrors,
    logger: ctx.logger.child("fetcher"),
    metrics: ctx.metrics,
    httpFetch: ctx.httpFetch,
  });
}

export async function runCrawl(ctx: CommandContext, fetcher = createFetcher(ctx)): Promise<CrawlResult> {
  return crawlSite(
    {
      config: ctx.config,
      fetcher,
      logger: ctx.logger.child("crawl"),
      metrics: ctx.metrics,
      signal: ctx.signal,
    },
    ctx.config.baseUrl,
  );
}

export async function runDownload(
  ctx: CommandContext,
  links: readonly DocumentLink[],
  options: PipelineOptions = {},
  fetcher = createFetcher(ctx),
): Promise<DownloadSummary> {
  await ctx.storage.ensureReady();
  const logger = ctx.logger.child("download");
  const manager = new DownloadManager({
    fetcher,
    ledger: ctx.ledger,
    storage: ctx.storage,
    logger,
    metrics: ctx.metrics,
    validatePdfSignature: ctx.config.validatePdfSignature,
    verifyDownloadedFiles: ctx.config.verifyDownloadedFilesOnStartup,
  });

  const selected =
    options.maxDocs !== undefined ? [...links].sort((a, b) => a.url.localeCompare(b.url)).slice(0, options.maxDocs) : links;

  return manager.run(selected, {
    concurrency: ctx.config.downloadConcurrency,
    signal: ctx.signal,
    force: options.force,
    onProgress: (progress) => {
      if (progress.completed % PROGRESS_LOG_EVERY === 0 || progress.remaining === 0) {
        logger.info("download_progress", { ...progress });
      }
    },
  });
}

export function buildRunReport(crawl: CrawlResult | undefined, summary: DownloadSummary): RunReport {
  return {
    documentsDiscovered: crawl ? crawl.documents.length : summary.total,
    pagesVisited: crawl ? crawl.pagesVisited.length : 0,
    pagesFailed: crawl ? crawl.failedPages.length : 0,
    succeeded: summary.succeeded,
    failed: summary.failed,
    skipped: summary.skipped,
    cancelled: summary.cancelled,
    failedUrls: summary.failedUrls,
  };
}

function logReport(logger: Logger, report: RunReport): void {
  logger.info("run_report", { ...report, failedUrls: report.failedUrls.length });
  for (const url of report.failedUrls) {
    logger.warn("run_failed_url", { url });
  }
}

/** Crawl the archive, then download every document the ledger does not already hold. */
export async function runPipeline(ctx: CommandContext, options: PipelineOptions = {}): Promise<RunReport> {
  ctx.logger.info("pipeline_start", { baseUrl: ctx.config.baseUrl, ...options });
  const fetcher = createFetcher(ctx);

  const crawl = await runCrawl(ctx, fetcher);
  const summary = await runDownload(ctx, crawl.documents, options, fetcher);
  const report = buildRunReport(crawl, summary);

  logReport(ctx.logger, report);
  return report;
}

/** Re-dispatches only the URLs the ledger has as failed; no crawl. */
export async function runRetryFailed(ctx: CommandContext, options: PipelineOptions = {}): Promise<RunReport> {
  await ctx.ledger.load();
  const links: DocumentLink[] = ctx.ledger.entries("failed").map((entry) => ({
    url: entry.url,
    sourcePage: entry.sourcePage ?? entry.url,
    ...(entry.title ? { title: entry.title } : {}),
  }));
  ctx.logger.info("retry_failed_start", { failed: links.length });

  const summary = await runDownload(ctx, links, options);
  const report = buildRunReport(undefined, summary);
  logReport(ctx.logger, report);
  return report;
}

export async function runStatus(ctx: CommandContext): Promise<StatusReport> {
  await ctx.ledger.load();
  const report: StatusReport = {
    ...ctx.ledger.stats(),
    failedUrls: ctx.ledger
      .entries("failed")
      .map((entry) => entry.url)
      .sort(),
  };
  ctx.logger.info("status_complete", { ...report, ledger: ctx.ledger.location });
  return report;
}

export function formatRunReport(report: RunReport): string {
  const lines = [
    `documents discovered: ${report.documentsDiscovered}`,
    `pages visited:        ${report.pagesVisited} (${report.pagesFailed} failed)`,
    `downloaded:           ${report.succeeded}`,
    `failed:               ${report.failed}`,
    `already downloaded:   ${report.skipped}`,
    `not started:          ${report.cancelled}`,
  ];
  if (report.failedUrls.length > 0) {
    lines.push("failed URLs:", ...report.failedUrls.map((url) => `  ${url}`));
  }
  return lines.join("\n");
}
