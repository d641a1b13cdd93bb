import crypto from "node:crypto";
import { processWithConcurrency } from "../core/concurrency";
import { errorMessage } from "../core/errors";
import { Fetcher } from "../core/fetcher";
import { Logger, MetricsRegistry } from "../observability";
import { DownloadLedger } from "../store";
import { DocumentLink, DownloadProgress, DownloadSummary, DownloadTask } from "../types";
import { FilenameRegistry } from "./filenameRegistry";
import { DocumentStorage } from "./storage";

export interface DownloadManagerDeps {
  fetcher: Fetcher;
  ledger: DownloadLedger;
  storage: DocumentStorage;
  logger: Logger;
  metrics: MetricsRegistry;
  validatePdfSignature?: boolean;
  verifyDownloadedFiles?: boolean;
  now?: () => Date;
}

export interface DownloadRunOptions {
  concurrency: number;
  signal?: AbortSignal;
  /** Download again even when the ledger already has the URL as completed. */
  force?: boolean;
  onProgress?: (progress: DownloadProgress) => void;
}

type TaskOutcome = "succeeded" | "failed" | "cancelled";

interface PlannedTask {
  task: DownloadTask;
  link: DocumentLink;
}

const PDF_SIGNATURE = "%PDF-";
const SIGNATURE_WINDOW = 1024;

export class DownloadManager {
  private readonly deps: DownloadManagerDeps;
  private readonly registry = new FilenameRegistry();
  private readonly now: () => Date;
  private prepared = false;
  private progress: DownloadProgress = { total: 0, completed: 0, remaining: 0, succeeded: 0, failed: 0 };

  constructor(deps: DownloadManagerDeps) {
    this.deps = deps;
    this.now = deps.now ?? (() => new Date());
  }

  getProgress(): DownloadProgress {
    return { ...this.progress };
  }

  /** Loads the ledger and claims every filename already in use, in the ledger or on disk. */
  async prepare(): Promise<void> {
    if (this.prepared) {
      return;
    }
    const { ledger, storage, logger } = this.deps;

    const entries = await ledger.load();
    for (const entry of entries.values()) {
      this.registry.bind(entry.url, entry.filename);
    }
    const existingFiles = await storage.list();
    for (const filename of existingFiles) {
      this.registry.reserve(filename);
    }

    logger.info("download_prepared", {
      ledgerEntries: entries.size,
      existingFiles: existingFiles.length,
      outputDir: storage.root,
    });
    this.prepared = true;
  }

  async run(links: readonly DocumentLink[], options: DownloadRunOptions): Promise<DownloadSummary> {
    await this.prepare();
    const { logger, metrics } = this.deps;

    const unique = new Map<string, DocumentLink>();
    for (const link of links) {
      if (!unique.has(link.url)) {
        unique.set(link.url, link);
      }
    }
    // Sorted so that filename assignment does not depend on discovery order.
    const ordered = [...unique.values()].sort((a, b) => (a.url < b.url ? -1 : a.url > b.url ? 1 : 0));

    let skipped = 0;
    const planned: PlannedTask[] = [];
    for (const link of ordered) {
      if (!options.force && (await this.isAlreadyDownloaded(link.url))) {
        skipped += 1;
        continue;
      }
      planned.push({
        link,
        task: { url: link.url, targetFilename: this.registry.assign(link.url), attemptCount: 0 },
      });
    }

    metrics.incrementCounter("downloads_skipped", skipped);
    this.progress = { total: planned.length, completed: 0, remaining: planned.length, succeeded: 0, failed: 0 };
    logger.info("download_start", {
      total: ordered.length,
      pending: planned.length,
      skipped,
      concurrency: options.concurrency,
    });

    const stopController = new AbortController();
    const forwardAbort = () => stopController.abort();
    if (options.signal?.aborted) {
      stopController.abort();
    }
    options.signal?.addEventListener("abort", forwardAbort, { once: true });

    const halted: { error?: Error } = {};
    const failedUrls: string[] = [];
    let cancelled = 0;

    let started: number;
    try {
      started = await processWithConcurrency(
        planned,
        { concurrency: options.concurrency, shouldContinue: () => !stopController.signal.aborted },
        async ({ task, link }) => {
          let outcome: TaskOutcome;
          try {
            outcome = await this.runTask(task, link, stopController.signal);
          } catch (error) {
            halted.error ??= error instanceof Error ? error : new Error(String(error));
            logger.error("download_fatal", { url: task.url, filename: task.targetFilename, error: errorMessage(error) });
            stopController.abort();
            return;
          }

          if (outcome === "cancelled") {
            cancelled += 1;
            return;
          }
          if (outcome === "failed") {
            failedUrls.push(task.url);
          }
          this.advanceProgress(outcome, options.onProgress);
        },
      );
    } finally {
      options.signal?.removeEventListener("abort", forwardAbort);
    }

    if (halted.error) {
      throw halted.error;
    }

    cancelled += planned.length - started;
    if (cancelled > 0) {
      logger.warn("download_aborted", { cancelled, started });
    }

    const summary: DownloadSummary = {
      total: ordered.length,
      succeeded: this.progress.succeeded,
      failed: this.progress.failed,
      skipped,
      cancelled,
      failedUrls: failedUrls.sort(),
    };
    logger.info("download_complete", { ...summary, failedUrls: summary.failedUrls.length });
    return summary;
  }

  private async isAlreadyDownloaded(url: string): Promise<boolean> {
    const entry = this.deps.ledger.get(url);
    if (!entry || entry.status !== "completed") {
      return false;
    }
    if (this.deps.verifyDownloadedFiles === false) {
      return true;
    }

    const size = await this.deps.storage.size(entry.filename);
    if (size === undefined || size === 0) {
      this.deps.logger.warn("download_file_missing_requeued", { url, filename: entry.filename, size });
      return false;
    }
    return true;
  }

  private async runTask(task: DownloadTask, link: DocumentLink, signal: AbortSignal): Promise<TaskOutcome> {
    const { fetcher, ledger, storage, logger, metrics } = this.deps;
    const stopTimer = metrics.startTimer("download_ms");

    const result = await fetcher.fetch(task.url, {
      accept: "application/pdf,*/*",
      signal,
      onAttempt: (attempt) => {
        task.attemptCount = attempt;
        logger.debug("download_item_attempt_start", { url: task.url, filename: task.targetFilename, attempt });
      },
    });
    const durationMs = stopTimer();

    if (!result.ok) {
      if (result.error.code === "aborted") {
        logger.info("download_item_cancelled", { url: task.url, attempt: task.attemptCount });
        return "cancelled";
      }
      await this.recordFailure(task, link, result.error.message);
      logger.warn("download_item_failed", {
        url: task.url,
        filename: task.targetFilename,
        attempt: task.attemptCount,
        durationMs,
        errorCode: result.error.code,
        error: result.error.message,
      });
      return "failed";
    }

    const problem = this.validateBody(task, result.body, result.contentType);
    if (problem) {
      await this.recordFailure(task, link, problem);
      logger.warn("download_item_rejected", { url: task.url, filename: task.targetFilename, error: problem });
      return "failed";
    }

    await storage.write(task.targetFilename, result.body);
    await ledger.record({
      url: task.url,
      filename: task.targetFilename,
      status: "completed",
      timestamp: this.now().toISOString(),
      attempts: task.attemptCount,
      bytes: result.body.length,
      sha256: crypto.createHash("sha256").update(result.body).digest("hex"),
      sourcePage: link.sourcePage,
      ...(link.title ? { title: link.title } : {}),
    });

    logger.info("download_item_ok", {
      url: task.url,
      filename: task.targetFilename,
      attempt: task.attemptCount,
      bytes: result.body.length,
      durationMs,
    });
    return "succeeded";
  }

  private validateBody(task: DownloadTask, body: Buffer, contentType?: string): string | undefined {
    if (body.length === 0) {
      return "empty response body";
    }
    if (
      this.deps.validatePdfSignature &&
      task.targetFilename.toLowerCase().endsWith(".pdf") &&
      body.subarray(0, SIGNATURE_WINDOW).indexOf(PDF_SIGNATURE) === -1
    ) {
      return `response is not a PDF (content-type ${contentType ?? "unknown"})`;
    }
    return undefined;
  }

  private async recordFailure(task: DownloadTask, link: DocumentLink, error: string): Promise<void> {
    await this.deps.ledger.record({
      url: task.url,
      filename: task.targetFilename,
      status: "failed",
      timestamp: this.now().toISOString(),
      attempts: task.attemptCount,
      sourcePage: link.sourcePage,
      ...(link.title ? { title: link.title } : {}),
      error,
    });
  }

  private advanceProgress(
    outcome: Exclude<TaskOutcome, "cancelled">,
    onProgress?: (progress: DownloadProgress) => void,
  ): void {
    const { metrics, logger } = this.deps;
    this.progress.completed += 1;
    this.progress.remaining = Math.max(this.progress.total - this.progress.completed, 0);
    if (outcome === "succeeded") {
      this.progress.succeeded += 1;
      metrics.incrementCounter("downloads_ok", 1);
    } else {
      this.progress.failed += 1;
      metrics.incrementCounter("downloads_failed", 1);
    }

    logger.debug("download_progress", { ...this.progress });
    onProgress?.(this.getProgress());
  }
}
