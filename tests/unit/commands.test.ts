import fs from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, it } from "@jest/globals";
import { AppConfig, DEFAULT_CONFIG } from "../../src/config";
import { CommandContext, formatRunReport, runPipeline, runRetryFailed, runStatus } from "../../src/core/commands";
import { RootUnreachableError } from "../../src/core/errors";
import { FileSystemStorage, shortHash } from "../../src/download";
import { MetricsRegistry } from "../../src/observability";
import { JsonFileLedger } from "../../src/store";
import { archivePage, createFakeSite, FAST_RETRY, FakeSite, pdf, quietLogger } from "../helpers/fakeSite";
import { makeTempDir, removeTempDirs } from "../helpers/tempDir";

const ROOT = "https://site.test/archive/";
const FEB_D1 = "https://site.test/archive/feb/d1.pdf";
const NOV_D1 = "https://site.test/archive/nov/d1.pdf";
const BROKEN = "https://site.test/archive/feb/broken.pdf";

function archiveSite(): FakeSite {
  return createFakeSite({
    [ROOT]: archivePage(["feb/", "nov/"]),
    "https://site.test/archive/feb/": archivePage(["d1.pdf", "broken.pdf"]),
    "https://site.test/archive/nov/": archivePage(["d1.pdf"]),
    [FEB_D1]: pdf("feb"),
    [NOV_D1]: pdf("nov"),
    [BROKEN]: { status: 500 },
  });
}

function buildContext(site: FakeSite, root = makeTempDir()): CommandContext {
  const config: AppConfig = {
    ...DEFAULT_CONFIG,
    baseUrl: ROOT,
    outputDir: path.join(root, "pdfs"),
    ledgerPath: path.join(root, "download_log.json"),
    downloadConcurrency: 2,
    retry: FAST_RETRY,
  };
  return {
    runId: "test-run",
    config,
    ledger: new JsonFileLedger(config.ledgerPath),
    storage: new FileSystemStorage(config.outputDir),
    logger: quietLogger(),
    metrics: new MetricsRegistry(),
    httpFetch: site.httpFetch,
  };
}

afterEach(() => {
  removeTempDirs();
});

describe("runPipeline", () => {
  it("crawls the archive and downloads every document it finds", async () => {
    const site = archiveSite();
    const ctx = buildContext(site);

    const report = await runPipeline(ctx);

    expect(report).toEqual({
      documentsDiscovered: 3,
      pagesVisited: 3,
      pagesFailed: 0,
      succeeded: 2,
      failed: 1,
      skipped: 0,
      cancelled: 0,
      failedUrls: [BROKEN],
    });
    expect(fs.readdirSync(ctx.config.outputDir).sort()).toEqual([`d1-${shortHash(NOV_D1)}.pdf`, "d1.pdf"].sort());
  });

  it("skips everything already downloaded on the next run", async () => {
    const site = archiveSite();
    const root = makeTempDir();
    await runPipeline(buildContext(site, root));

    const report = await runPipeline(buildContext(site, root));

    expect(report.skipped).toBe(2);
    expect(report.succeeded).toBe(0);
    expect(report.failedUrls).toEqual([BROKEN]);
    expect(site.callsFor(FEB_D1)).toBe(1);
  });

  it("limits the run to the first documents by URL", async () => {
    const site = archiveSite();
    const ctx = buildContext(site);

    const report = await runPipeline(ctx, { maxDocs: 2 });

    expect(report.documentsDiscovered).toBe(3);
    expect(report.failedUrls).toEqual([BROKEN]);
    expect(report.succeeded).toBe(1);
    expect(site.callsFor(NOV_D1)).toBe(0);
  });

  it("fails when the archive root cannot be reached", async () => {
    const site = createFakeSite({ [ROOT]: { status: 503 } });

    await expect(runPipeline(buildContext(site))).rejects.toBeInstanceOf(RootUnreachableError);
  });
});

describe("runRetryFailed", () => {
  it("downloads only what the ledger has as failed", async () => {
    const site = archiveSite();
    const root = makeTempDir();
    await runPipeline(buildContext(site, root));
    site.routes[BROKEN] = pdf("fixed");

    const report = await runRetryFailed(buildContext(site, root));

    expect(report).toEqual({
      documentsDiscovered: 1,
      pagesVisited: 0,
      pagesFailed: 0,
      succeeded: 1,
      failed: 0,
      skipped: 0,
      cancelled: 0,
      failedUrls: [],
    });
    expect(site.callsFor(ROOT)).toBe(1);
    expect(fs.readFileSync(path.join(root, "pdfs", "broken.pdf"), "utf-8")).toBe("%PDF-1.4\n% fixed\n%%EOF\n");
  });
});

describe("runStatus", () => {
  it("summarizes the ledger", async () => {
    const site = archiveSite();
    const root = makeTempDir();
    await runPipeline(buildContext(site, root));

    const status = await runStatus(buildContext(site, root));

    expect(status).toEqual({ total: 3, completed: 2, failed: 1, failedUrls: [BROKEN] });
  });
});

describe("formatRunReport", () => {
  it("renders counts and failed URLs", () => {
    const text = formatRunReport({
      documentsDiscovered: 3,
      pagesVisited: 3,
      pagesFailed: 1,
      succeeded: 1,
      failed: 1,
      skipped: 1,
      cancelled: 0,
      failedUrls: [BROKEN],
    });

    expect(text.split("\n")).toEqual([
      "documents discovered: 3",
      "pages visited:        3 (1 failed)",
      "downloaded:           1",
      "failed:               1",
      "already downloaded:   1",
      "not started:          0",
      "failed URLs:",
      `  ${BROKEN}`,
    ]);
  });
});
