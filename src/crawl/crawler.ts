import { AppConfig } from "../config";
import { processWithConcurrency } from "../core/concurrency";
import { ParseError, RootUnreachableError } from "../core/errors";
import { Fetcher } from "../core/fetcher";
import { Logger, MetricsRegistry } from "../observability";
import { CrawlResult, DocumentLink, FailedPage } from "../types";
import { createSameSitePredicate, DiscoveredLinks, discoverLinks, DiscoverOptions, normalizeUrl } from "./htmlParser";

export type CrawlSettings = Pick<
  AppConfig,
  "crawlConcurrency" | "maxPages" | "maxDepth" | "contentSelector" | "documentExtensions" | "sameSitePolicy"
>;

export interface CrawlDependencies {
  config: CrawlSettings;
  fetcher: Fetcher;
  logger: Logger;
  metrics: MetricsRegistry;
  signal?: AbortSignal;
}

interface PendingPage {
  url: string;
  depth: number;
}

/**
 * Breadth-first walk of the archive from `rootUrl`. Pages are marked visited
 * when queued, so each one is fetched at most once even when links form cycles.
 */
export async function crawlSite(deps: CrawlDependencies, rootUrl: string): Promise<CrawlResult> {
  const { config, fetcher, logger, metrics, signal } = deps;
  const rootKey = normalizeUrl(rootUrl, rootUrl) ?? rootUrl;
  const discoverOptions: DiscoverOptions = {
    contentSelector: config.contentSelector,
    documentExtensions: config.documentExtensions,
    isSameSite: createSameSitePredicate(config.sameSitePolicy),
  };

  const visited = new Set<string>([rootKey]);
  const documents = new Map<string, DocumentLink>();
  const pagesVisited: string[] = [];
  const failedPages: FailedPage[] = [];
  let frontier: PendingPage[] = [{ url: rootKey, depth: 0 }];
  let maxPagesLogged = false;

  logger.info("crawl_start", { pageUrl: rootKey, maxDepth: config.maxDepth, maxPages: config.maxPages });

  while (frontier.length > 0 && !signal?.aborted) {
    const nextFrontier: PendingPage[] = [];

    await processWithConcurrency(
      frontier,
      { concurrency: config.crawlConcurrency, shouldContinue: () => !signal?.aborted },
      async (page) => {
        logger.debug("crawl_page_start", { pageUrl: page.url, depth: page.depth });
        const stopTimer = metrics.startTimer("page_fetch_ms");
        const result = await fetcher.fetch(page.url, { accept: "text/html,application/xhtml+xml", signal });
        const durationMs = stopTimer();

        if (!result.ok) {
          if (page.url === rootKey && result.error.code !== "aborted") {
            throw new RootUnreachableError(rootKey, result.error);
          }
          if (result.error.code !== "aborted") {
            metrics.incrementCounter("pages_failed", 1);
            failedPages.push({ url: page.url, error: result.error.message });
            logger.error("crawl_page_fetch_failed", {
              pageUrl: page.url,
              attempt: result.attempts,
              error: result.error.message,
            });
          }
          return;
        }

        metrics.incrementCounter("pages_crawled", 1);
        pagesVisited.push(page.url);

        // Relative links resolve against where a redirect landed.
        const baseUrl = normalizeUrl(result.finalUrl, page.url) ?? page.url;
        if (baseUrl !== page.url) {
          logger.debug("crawl_page_redirected", { pageUrl: page.url, finalUrl: baseUrl });
          visited.add(baseUrl);
        }

        let discovered: DiscoveredLinks;
        try {
          discovered = discoverLinks(result.body.toString("utf-8"), baseUrl, discoverOptions);
        } catch (error) {
          if (!(error instanceof ParseError)) {
            throw error;
          }
          logger.warn("crawl_page_parse_failed", { pageUrl: page.url, error: error.message });
          return;
        }

        let newDocuments = 0;
        for (const link of discovered.documents) {
          if (!documents.has(link.url)) {
            documents.set(link.url, link);
            newDocuments += 1;
          }
        }
        metrics.incrementCounter("docs_discovered", newDocuments);

        let queued = 0;
        if (page.depth < config.maxDepth) {
          for (const subpage of discovered.subpages) {
            if (visited.has(subpage)) {
              continue;
            }
            if (visited.size >= config.maxPages) {
              if (!maxPagesLogged) {
                logger.warn("crawl_max_pages_reached", { maxPages: config.maxPages });
                maxPagesLogged = true;
              }
              break;
            }
            visited.add(subpage);
            nextFrontier.push({ url: subpage, depth: page.depth + 1 });
            queued += 1;
          }
        }

        logger.info("crawl_page_complete", {
          pageUrl: page.url,
          depth: page.depth,
          documentsOnPage: discovered.documents.length,
          newDocuments,
          subpagesQueued: queued,
          durationMs,
        });
      },
    );

    frontier = nextFrontier;
  }

  if (signal?.aborted) {
    logger.warn("crawl_aborted", { pagesVisited: pagesVisited.length, pendingPages: frontier.length });
  }

  const result: CrawlResult = {
    documents: [...documents.values()],
    pagesVisited,
    failedPages,
  };
  logger.info("crawl_finished", {
    documentsDiscovered: result.documents.length,
    pagesVisited: pagesVisited.length,
    pagesFailed: failedPages.length,
  });
  return result;
}
