export { crawlSite } from "./crawler";
export type { CrawlDependencies, CrawlSettings } from "./crawler";
export { createSameSitePredicate, discoverLinks, normalizeUrl } from "./htmlParser";
export type { DiscoveredLinks, DiscoverOptions, SameSitePredicate } from "./htmlParser";
