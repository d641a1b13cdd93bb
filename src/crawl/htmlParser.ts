import { load } from "cheerio";
import { SameSitePolicy } from "../config/types";
import { ParseError } from "../core/errors";
import { DocumentLink } from "../types";

export type SameSitePredicate = (candidate: URL, page: URL) => boolean;

export interface DiscoverOptions {
  /** Only anchors inside this container are considered. Missing container is a ParseError. */
  contentSelector?: string;
  documentExtensions: string[];
  isSameSite: SameSitePredicate;
}

export interface DiscoveredLinks {
  documents: DocumentLink[];
  subpages: string[];
}

const PAGE_EXTENSIONS = new Set([".html", ".htm", ".php", ".asp", ".aspx"]);
const DOCUMENT_MIME_TYPES = new Set(["application/pdf"]);

function sanitizeTitle(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

export function normalizeUrl(href: string, baseUrl: string): string | undefined {
  let resolved: URL;
  try {
    resolved = new URL(href.trim(), baseUrl);
  } catch {
    return undefined;
  }
  if (resolved.protocol !== "http:" && resolved.protocol !== "https:") {
    return undefined;
  }
  resolved.hash = "";
  return resolved.toString();
}

function hostWithoutWww(host: string): string {
  return host.toLowerCase().replace(/^www\./, "");
}

export function createSameSitePredicate(policy: SameSitePolicy): SameSitePredicate {
  if (policy === "include_subdomains") {
    return (candidate, page) => {
      const candidateHost = hostWithoutWww(candidate.hostname);
      const pageHost = hostWithoutWww(page.hostname);
      return candidateHost === pageHost || candidateHost.endsWith(`.${pageHost}`);
    };
  }
  return (candidate, page) => candidate.host.toLowerCase() === page.host.toLowerCase();
}

function pathExtension(url: URL): string {
  const lastSegment = url.pathname.split("/").pop() ?? "";
  const dot = lastSegment.lastIndexOf(".");
  return dot > 0 ? lastSegment.slice(dot).toLowerCase() : "";
}

function isDocumentUrl(url: URL, extensions: string[]): boolean {
  const pathname = url.pathname.toLowerCase();
  return extensions.some((extension) => pathname.endsWith(extension.toLowerCase()));
}

function looksLikePage(url: URL): boolean {
  const extension = pathExtension(url);
  return extension === "" || PAGE_EXTENSIONS.has(extension);
}

/**
 * Extracts document links and same-site subpages from one archive page.
 * Pure: no network or disk access.
 */
export function discoverLinks(html: string, pageUrl: string, options: DiscoverOptions): DiscoveredLinks {
  const $ = load(html);
  const page = new URL(pageUrl);
  const pageKey = normalizeUrl(pageUrl, pageUrl);

  // cheerio always wraps fragments in <html>.
  const scope = $(options.contentSelector || "html").first();
  if (scope.length === 0) {
    throw new ParseError(`no element matches ${options.contentSelector}`, pageUrl);
  }

  const documents: DocumentLink[] = [];
  const subpages: string[] = [];
  const seen = new Set<string>();

  scope.find("a[href]").each((_, element) => {
    const anchor = $(element);
    const href = anchor.attr("href");
    if (!href) {
      return;
    }

    const normalized = normalizeUrl(href, pageUrl);
    if (!normalized || normalized === pageKey || seen.has(normalized)) {
      return;
    }

    const target = new URL(normalized);
    const declaredType = (anchor.attr("type") ?? "").trim().toLowerCase();

    if (isDocumentUrl(target, options.documentExtensions) || DOCUMENT_MIME_TYPES.has(declaredType)) {
      seen.add(normalized);
      const title = sanitizeTitle(anchor.text() || anchor.attr("title") || "");
      documents.push({
        url: normalized,
        sourcePage: pageUrl,
        ...(title ? { title } : {}),
      });
      return;
    }

    if (options.isSameSite(target, page) && looksLikePage(target)) {
      seen.add(normalized);
      subpages.push(normalized);
    }
  });

  return { documents, subpages };
}
