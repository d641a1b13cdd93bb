import crypto from "node:crypto";
import path from "node:path";

const FALLBACK_BASENAME = "document";
// Filesystems cap a name at 255 bytes; the rest is room for `-<hash>-<n>` and `.part`.
const MAX_BASENAME_BYTES = 223;
const MAX_EXTENSION_BYTES = 10;

export function shortHash(value: string): string {
  return crypto.createHash("sha256").update(value).digest("hex").slice(0, 8);
}

function safeDecode(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/** Longest prefix of `value` that fits in `maxBytes` of UTF-8, cut between code points. */
export function truncateUtf8(value: string, maxBytes: number): string {
  let used = 0;
  let result = "";
  for (const char of value) {
    const size = Buffer.byteLength(char, "utf-8");
    if (used + size > maxBytes) {
      break;
    }
    used += size;
    result += char;
  }
  return result;
}

/**
 * Base filename for a document URL: the last path segment, decoded and
 * stripped of characters that are unsafe on common filesystems.
 */
export function baseFilenameForUrl(url: string, defaultExtension = ".pdf"): string {
  let segment = "";
  try {
    segment = new URL(url).pathname.split("/").filter(Boolean).pop() ?? "";
  } catch {
    segment = "";
  }

  const cleaned = safeDecode(segment)
    .replace(/[\u0000-\u001f<>:"/\\|?*]+/g, "_")
    .replace(/\s+/g, "_")
    .replace(/^\.+/, "")
    .trim();

  const parsed = path.parse(cleaned);
  const hasExtension = parsed.ext !== "" && Buffer.byteLength(parsed.ext, "utf-8") <= MAX_EXTENSION_BYTES;
  const extension = hasExtension ? parsed.ext.toLowerCase() : defaultExtension;
  const stemBudget = MAX_BASENAME_BYTES - Buffer.byteLength(extension, "utf-8");
  const stem = truncateUtf8(hasExtension ? parsed.name : cleaned, stemBudget) || FALLBACK_BASENAME;
  return `${stem}${extension}`;
}

function withSuffix(filename: string, suffix: string): string {
  const parsed = path.parse(filename);
  return `${parsed.name}-${suffix}${parsed.ext}`;
}

/**
 * Assigns every URL a filename no other URL holds for the lifetime of a run.
 * Names are compared case-insensitively so the output directory stays valid
 * on case-folding filesystems.
 */
export class FilenameRegistry {
  private readonly byUrl = new Map<string, string>();
  private readonly claimed = new Set<string>();

  /** Marks a name as taken without tying it to a URL, e.g. a file already on disk. */
  reserve(filename: string): void {
    this.claimed.add(filename.toLowerCase());
  }

  /** Records an existing URL → name binding (from the ledger). */
  bind(url: string, filename: string): void {
    this.byUrl.set(url, filename);
    this.reserve(filename);
  }

  isClaimed(filename: string): boolean {
    return this.claimed.has(filename.toLowerCase());
  }

  assign(url: string, defaultExtension = ".pdf"): string {
    const existing = this.byUrl.get(url);
    if (existing) {
      return existing;
    }

    const base = baseFilenameForUrl(url, defaultExtension);
    let candidate = base;
    if (this.isClaimed(candidate)) {
      candidate = withSuffix(base, shortHash(url));
    }
    for (let counter = 2; this.isClaimed(candidate); counter += 1) {
      candidate = withSuffix(base, `${shortHash(url)}-${counter}`);
    }

    this.bind(url, candidate);
    return candidate;
  }
}
