import { LedgerEntry, LedgerStatus } from "../types";

export interface LedgerStats {
  total: number;
  completed: number;
  failed: number;
}

/**
 * Per-URL record of download outcomes. `record` upserts by URL and persists
 * before resolving; concurrent callers are serialized.
 */
export interface DownloadLedger {
  readonly location: string;
  load(): Promise<ReadonlyMap<string, LedgerEntry>>;
  get(url: string): LedgerEntry | undefined;
  entries(status?: LedgerStatus): LedgerEntry[];
  record(entry: LedgerEntry): Promise<void>;
  persist(): Promise<void>;
  stats(): LedgerStats;
  close(): Promise<void>;
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

export function isLedgerStatus(value: unknown): value is LedgerStatus {
  return value === "completed" || value === "failed";
}

export function isLedgerEntry(value: unknown): value is LedgerEntry {
  if (!value || typeof value !== "object") {
    return false;
  }
  const v = value as LedgerEntry;
  return (
    isNonEmptyString(v.url) &&
    isNonEmptyString(v.filename) &&
    isLedgerStatus(v.status) &&
    isNonEmptyString(v.timestamp) &&
    (v.attempts === undefined || Number.isInteger(v.attempts)) &&
    (v.bytes === undefined || Number.isInteger(v.bytes)) &&
    (v.title === undefined || typeof v.title === "string")
  );
}

/** Entries from the first release of the log carried only `url` and `filename`. */
export function isLegacyEntry(value: unknown): value is Pick<LedgerEntry, "url" | "filename"> {
  if (!value || typeof value !== "object") {
    return false;
  }
  const v = value as Partial<LedgerEntry>;
  return isNonEmptyString(v.url) && isNonEmptyString(v.filename) && v.status === undefined;
}
