import { PersistenceError } from "../core/errors";
import { LedgerEntry, LedgerStatus } from "../types";
import { DownloadLedger, LedgerStats } from "./types";

export abstract class BaseLedger implements DownloadLedger {
  protected readonly byUrl = new Map<string, LedgerEntry>();
  private readonly urlByFilename = new Map<string, string>();

  abstract readonly location: string;
  abstract load(): Promise<ReadonlyMap<string, LedgerEntry>>;
  abstract record(entry: LedgerEntry): Promise<void>;
  abstract persist(): Promise<void>;
  abstract close(): Promise<void>;

  get(url: string): LedgerEntry | undefined {
    return this.byUrl.get(url);
  }

  entries(status?: LedgerStatus): LedgerEntry[] {
    const all = [...this.byUrl.values()];
    return status ? all.filter((entry) => entry.status === status) : all;
  }

  stats(): LedgerStats {
    let completed = 0;
    let failed = 0;
    for (const entry of this.byUrl.values()) {
      if (entry.status === "completed") {
        completed += 1;
      } else {
        failed += 1;
      }
    }
    return { total: this.byUrl.size, completed, failed };
  }

  /** Applies an upsert to the in-memory view; last write for a URL wins. */
  protected apply(entry: LedgerEntry): void {
    const owner = this.urlByFilename.get(entry.filename.toLowerCase());
    if (owner !== undefined && owner !== entry.url) {
      throw new PersistenceError(`filename ${entry.filename} is already recorded for ${owner}`);
    }

    const previous = this.byUrl.get(entry.url);
    if (previous && previous.filename.toLowerCase() !== entry.filename.toLowerCase()) {
      this.urlByFilename.delete(previous.filename.toLowerCase());
    }
    this.byUrl.set(entry.url, { ...entry });
    this.urlByFilename.set(entry.filename.toLowerCase(), entry.url);
  }

  protected reset(): void {
    this.byUrl.clear();
    this.urlByFilename.clear();
  }
}
