import fs from "node:fs";
import path from "node:path";
import { PersistenceError, errorMessage } from "../core/errors";
import { Logger } from "../observability";
import { LedgerEntry } from "../types";
import { BaseLedger } from "./baseLedger";
import { isLedgerEntry, isLegacyEntry } from "./types";

/**
 * Ledger kept as a pretty-printed JSON array. Every `record` rewrites the file
 * through a temp file and rename; writes run one at a time on `writeChain`.
 */
export class JsonFileLedger extends BaseLedger {
  readonly location: string;
  private readonly logger?: Logger;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(filePath: string, logger?: Logger) {
    super();
    this.location = path.resolve(filePath);
    this.logger = logger;
  }

  async load(): Promise<ReadonlyMap<string, LedgerEntry>> {
    this.reset();

    let raw: string;
    let modifiedAt: string;
    try {
      raw = await fs.promises.readFile(this.location, "utf-8");
      modifiedAt = (await fs.promises.stat(this.location)).mtime.toISOString();
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return this.byUrl;
      }
      throw new PersistenceError(`cannot read ledger ${this.location}: ${errorMessage(error)}`, { cause: error });
    }

    if (raw.trim() === "") {
      return this.byUrl;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new PersistenceError(`ledger ${this.location} is not valid JSON; refusing to overwrite it`, {
        cause: error,
      });
    }
    if (!Array.isArray(parsed)) {
      throw new PersistenceError(`ledger ${this.location} must hold a JSON array`);
    }

    let skipped = 0;
    for (const item of parsed) {
      if (isLedgerEntry(item)) {
        this.apply(item);
      } else if (isLegacyEntry(item)) {
        this.apply({ url: item.url, filename: item.filename, status: "completed", timestamp: modifiedAt });
      } else {
        skipped += 1;
      }
    }

    if (skipped > 0) {
      this.logger?.warn("ledger_entries_skipped", { ledger: this.location, skipped });
    }
    this.logger?.info("ledger_loaded", { ledger: this.location, entries: this.byUrl.size });
    return this.byUrl;
  }

  async record(entry: LedgerEntry): Promise<void> {
    this.apply(entry);
    await this.persist();
  }

  persist(): Promise<void> {
    const run = this.writeChain.then(() => this.flush());
    // A failed flush must not wedge later writes; the caller of this flush still sees the rejection.
    this.writeChain = run.catch(() => undefined);
    return run;
  }

  async close(): Promise<void> {
    await this.writeChain;
  }

  private async flush(): Promise<void> {
    const entries = [...this.byUrl.values()].sort((a, b) => a.url.localeCompare(b.url));
    const tempPath = `${this.location}.tmp`;

    try {
      await fs.promises.mkdir(path.dirname(this.location), { recursive: true });
      await fs.promises.writeFile(tempPath, `${JSON.stringify(entries, null, 2)}\n`, "utf-8");
      await fs.promises.rename(tempPath, this.location);
    } catch (error) {
      throw new PersistenceError(`failed to persist ledger ${this.location}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
