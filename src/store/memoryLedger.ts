import { LedgerEntry } from "../types";
import { BaseLedger } from "./baseLedger";

/** Keeps entries for the life of the process only. */
export class InMemoryLedger extends BaseLedger {
  readonly location = ":memory:";

  constructor(seed: LedgerEntry[] = []) {
    super();
    for (const entry of seed) {
      this.apply(entry);
    }
  }

  async load(): Promise<ReadonlyMap<string, LedgerEntry>> {
    return this.byUrl;
  }

  async record(entry: LedgerEntry): Promise<void> {
    this.apply(entry);
  }

  async persist(): Promise<void> {
    return;
  }

  async close(): Promise<void> {
    return;
  }
}
