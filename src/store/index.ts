import { AppConfig } from "../config";
import { Logger } from "../observability";
import { JsonFileLedger } from "./jsonLedger";
import { SqliteLedger } from "./sqliteLedger";
import { DownloadLedger } from "./types";

export function createLedger(config: Pick<AppConfig, "ledgerBackend" | "ledgerPath">, logger?: Logger): DownloadLedger {
  switch (config.ledgerBackend) {
    case "json":
      return new JsonFileLedger(config.ledgerPath, logger);
    case "sqlite":
      return new SqliteLedger(config.ledgerPath);
  }
}

export { InMemoryLedger } from "./memoryLedger";
export { JsonFileLedger } from "./jsonLedger";
export { SqliteLedger } from "./sqliteLedger";
export * from "./types";
