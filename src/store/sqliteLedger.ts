import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { PersistenceError, errorMessage } from "../core/errors";
import { LedgerEntry } from "../types";
import { BaseLedger } from "./baseLedger";
import { isLedgerStatus } from "./types";

type LedgerRow = {
  url: string;
  filename: string;
  status: string;
  timestamp: string;
  attempts: number | null;
  bytes: number | null;
  sha256: string | null;
  sourcePage: string | null;
  title: string | null;
  error: string | null;
};

function toRow(entry: LedgerEntry): LedgerRow {
  return {
    url: entry.url,
    filename: entry.filename,
    status: entry.status,
    timestamp: entry.timestamp,
    attempts: entry.attempts ?? null,
    bytes: entry.bytes ?? null,
    sha256: entry.sha256 ?? null,
    sourcePage: entry.sourcePage ?? null,
    title: entry.title ?? null,
    error: entry.error ?? null,
  };
}

function fromRow(row: LedgerRow): LedgerEntry | undefined {
  if (!isLedgerStatus(row.status)) {
    return undefined;
  }
  return {
    url: row.url,
    filename: row.filename,
    status: row.status,
    timestamp: row.timestamp,
    ...(row.attempts !== null ? { attempts: row.attempts } : {}),
    ...(row.bytes !== null ? { bytes: row.bytes } : {}),
    ...(row.sha256 !== null ? { sha256: row.sha256 } : {}),
    ...(row.sourcePage !== null ? { sourcePage: row.sourcePage } : {}),
    ...(row.title !== null ? { title: row.title } : {}),
    ...(row.error !== null ? { error: row.error } : {}),
  };
}

/**
 * Ledger in a SQLite table. Each `record` is one committed upsert, so
 * `persist` has nothing left to flush. `filename` carries a UNIQUE constraint.
 */
export class SqliteLedger extends BaseLedger {
  readonly location: string;
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    super();
    this.location = dbPath === ":memory:" ? dbPath : path.resolve(dbPath);
    this.db = openDatabase(this.location);
  }

  async load(): Promise<ReadonlyMap<string, LedgerEntry>> {
    this.reset();
    const rows = this.db
      .prepare<[], LedgerRow>(
        `
        SELECT url, filename, status, timestamp, attempts, bytes, sha256, sourcePage, title, error
        FROM ledger
        ORDER BY url
      `,
      )
      .all();

    for (const row of rows) {
      const entry = fromRow(row);
      if (entry) {
        this.apply(entry);
      }
    }
    return this.byUrl;
  }

  async record(entry: LedgerEntry): Promise<void> {
    this.apply(entry);
    try {
      this.db
        .prepare<LedgerRow>(
          `
          INSERT INTO ledger (url, filename, status, timestamp, attempts, bytes, sha256, sourcePage, title, error)
          VALUES (@url, @filename, @status, @timestamp, @attempts, @bytes, @sha256, @sourcePage, @title, @error)
          ON CONFLICT(url) DO UPDATE SET
            filename = excluded.filename,
            status = excluded.status,
            timestamp = excluded.timestamp,
            attempts = excluded.attempts,
            bytes = excluded.bytes,
            sha256 = excluded.sha256,
            sourcePage = excluded.sourcePage,
            title = excluded.title,
            error = excluded.error
        `,
        )
        .run(toRow(entry));
    } catch (error) {
      throw new PersistenceError(`failed to record ${entry.url} in ${this.location}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  async persist(): Promise<void> {
    return;
  }

  async close(): Promise<void> {
    this.db.close();
  }
}

function openDatabase(location: string): Database.Database {
  try {
    if (location !== ":memory:") {
      fs.mkdirSync(path.dirname(location), { recursive: true });
    }
    const db = new Database(location);
    db.pragma("journal_mode = WAL");
    db.exec(`
      CREATE TABLE IF NOT EXISTS ledger (
        url TEXT PRIMARY KEY,
        filename TEXT NOT NULL UNIQUE COLLATE NOCASE,
        status TEXT NOT NULL CHECK (status IN ('completed', 'failed')),
        timestamp TEXT NOT NULL,
        attempts INTEGER,
        bytes INTEGER,
        sha256 TEXT,
        sourcePage TEXT,
        title TEXT,
        error TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_ledger_status ON ledger(status);
    `);
    addMissingColumns(db);
    return db;
  } catch (error) {
    throw new PersistenceError(`cannot open ledger database ${location}: ${errorMessage(error)}`, { cause: error });
  }
}

// Databases written before the title column existed.
function addMissingColumns(db: Database.Database): void {
  const columns = db.prepare<[], { name: string }>("PRAGMA table_info(ledger)").all();
  if (!columns.some((column) => column.name === "title")) {
    db.exec("ALTER TABLE ledger ADD COLUMN title TEXT");
  }
}
