import fs from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, it } from "@jest/globals";
import { PersistenceError } from "../../src/core/errors";
import { JsonFileLedger } from "../../src/store";
import { LedgerEntry } from "../../src/types";
import { makeTempDir, removeTempDirs } from "../helpers/tempDir";

const COMPLETED: LedgerEntry = {
  url: "https://site.test/b.pdf",
  filename: "b.pdf",
  status: "completed",
  timestamp: "2024-02-17T12:00:00.000Z",
  attempts: 1,
  bytes: 42,
};

const FAILED: LedgerEntry = {
  url: "https://site.test/a.pdf",
  filename: "a.pdf",
  status: "failed",
  timestamp: "2024-02-17T12:00:01.000Z",
  attempts: 5,
  error: "HTTP 503 while fetching https://site.test/a.pdf",
};

function ledgerPath(): string {
  return path.join(makeTempDir(), "download_log.json");
}

afterEach(() => {
  removeTempDirs();
});

describe("JsonFileLedger", () => {
  it("starts empty when the file does not exist", async () => {
    const ledger = new JsonFileLedger(ledgerPath());

    const entries = await ledger.load();

    expect(entries.size).toBe(0);
    expect(ledger.stats()).toEqual({ total: 0, completed: 0, failed: 0 });
  });

  it("treats an empty file as an empty ledger", async () => {
    const file = ledgerPath();
    fs.writeFileSync(file, "  \n");

    const entries = await new JsonFileLedger(file).load();

    expect(entries.size).toBe(0);
  });

  it("persists every record and reloads it in a fresh instance", async () => {
    const file = ledgerPath();
    const ledger = new JsonFileLedger(file);
    await ledger.load();

    await ledger.record(COMPLETED);
    await ledger.record(FAILED);
    await ledger.close();

    const reloaded = new JsonFileLedger(file);
    const entries = await reloaded.load();
    expect(entries.get(COMPLETED.url)).toEqual(COMPLETED);
    expect(entries.get(FAILED.url)).toEqual(FAILED);
    expect(reloaded.stats()).toEqual({ total: 2, completed: 1, failed: 1 });
    expect(reloaded.entries("failed")).toEqual([FAILED]);
  });

  it("writes entries sorted by URL as a pretty JSON array", async () => {
    const file = ledgerPath();
    const ledger = new JsonFileLedger(file);

    await ledger.record(COMPLETED);
    await ledger.record(FAILED);

    expect(fs.readFileSync(file, "utf-8")).toBe(`${JSON.stringify([FAILED, COMPLETED], null, 2)}\n`);
    expect(fs.existsSync(`${file}.tmp`)).toBe(false);
  });

  it("replaces the entry for a URL on a later record", async () => {
    const ledger = new JsonFileLedger(ledgerPath());

    await ledger.record(FAILED);
    await ledger.record({ ...FAILED, status: "completed", error: undefined, bytes: 10 });

    expect(ledger.get(FAILED.url)?.status).toBe("completed");
    expect(ledger.stats()).toEqual({ total: 1, completed: 1, failed: 0 });
  });

  it("keeps every record when many are written at once", async () => {
    const file = ledgerPath();
    const ledger = new JsonFileLedger(file);
    const entries: LedgerEntry[] = Array.from({ length: 20 }, (_, index): LedgerEntry => ({
      url: `https://site.test/doc${String(index).padStart(2, "0")}.pdf`,
      filename: `doc${String(index).padStart(2, "0")}.pdf`,
      status: "completed",
      timestamp: "2024-02-17T12:00:00.000Z",
    }));

    await Promise.all(entries.map((entry) => ledger.record(entry)));
    await ledger.close();

    const onDisk: unknown = JSON.parse(fs.readFileSync(file, "utf-8"));
    expect(onDisk).toEqual(entries);
  });

  it("refuses to give one filename to two URLs", async () => {
    const ledger = new JsonFileLedger(ledgerPath());
    await ledger.record(COMPLETED);

    await expect(ledger.record({ ...COMPLETED, url: "https://site.test/other/b.pdf", filename: "B.pdf" })).rejects.toThrow(
      PersistenceError,
    );
  });

  it("reads legacy url/filename records as completed downloads", async () => {
    const file = ledgerPath();
    fs.writeFileSync(file, JSON.stringify([{ url: "https://site.test/old.pdf", filename: "old.pdf" }]));
    const modified = new Date("2023-11-11T10:00:00.000Z");
    fs.utimesSync(file, modified, modified);

    const entries = await new JsonFileLedger(file).load();

    expect(entries.get("https://site.test/old.pdf")).toEqual({
      url: "https://site.test/old.pdf",
      filename: "old.pdf",
      status: "completed",
      timestamp: "2023-11-11T10:00:00.000Z",
    });
  });

  it("skips records it cannot read and keeps the rest", async () => {
    const file = ledgerPath();
    fs.writeFileSync(file, JSON.stringify([COMPLETED, { url: "https://site.test/x.pdf" }, 7, { ...FAILED, status: "pending" }]));

    const entries = await new JsonFileLedger(file).load();

    expect([...entries.keys()]).toEqual([COMPLETED.url]);
  });

  it("fails to load a file that is not valid JSON and leaves it untouched", async () => {
    const file = ledgerPath();
    fs.writeFileSync(file, "[{ broken");

    await expect(new JsonFileLedger(file).load()).rejects.toThrow(PersistenceError);
    expect(fs.readFileSync(file, "utf-8")).toBe("[{ broken");
  });

  it("fails to load a file that does not hold an array", async () => {
    const file = ledgerPath();
    fs.writeFileSync(file, JSON.stringify({ url: "https://site.test/a.pdf" }));

    await expect(new JsonFileLedger(file).load()).rejects.toThrow(`ledger ${file} must hold a JSON array`);
  });

  it("surfaces a write failure as a PersistenceError", async () => {
    const dir = makeTempDir();
    const blocker = path.join(dir, "not-a-dir");
    fs.writeFileSync(blocker, "");
    const ledger = new JsonFileLedger(path.join(blocker, "download_log.json"));

    await expect(ledger.record(COMPLETED)).rejects.toThrow(PersistenceError);
  });
});
