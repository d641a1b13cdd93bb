import crypto from "node:crypto";

/** `harvest-20240217T120000Z-1a2b3c`: sortable by start time, unique per process start. */
export function createRunId(now = new Date()): string {
  const stamp = now.toISOString().replace(/[-:]/g, "").replace(/\.\d+Z$/, "Z");
  return `harvest-${stamp}-${crypto.randomBytes(3).toString("hex")}`;
}
