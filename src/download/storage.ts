import fs from "node:fs";
import path from "node:path";
import { PersistenceError, errorMessage } from "../core/errors";

/** Where downloaded documents land. Names are claimed before `write` is called. */
export interface DocumentStorage {
  readonly root: string;
  ensureReady(): Promise<void>;
  list(): Promise<string[]>;
  size(filename: string): Promise<number | undefined>;
  write(filename: string, body: Buffer): Promise<void>;
}

export const PART_SUFFIX = ".part";

export class FileSystemStorage implements DocumentStorage {
  readonly root: string;

  constructor(outputDir: string) {
    this.root = path.resolve(outputDir);
  }

  async ensureReady(): Promise<void> {
    try {
      await fs.promises.mkdir(this.root, { recursive: true });
    } catch (error) {
      throw new PersistenceError(`cannot create output directory ${this.root}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  async list(): Promise<string[]> {
    let names: string[];
    try {
      names = await fs.promises.readdir(this.root);
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw new PersistenceError(`cannot list ${this.root}: ${errorMessage(error)}`, { cause: error });
    }
    return names.filter((name) => !name.endsWith(PART_SUFFIX)).sort();
  }

  async size(filename: string): Promise<number | undefined> {
    try {
      const stat = await fs.promises.stat(this.resolve(filename));
      return stat.isFile() ? stat.size : undefined;
    } catch (error) {
      if (isNotFound(error)) {
        return undefined;
      }
      throw new PersistenceError(`cannot stat ${filename}: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Writes to `<name>.part` and renames into place, so a file under its final
   * name is always complete.
   */
  async write(filename: string, body: Buffer): Promise<void> {
    const finalPath = this.resolve(filename);
    const tempPath = `${finalPath}${PART_SUFFIX}`;

    try {
      await fs.promises.mkdir(path.dirname(finalPath), { recursive: true });
      await fs.promises.writeFile(tempPath, body);
      await fs.promises.rename(tempPath, finalPath);
    } catch (error) {
      await removeQuietly(tempPath);
      throw new PersistenceError(`failed to write ${filename}: ${errorMessage(error)}`, { cause: error });
    }
  }

  private resolve(filename: string): string {
    const resolved = path.resolve(this.root, filename);
    if (path.dirname(resolved) !== this.root) {
      throw new PersistenceError(`refusing to write outside ${this.root}: ${filename}`);
    }
    return resolved;
  }
}

// A failed cleanup must not mask the write error.
async function removeQuietly(filePath: string): Promise<void> {
  try {
    await fs.promises.rm(filePath, { force: true });
  } catch {
    return;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
