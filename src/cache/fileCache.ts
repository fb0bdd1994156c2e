import { createHash, randomUUID } from "crypto";
import { mkdir, readFile, rename, unlink, writeFile } from "fs/promises";
import path from "path";
import { logger } from "../logger";
import type { CachedEntry, PersistentCache } from "./index";

function isStoredEntry(raw: unknown): raw is CachedEntry<unknown> {
  return (
    typeof raw === "object" &&
    raw !== null &&
    "expiresAt" in raw &&
    typeof raw.expiresAt === "number" &&
    "value" in raw
  );
}

function isMissing(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    err.code === "ENOENT"
  );
}

/**
 * One JSON file per key under `dir`, named by the SHA-256 of the key.
 */
export class FilePersistentCache implements PersistentCache {
  readonly kind = "file";

  private constructor(readonly dir: string) {}

  static async open(dir: string): Promise<FilePersistentCache> {
    const resolved = path.resolve(dir);
    await mkdir(resolved, { recursive: true });
    return new FilePersistentCache(resolved);
  }

  pathFor(key: string): string {
    const digest = createHash("sha256").update(key).digest("hex");
    return path.join(this.dir, `${digest}.json`);
  }

  async get<T>(key: string): Promise<CachedEntry<T> | null> {
    const file = this.pathFor(key);

    let raw: string;
    try {
      raw = await readFile(file, "utf8");
    } catch (err) {
      if (isMissing(err)) return null;
      throw err;
    }

    let entry: unknown;
    try {
      entry = JSON.parse(raw);
    } catch {
      logger.warn({ file }, "Discarding unreadable cache file");
      await this.removeIfUnchanged(file, raw);
      return null;
    }

    if (!isStoredEntry(entry) || Date.now() >= entry.expiresAt) {
      await this.removeIfUnchanged(file, raw);
      return null;
    }

    return { value: entry.value as T, expiresAt: entry.expiresAt };
  }

  async set<T>(key: string, value: T, ttlSeconds: number): Promise<void> {
    const file = this.pathFor(key);
    const tmp = `${file}.${randomUUID()}.tmp`;
    const entry: CachedEntry<T> = {
      expiresAt: Date.now() + ttlSeconds * 1000,
      value,
    };

    try {
      await writeFile(tmp, JSON.stringify(entry), "utf8");
      await rename(tmp, file);
    } catch (err) {
      await this.remove(tmp);
      throw err;
    }
  }

  async close(): Promise<void> {
    // nothing held open between calls
  }

  /**
   * A concurrent set may have renamed a fresh entry into place since
   * `seen` was read; leave that one alone.
   */
  private async removeIfUnchanged(file: string, seen: string): Promise<void> {
    let current: string;
    try {
      current = await readFile(file, "utf8");
    } catch (err) {
      if (!isMissing(err)) {
        logger.warn({ err, file }, "Failed to re-read cache file");
      }
      return;
    }
    if (current === seen) await this.remove(file);
  }

  private async remove(file: string): Promise<void> {
    try {
      await unlink(file);
    } catch (err) {
      if (!isMissing(err)) {
        logger.warn({ err, file }, "Failed to remove cache file");
      }
    }
  }
}
