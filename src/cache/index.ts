import { logger } from "../logger";
import type { AppConfig } from "../config";
import { FilePersistentCache } from "./fileCache";
import { ValkeyPersistentCache } from "./valkeyCache";

export { TtlCache } from "./memoryCache";
export type { TtlCacheOptions } from "./memoryCache";
export { FilePersistentCache } from "./fileCache";
export { ValkeyPersistentCache } from "./valkeyCache";

export type CachedEntry<T> = {
  value: T;
  /** Epoch ms after which the entry must not be served */
  expiresAt: number;
};

/**
 * Second cache tier, shared by both tools. Implementations may throw;
 * callers treat any failure as a miss.
 */
export interface PersistentCache {
  readonly kind: string;
  get<T>(key: string): Promise<CachedEntry<T> | null>;
  set<T>(key: string, value: T, ttlSeconds: number): Promise<void>;
  close(): Promise<void>;
}

/** Used when no persistent tier is configured or it failed to start */
export class NoopPersistentCache implements PersistentCache {
  readonly kind = "none";

  async get<T>(_key: string): Promise<CachedEntry<T> | null> {
    return null;
  }

  async set<T>(_key: string, _value: T, _ttlSeconds: number): Promise<void> {}

  async close(): Promise<void> {}
}

export async function createPersistentCache(
  config: Pick<AppConfig, "cacheDir" | "valkey">
): Promise<PersistentCache> {
  try {
    if (config.cacheDir) {
      const cache = await FilePersistentCache.open(config.cacheDir);
      logger.info({ dir: cache.dir }, "Disk cache enabled");
      return cache;
    }

    if (config.valkey) {
      logger.info(
        { host: config.valkey.host, port: config.valkey.port },
        "Valkey cache enabled"
      );
      return new ValkeyPersistentCache(config.valkey);
    }
  } catch (err) {
    logger.warn({ err }, "Persistent cache unavailable, using memory-only caching");
  }

  return new NoopPersistentCache();
}
