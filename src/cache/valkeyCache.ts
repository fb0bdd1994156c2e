import IORedis, { RedisOptions } from "ioredis";
import { logger } from "../logger";
import type { ValkeyConfig } from "../config";
import type { CachedEntry, PersistentCache } from "./index";

const KEY_PREFIX = "gnews:";

/**
 * Valkey/Redis-backed persistent tier. Reads miss and writes are
 * skipped while the connection is down.
 */
export class ValkeyPersistentCache implements PersistentCache {
  readonly kind = "valkey";

  private readonly redis: IORedis;
  private isShuttingDown = false;
  private isCacheAvailable = false;

  constructor(config: ValkeyConfig) {
    const redisOpts: RedisOptions = {
      host: config.host,
      port: config.port,
      password: config.password,
      retryStrategy: () => (this.isShuttingDown ? null : 5000),
      maxRetriesPerRequest: null,
      enableReadyCheck: true,
      lazyConnect: false,
    };

    this.redis = new IORedis(redisOpts);

    this.redis.on("connect", () => {
      if (!this.isCacheAvailable) {
        this.isCacheAvailable = true;
        logger.info("Valkey connected");
      }
    });

    this.redis.on("error", (err: Error) => {
      if (this.isCacheAvailable) {
        this.isCacheAvailable = false;
        logger.warn({ err: err.message }, "Valkey unavailable, running without persistent cache");
      }
    });

    this.redis.on("close", () => {
      if (this.isCacheAvailable) {
        this.isCacheAvailable = false;
        logger.warn("Valkey connection closed");
      }
    });
  }

  available(): boolean {
    return this.isCacheAvailable;
  }

  async get<T>(key: string): Promise<CachedEntry<T> | null> {
    if (!this.isCacheAvailable) return null;

    const [raw, pttl] = await Promise.all([
      this.redis.get(KEY_PREFIX + key),
      this.redis.pttl(KEY_PREFIX + key),
    ]);
    // -2: gone between the two commands; -1: no expiry set
    if (!raw || pttl === -2) return null;

    return {
      value: JSON.parse(raw) as T,
      expiresAt: pttl >= 0 ? Date.now() + pttl : Number.POSITIVE_INFINITY,
    };
  }

  async set<T>(key: string, value: T, ttlSeconds: number): Promise<void> {
    if (!this.isCacheAvailable) return;

    await this.redis.set(KEY_PREFIX + key, JSON.stringify(value), "EX", ttlSeconds);
  }

  async close(): Promise<void> {
    this.isShuttingDown = true;
    this.isCacheAvailable = false;
    this.redis.disconnect();
  }
}
