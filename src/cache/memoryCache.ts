interface Entry<V> {
  value: V;
  expiresAt: number;
}

export interface TtlCacheOptions {
  maxSize: number;
  ttlMs: number;
}

/**
 * Bounded in-memory cache with a fixed per-entry TTL.
 * Map insertion order doubles as recency order: reads re-insert,
 * and the first key is evicted when full.
 */
export class TtlCache<V> {
  private readonly entries = new Map<string, Entry<V>>();
  readonly maxSize: number;
  readonly ttlMs: number;

  constructor({ maxSize, ttlMs }: TtlCacheOptions) {
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new RangeError("maxSize must be a positive integer");
    }
    if (!(ttlMs > 0)) {
      throw new RangeError("ttlMs must be positive");
    }
    this.maxSize = maxSize;
    this.ttlMs = ttlMs;
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (Date.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }

    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.value;
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  /**
   * `ttlMs` can shorten an entry's lifetime below the cache TTL,
   * never extend it.
   */
  set(key: string, value: V, ttlMs: number = this.ttlMs): void {
    if (this.entries.has(key)) {
      this.entries.delete(key);
    }

    while (this.entries.size >= this.maxSize) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }

    const lifetime = Math.min(ttlMs, this.ttlMs);
    if (!(lifetime > 0)) return;

    this.entries.set(key, { value, expiresAt: Date.now() + lifetime });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  /** Includes entries that have expired but not yet been read */
  get size(): number {
    return this.entries.size;
  }
}
