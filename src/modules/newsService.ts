import { CachedEntry, NoopPersistentCache, PersistentCache, TtlCache } from "../cache";
import { UpstreamError } from "../errors";
import {
  GNewsEndpoint,
  NormalizedResult,
  QueryParams,
  SearchNewsInput,
  TopHeadlinesInput,
} from "../interfaces/news";
import { logger } from "../logger";
import { GNewsClient } from "./gnewsClient";
import { normalizeArticles } from "./normalize";
import { sanitizeQuery, validateMax } from "./sanitize";
import {
  DEFAULT_ARTICLES,
  HEADLINES_CACHE_NAMESPACE,
  HEADLINES_CACHE_SIZE,
  HEADLINES_CACHE_TTL_MS,
  HEADLINES_PERSIST_TTL,
  SEARCH_CACHE_NAMESPACE,
  SEARCH_CACHE_SIZE,
  SEARCH_CACHE_TTL_MS,
  SEARCH_PERSIST_TTL,
} from "../constants/news";

export type NewsServiceOptions = {
  client: GNewsClient;
  persistentCache?: PersistentCache;
  searchCache?: TtlCache<NormalizedResult>;
  headlineCache?: TtlCache<NormalizedResult>;
  searchPersistTtlSeconds?: number;
  headlinesPersistTtlSeconds?: number;
};

type CacheTier = {
  namespace: string;
  memory: TtlCache<NormalizedResult>;
  persistTtlSeconds: number;
};

export function searchCacheKey(
  q: string,
  lang: string | undefined,
  country: string | undefined,
  max: number,
  inTitle: boolean
): string {
  return JSON.stringify([q, lang ?? null, country ?? null, max, inTitle]);
}

export function headlinesCacheKey(
  lang: string | undefined,
  country: string | undefined,
  category: string | undefined,
  max: number
): string {
  return JSON.stringify([lang ?? null, country ?? null, category ?? null, max]);
}

/**
 * Tool entry points. Owns both memory tiers; the persistent tier is
 * shared with whoever constructed it.
 */
export class NewsService {
  private readonly client: GNewsClient;
  private readonly persistent: PersistentCache;
  private readonly search: CacheTier;
  private readonly headlines: CacheTier;

  constructor(options: NewsServiceOptions) {
    this.client = options.client;
    this.persistent = options.persistentCache ?? new NoopPersistentCache();

    this.search = {
      namespace: SEARCH_CACHE_NAMESPACE,
      memory:
        options.searchCache ??
        new TtlCache({ maxSize: SEARCH_CACHE_SIZE, ttlMs: SEARCH_CACHE_TTL_MS }),
      persistTtlSeconds: options.searchPersistTtlSeconds ?? SEARCH_PERSIST_TTL,
    };

    this.headlines = {
      namespace: HEADLINES_CACHE_NAMESPACE,
      memory:
        options.headlineCache ??
        new TtlCache({ maxSize: HEADLINES_CACHE_SIZE, ttlMs: HEADLINES_CACHE_TTL_MS }),
      persistTtlSeconds:
        options.headlinesPersistTtlSeconds ?? HEADLINES_PERSIST_TTL,
    };
  }

  get persistentCacheKind(): string {
    return this.persistent.kind;
  }

  async searchNews(
    { q, lang, country, max = DEFAULT_ARTICLES, inTitle = false }: SearchNewsInput,
    signal?: AbortSignal
  ): Promise<NormalizedResult> {
    const query = sanitizeQuery(q);
    const limit = validateMax(max);

    const key = searchCacheKey(query, lang, country, limit, inTitle);

    return this.cacheThenFetch(this.search, key, "search", {
      q: query,
      lang,
      country,
      max: limit,
      in: inTitle ? "title" : undefined,
    }, signal);
  }

  async topHeadlines(
    { lang, country, category, max = DEFAULT_ARTICLES }: TopHeadlinesInput,
    signal?: AbortSignal
  ): Promise<NormalizedResult> {
    const limit = validateMax(max);

    const key = headlinesCacheKey(lang, country, category, limit);

    return this.cacheThenFetch(this.headlines, key, "top-headlines", {
      lang,
      country,
      category,
      max: limit,
    }, signal);
  }

  clearMemory(): void {
    this.search.memory.clear();
    this.headlines.memory.clear();
  }

  async close(): Promise<void> {
    await this.persistent.close();
  }

  private async cacheThenFetch(
    tier: CacheTier,
    key: string,
    endpoint: GNewsEndpoint,
    params: QueryParams,
    signal?: AbortSignal
  ): Promise<NormalizedResult> {
    // Callers get copies; stored entries are never handed out
    const inMemory = tier.memory.get(key);
    if (inMemory) {
      logger.debug({ tool: tier.namespace, source: "memory" }, "Serving news from cache");
      return structuredClone(inMemory);
    }

    const persistKey = `${tier.namespace}:${key}`;

    const persisted = await this.readPersistent(persistKey);
    if (persisted) {
      const remainingMs = persisted.expiresAt - Date.now();
      if (remainingMs > 0) {
        logger.debug({ tool: tier.namespace, source: "persistent" }, "Serving news from cache");
        tier.memory.set(key, persisted.value, remainingMs);
        return structuredClone(persisted.value);
      }
    }

    const body = await this.client.fetch(endpoint, params, signal);
    const normalized = normalizeArticles(body);

    // Caller went away; do not store a result nobody asked for
    if (signal?.aborted) {
      throw new UpstreamError("GNews API request aborted", { cause: signal.reason });
    }

    tier.memory.set(key, normalized);
    await this.writePersistent(persistKey, normalized, tier.persistTtlSeconds);

    return structuredClone(normalized);
  }

  private async readPersistent(key: string): Promise<CachedEntry<NormalizedResult> | null> {
    try {
      return await this.persistent.get<NormalizedResult>(key);
    } catch (err) {
      logger.warn({ err, cache: this.persistent.kind }, "Persistent cache read failed, treating as miss");
      return null;
    }
  }

  private async writePersistent(
    key: string,
    value: NormalizedResult,
    ttlSeconds: number
  ): Promise<void> {
    try {
      await this.persistent.set(key, value, ttlSeconds);
    } catch (err) {
      logger.warn({ err, cache: this.persistent.kind }, "Persistent cache write failed");
    }
  }
}
