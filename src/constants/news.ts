export const GNEWS_API_BASE = "https://gnews.io/api/v4";
export const GNEWS_API_KEY_ENV = "GNEWS_API_KEY";

export const UPSTREAM_TIMEOUT_MS = 10_000;
export const ERROR_BODY_EXCERPT_LEN = 300;

export const MAX_QUERY_LEN = 300;
export const MIN_ARTICLES = 1;
export const MAX_ARTICLES = 100;
export const DEFAULT_ARTICLES = 10;

// Memory tier
export const SEARCH_CACHE_SIZE = 256;
export const SEARCH_CACHE_TTL_MS = 60_000;
export const HEADLINES_CACHE_SIZE = 64;
export const HEADLINES_CACHE_TTL_MS = 30_000;

// Persistent tier
export const SEARCH_PERSIST_TTL = 60; // seconds
export const HEADLINES_PERSIST_TTL = 30; // seconds

export const SEARCH_CACHE_NAMESPACE = "search";
export const HEADLINES_CACHE_NAMESPACE = "headlines";

export const HEADLINE_CATEGORIES = [
  "general",
  "world",
  "nation",
  "business",
  "technology",
  "entertainment",
  "sports",
  "science",
  "health",
] as const;
