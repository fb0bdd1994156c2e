/**
 * Article shape returned to tool callers.
 * Optional fields are omitted, never null.
 */
export type Article = {
  title: string;
  description?: string;
  url: string;
  source?: string;
  publishedAt?: string;
  image?: string;
};

export type NormalizedResult = {
  total: number;
  articles: Article[];
};

export type GNewsEndpoint = "search" | "top-headlines";

export type QueryValue = string | number | boolean | null | undefined;

export type QueryParams = Record<string, QueryValue>;

export interface SearchNewsInput {
  q: string;
  lang?: string;
  country?: string;
  max?: unknown;
  inTitle?: boolean;
}

export interface TopHeadlinesInput {
  lang?: string;
  country?: string;
  category?: string;
  max?: unknown;
}
