import { UpstreamError } from "../errors";
import { Article, NormalizedResult } from "../interfaces/news";
import { GNewsArticle, GNewsResponseSchema } from "../schemas/gnews.schema";
import { logger } from "../logger";

export function normalizeArticle(raw: GNewsArticle): Article {
  const article: Article = {
    title: raw.title ?? "",
    url: raw.url ?? "",
  };

  const sourceName = raw.source?.name;

  if (raw.description != null) article.description = raw.description;
  if (sourceName != null) article.source = sourceName;
  if (raw.publishedAt != null) article.publishedAt = raw.publishedAt;
  if (raw.image != null) article.image = raw.image;

  return article;
}

/**
 * Maps a GNews response body to the stable result shape.
 * Article order is preserved.
 */
export function normalizeArticles(body: unknown): NormalizedResult {
  const parsed = GNewsResponseSchema.safeParse(body);

  if (!parsed.success) {
    logger.warn(
      { issues: parsed.error.issues },
      "GNews API schema mismatch"
    );
    throw new UpstreamError("GNews API schema mismatch");
  }

  const articles = (parsed.data.articles ?? []).map(normalizeArticle);

  return {
    total: parsed.data.totalArticles ?? articles.length,
    articles,
  };
}
