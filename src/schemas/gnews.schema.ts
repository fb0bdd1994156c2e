import { z } from "zod";

/**
 * Raw article as sent by GNews. Every field is treated as optional;
 * defaults are applied during normalization.
 */
export const GNewsArticleSchema = z
  .object({
    title: z.string().nullish(),
    description: z.string().nullish(),
    content: z.string().nullish(),
    url: z.string().nullish(),
    image: z.string().nullish(),
    publishedAt: z.string().nullish(),
    source: z
      .object({
        name: z.string().nullish(),
        url: z.string().nullish(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

export const GNewsResponseSchema = z
  .object({
    totalArticles: z.number().int().nullish(),
    articles: z.array(GNewsArticleSchema).nullish(),
  })
  .passthrough();

export type GNewsArticle = z.infer<typeof GNewsArticleSchema>;
export type GNewsResponse = z.infer<typeof GNewsResponseSchema>;
