import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { isToolError } from "../errors";
import { NormalizedResult } from "../interfaces/news";
import { logger } from "../logger";
import { NewsService } from "./newsService";
import { HEADLINE_CATEGORIES } from "../constants/news";

export const SERVER_NAME = "gnews";
export const SERVER_VERSION = "1.0.0";

function toResult(result: NormalizedResult): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(result) }],
  };
}

function toErrorResult(tool: string, err: unknown): CallToolResult {
  const message = err instanceof Error ? err.message : String(err);

  if (isToolError(err)) {
    logger.warn({ tool, code: err.code, message }, "Tool call failed");
  } else {
    logger.error({ tool, err }, "Unexpected error in tool call");
  }

  return {
    isError: true,
    content: [{ type: "text", text: message }],
  };
}

/**
 * Builds an MCP server exposing the two GNews tools backed by `service`.
 */
export function createToolServer(service: NewsService): McpServer {
  const server = new McpServer(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { instructions: "MCP server providing GNews Search and Top Headlines tools" }
  );

  server.registerTool(
    "search_news",
    {
      title: "Search news",
      description:
        "Search news articles via GNews. Mirrors https://docs.gnews.io/endpoints/search-endpoint (subset of params).",
      inputSchema: {
        q: z.string().describe("Search query text"),
        lang: z.string().optional().describe("Language code, e.g. 'en'"),
        country: z.string().optional().describe("2-letter country code"),
        max: z.number().optional().describe("Max articles (1-100)"),
        in_title: z.boolean().optional().describe("If true restrict search to titles"),
      },
    },
    async ({ q, lang, country, max, in_title }, extra) => {
      try {
        const result = await service.searchNews(
          { q, lang, country, max, inTitle: in_title },
          extra.signal
        );
        return toResult(result);
      } catch (err) {
        return toErrorResult("search_news", err);
      }
    }
  );

  server.registerTool(
    "top_headlines",
    {
      title: "Top headlines",
      description:
        "Fetch top headlines via GNews. Mirrors https://docs.gnews.io/endpoints/top-headlines-endpoint (subset).",
      inputSchema: {
        lang: z.string().optional().describe("Language code, e.g. 'en'"),
        country: z.string().optional().describe("2-letter country code"),
        category: z
          .string()
          .optional()
          .describe(`Category: ${HEADLINE_CATEGORIES.join(", ")}`),
        max: z.number().optional().describe("Max articles (1-100)"),
      },
    },
    async ({ lang, country, category, max }, extra) => {
      try {
        const result = await service.topHeadlines(
          { lang, country, category, max },
          extra.signal
        );
        return toResult(result);
      } catch (err) {
        return toErrorResult("top_headlines", err);
      }
    }
  );

  return server;
}
