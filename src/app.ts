import cors from "cors";
import express, { Express, Request, Response } from "express";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { logger } from "./logger";
import { NewsService } from "./modules/newsService";
import { createToolServer } from "./modules/toolServer";

function jsonRpcError(res: Response, status: number, code: number, message: string) {
  res.status(status).json({
    jsonrpc: "2.0",
    error: { code, message },
    id: null,
  });
}

/**
 * HTTP host for the MCP endpoint. Stateless: each POST gets its own
 * MCP server and transport; the service (and its caches) is shared.
 */
export function createApp(service: NewsService): Express {
  const app = express();

  app.use(cors());
  app.use(express.json());

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok", persistentCache: service.persistentCacheKind });
  });

  app.post("/mcp", async (req: Request, res: Response) => {
    const server = createToolServer(service);
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
    });

    res.on("close", () => {
      Promise.all([transport.close(), server.close()]).catch((err) => {
        logger.warn({ err }, "Error closing MCP transport");
      });
    });

    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      logger.error({ err }, "Error handling MCP request");
      if (!res.headersSent) {
        jsonRpcError(res, 500, -32603, "Internal server error");
      }
    }
  });

  app.get("/mcp", (_req: Request, res: Response) => {
    jsonRpcError(res, 405, -32000, "Method not allowed.");
  });

  app.delete("/mcp", (_req: Request, res: Response) => {
    jsonRpcError(res, 405, -32000, "Method not allowed.");
  });

  return app;
}
