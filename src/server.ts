import axios from "axios";
import https from "https";
import { Server } from "http";
import { loadConfig } from "./config";
import { logger } from "./logger";
import { createPersistentCache } from "./cache";
import { GNewsClient } from "./modules/gnewsClient";
import { NewsService } from "./modules/newsService";
import { createApp } from "./app";
import { UPSTREAM_TIMEOUT_MS } from "./constants/news";

// -------------------------------------------------
// Load & validate environment variables
// -------------------------------------------------
const config = loadConfig();

if (!config.apiKey) {
  logger.warn("GNEWS_API_KEY is not set; tool calls will fail until it is provided");
}

const httpsAgent = new https.Agent({
  keepAlive: true,
  maxSockets: 10,
});

const axiosClient = axios.create({
  timeout: UPSTREAM_TIMEOUT_MS,
  httpsAgent,
});

let httpServer: Server | undefined;
let service: NewsService | undefined;

async function main() {
  const persistentCache = await createPersistentCache(config);

  service = new NewsService({
    client: new GNewsClient({ axiosClient, apiKey: config.apiKey }),
    persistentCache,
  });

  const app = createApp(service);

  httpServer = app.listen(config.port, config.host, () => {
    logger.info(
      { host: config.host, port: config.port, persistentCache: persistentCache.kind },
      "GNews MCP server listening"
    );
  });
}

async function shutdown(signal: string) {
  logger.info(`Received ${signal}. Shutting down...`);
  try {
    httpsAgent.destroy();

    if (httpServer) {
      await new Promise<void>((resolve) => httpServer?.close(() => resolve()));
    }

    if (service) {
      await service.close();
    }

    process.exit(0);
  } catch (err) {
    logger.error({ err }, "Shutdown failed");
    process.exit(1);
  }
}

process.on("SIGINT", () => void shutdown("SIGINT"));
process.on("SIGTERM", () => void shutdown("SIGTERM"));

main().catch((err) => {
  logger.fatal({ err }, "Failed to start GNews MCP server");
  process.exit(1);
});
