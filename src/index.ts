import { mkdir } from "node:fs/promises";
import path from "node:path";
import { loadConfig } from "./config/index.js";
import { createLogger } from "./config/logger.js";
import { TokenStoreClient } from "./store/index.js";
import { createGraphClient, createQueryProxy } from "./graph/index.js";
import { createEmbedService } from "./embed/index.js";
import { createHttpServer } from "./server/index.js";

async function main() {
  const config = loadConfig();
  const logger = createLogger(config.log.level, "graph-embedder");

  logger.info("Starting graph-embedder...");

  // 1. Token store
  if (config.sqlite.path !== ":memory:") {
    await mkdir(path.dirname(config.sqlite.path), { recursive: true });
  }
  const store = new TokenStoreClient(config.sqlite.path, {
    busyTimeoutMs: config.sqlite.busyTimeoutMs,
  });
  logger.info({ path: config.sqlite.path }, "Token store initialized");

  // 2. Neo4j
  const graphClient = createGraphClient(config.neo4j, logger);
  await graphClient.connect();

  // 3. Services
  const embeds = createEmbedService(
    store,
    {
      baseUrl: config.embed.baseUrl,
      defaultExpiryDays: config.embed.defaultExpiryDays,
      maxExpiryDays: config.embed.maxExpiryDays,
    },
    logger,
  );
  const proxy = createQueryProxy(
    graphClient,
    { queryTimeoutMs: config.neo4j.queryTimeoutMs },
    logger,
  );

  // 4. HTTP
  const server = createHttpServer({
    embeds,
    proxy,
    logger,
    corsOrigin: config.server.corsOrigin,
  });
  await server.start(config.server.port, config.server.host);

  logger.info({ embedBaseUrl: config.embed.baseUrl }, "graph-embedder is running");

  async function shutdown(signal: string) {
    logger.info({ signal }, "Shutting down...");

    await server.stop();

    store.close();
    logger.info("Token store closed");

    await graphClient.close();
    logger.info("Neo4j disconnected");

    logger.info("Shutdown complete");
    process.exit(0);
  }

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
