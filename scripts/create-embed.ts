#!/usr/bin/env node
/**
 * Issue an embed link from the command line, without going through HTTP.
 * Usage: npm run embed:create -- [--days N] "MATCH (n) RETURN n LIMIT 25"
 */

import { mkdir } from "node:fs/promises";
import path from "node:path";
import { parseArgs } from "node:util";
import { loadStoreConfig } from "../src/config/index.js";
import { createLogger } from "../src/config/logger.js";
import { TokenStoreClient } from "../src/store/index.js";
import { createEmbedService } from "../src/embed/index.js";

async function main() {
  const { values, positionals } = parseArgs({
    options: { days: { type: "string", short: "d" } },
    allowPositionals: true,
  });

  const query = positionals.join(" ");
  const days = values.days === undefined ? undefined : Number(values.days);

  const config = loadStoreConfig();
  const logger = createLogger(config.log.level, "create-embed");

  if (config.sqlite.path !== ":memory:") {
    await mkdir(path.dirname(config.sqlite.path), { recursive: true });
  }
  const store = new TokenStoreClient(config.sqlite.path, {
    busyTimeoutMs: config.sqlite.busyTimeoutMs,
  });

  try {
    const embeds = createEmbedService(store, config.embed, logger);
    const created = embeds.createEmbed(query, days);

    console.log(`Embed URL:  ${created.embedUrl}`);
    console.log(`Token:      ${created.token}`);
    console.log(`Expires at: ${created.expiresAt.toISOString()}`);
  } finally {
    store.close();
  }
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
