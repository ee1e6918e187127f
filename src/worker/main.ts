import "dotenv/config";

import { loadConfig } from "../config/env.js";
import { createLogger } from "../logging/logger.js";
import { LineTransport } from "../protocol/transport.js";
import { loadFallbackTable } from "../tools/fallbackTable.js";
import { DataResolver } from "../tools/stockData.js";
import { YahooQuoteSource } from "../tools/yahooQuote.js";
import { ToolWorker } from "./toolWorker.js";

async function run() {
  const config = loadConfig();
  // stdout carries the protocol; diagnostics go to stderr.
  const logger = createLogger({
    level: config.logLevel,
    component: "worker",
    fd: 2,
  });

  const fallback = await loadFallbackTable(config.stocksCsvPath, logger);
  const live = config.liveQuotesEnabled
    ? new YahooQuoteSource({ timeoutMs: config.liveQuoteTimeoutMs })
    : undefined;
  const resolver = new DataResolver({ fallback, live, logger });

  const transport = new LineTransport(process.stdin, process.stdout);
  await new ToolWorker(resolver, logger).run(transport);
  // Releases the stdin handle so the process can exit once stdout drains.
  process.stdin.destroy();
  logger.log("info", "Worker terminated");
}

run().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
