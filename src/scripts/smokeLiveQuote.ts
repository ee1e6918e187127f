import { LIVE_QUOTE_TIMEOUT_MS } from "../config/constants.js";
import { YahooQuoteSource } from "../tools/yahooQuote.js";

async function run() {
  const symbol = (process.argv[2] ?? "AAPL").toUpperCase();
  const source = new YahooQuoteSource({ timeoutMs: LIVE_QUOTE_TIMEOUT_MS });
  const price = await source.fetchPrice(symbol);

  console.dir({ symbol, price }, { depth: null });
}

run().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
