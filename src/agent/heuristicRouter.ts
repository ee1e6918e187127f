/**
 * Keyword classifier used when no model is configured, and as the fallback
 * whenever the model route fails.
 */
import { RoutingError } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import type { ToolCall, ToolRouter } from "./router.js";

const KNOWN_TICKERS: ReadonlySet<string> = new Set([
  "AAPL",
  "MSFT",
  "GOOGL",
  "TSLA",
  "AMZN",
  "NVDA",
  "META",
  "IBM",
  "ORCL",
  "NFLX",
]);

const NAME_TO_TICKER: Readonly<Record<string, string>> = {
  APPLE: "AAPL",
  MICROSOFT: "MSFT",
  TESLA: "TSLA",
  AMAZON: "AMZN",
  GOOGLE: "GOOGL",
  ALPHABET: "GOOGL",
  META: "META",
  FACEBOOK: "META",
  NVIDIA: "NVDA",
  IBM: "IBM",
  ORACLE: "ORCL",
  NETFLIX: "NFLX",
};

const COMPARE_PATTERN = /\b(compare|vs|versus)\b/i;

export function extractSymbols(prompt: string): string[] {
  const upper = prompt.toUpperCase();

  const tickers = (upper.match(/\b[A-Z]{1,5}\b/g) ?? []).filter((token) =>
    KNOWN_TICKERS.has(token),
  );
  if (tickers.length) {
    return tickers;
  }

  const nameHits: Array<{ index: number; ticker: string }> = [];
  for (const [name, ticker] of Object.entries(NAME_TO_TICKER)) {
    const match = new RegExp(`\\b${name}\\b`).exec(upper);
    if (match) {
      nameHits.push({ index: match.index, ticker });
    }
  }
  if (nameHits.length) {
    const ordered = nameHits
      .sort((a, b) => a.index - b.index)
      .map((hit) => hit.ticker);
    return [...new Set(ordered)];
  }

  return Array.from(prompt.matchAll(/\$([A-Za-z]{1,5})\b/g), (match) =>
    (match[1] ?? "").toUpperCase(),
  ).filter(Boolean);
}

export class HeuristicRouter implements ToolRouter {
  constructor(private readonly logger: Logger) {}

  async route(prompt: string): Promise<ToolCall> {
    const cleaned = prompt.trim();
    if (!cleaned) {
      throw new RoutingError("Query cannot be empty.");
    }

    const symbols = extractSymbols(cleaned);
    this.logger.log("debug", "Heuristic symbols detected", { symbols });

    if (COMPARE_PATTERN.test(cleaned)) {
      const [symbolA, symbolB] = symbols;
      if (!symbolA || !symbolB) {
        throw new RoutingError("Could not determine two symbols to compare.");
      }
      return {
        tool: "compare",
        arguments: { symbol_a: symbolA, symbol_b: symbolB },
        source: "heuristic",
      };
    }

    const [symbol] = symbols;
    if (!symbol) {
      throw new RoutingError("Could not determine a stock symbol from the query.");
    }
    return { tool: "get_price", arguments: { symbol }, source: "heuristic" };
  }
}
