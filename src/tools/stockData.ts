/**
 * Price resolution: live source first, static table second. Live failures of
 * any kind are downgraded to a table lookup and never reach the caller.
 */
import { NotFoundError, getErrorMessage } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import type { FallbackTable } from "./fallbackTable.js";
import type { LivePriceSource } from "./yahooQuote.js";

export type PriceSource = "live" | "fallback";

export interface PriceQuote {
  readonly symbol: string;
  readonly price: number;
  readonly source: PriceSource;
}

export interface ComparisonResult {
  readonly quote_a: PriceQuote;
  readonly quote_b: PriceQuote;
  readonly summary: string;
}

/** Quote as it travels on the wire: price fixed to two decimals. */
export interface WireQuote {
  readonly symbol: string;
  readonly price: string;
  readonly source: PriceSource;
}

export interface WireComparison {
  readonly quote_a: WireQuote;
  readonly quote_b: WireQuote;
  readonly summary: string;
}

export function formatPrice(price: number): string {
  return price.toFixed(2);
}

export function toWireQuote(quote: PriceQuote): WireQuote {
  return {
    symbol: quote.symbol,
    price: formatPrice(quote.price),
    source: quote.source,
  };
}

export function toWireComparison(result: ComparisonResult): WireComparison {
  return {
    quote_a: toWireQuote(result.quote_a),
    quote_b: toWireQuote(result.quote_b),
    summary: result.summary,
  };
}

export function summarizeComparison(a: PriceQuote, b: PriceQuote): string {
  const pa = formatPrice(a.price);
  const pb = formatPrice(b.price);
  if (a.price > b.price) {
    return `${a.symbol} is trading higher than ${b.symbol} (${pa} vs ${pb}).`;
  }
  if (a.price < b.price) {
    return `${a.symbol} is trading lower than ${b.symbol} (${pa} vs ${pb}).`;
  }
  return `${a.symbol} and ${b.symbol} have the same price at ${pa}.`;
}

function freezeQuote(quote: PriceQuote): PriceQuote {
  return Object.freeze(quote);
}

export interface DataResolverOptions {
  readonly fallback: FallbackTable;
  /** Omit to resolve from the table only. */
  readonly live?: LivePriceSource;
  readonly logger: Logger;
}

export class DataResolver {
  private readonly fallback: FallbackTable;
  private readonly live: LivePriceSource | undefined;
  private readonly logger: Logger;

  constructor(options: DataResolverOptions) {
    this.fallback = options.fallback;
    this.live = options.live;
    this.logger = options.logger;
  }

  async getPrice(symbol: string): Promise<PriceQuote> {
    const cleanSymbol = symbol.trim().toUpperCase();
    if (!cleanSymbol) {
      throw new NotFoundError("Symbol must be a non-empty string.");
    }

    const livePrice = await this.tryLive(cleanSymbol);
    if (livePrice !== null) {
      this.logger.log("info", `Using live price for ${cleanSymbol}`);
      return freezeQuote({ symbol: cleanSymbol, price: livePrice, source: "live" });
    }

    const fallbackPrice = this.fallback.get(cleanSymbol);
    if (fallbackPrice === undefined) {
      throw new NotFoundError(`Price not available for symbol ${cleanSymbol}.`);
    }

    this.logger.log("info", `Using fallback price for ${cleanSymbol}`);
    return freezeQuote({
      symbol: cleanSymbol,
      price: fallbackPrice,
      source: "fallback",
    });
  }

  async compare(symbolA: string, symbolB: string): Promise<ComparisonResult> {
    const quoteA = await this.getPrice(symbolA);
    const quoteB = await this.getPrice(symbolB);
    const result: ComparisonResult = {
      quote_a: quoteA,
      quote_b: quoteB,
      summary: summarizeComparison(quoteA, quoteB),
    };
    return Object.freeze(result);
  }

  private async tryLive(symbol: string): Promise<number | null> {
    if (!this.live) return null;
    try {
      const price = await this.live.fetchPrice(symbol);
      if (typeof price === "number" && Number.isFinite(price) && price >= 0) {
        return price;
      }
      this.logger.log("debug", `Live source had no price for ${symbol}`);
    } catch (error) {
      this.logger.log("debug", `Live lookup failed for ${symbol}`, {
        error: getErrorMessage(error),
      });
    }
    return null;
  }
}
