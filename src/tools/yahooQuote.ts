/**
 * Live quotes from the Yahoo Finance chart endpoint. The payload is validated
 * with zod so a layout change upstream reads as "no price" rather than a
 * crash deeper in the resolver.
 */
import { z } from "zod";

import { YAHOO_CHART_BASE_URL } from "../config/constants.js";

export interface LivePriceSource {
  /** Latest price for an upper-cased symbol, or `null` when none is quoted. */
  fetchPrice(symbol: string): Promise<number | null>;
}

const chartResponseSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          meta: z
            .object({
              regularMarketPrice: z.number().nullable().optional(),
            })
            .passthrough(),
          indicators: z
            .object({
              quote: z
                .array(
                  z.object({
                    close: z.array(z.number().nullable()).optional(),
                  }),
                )
                .optional(),
            })
            .optional(),
        }),
      )
      .nullable(),
    error: z.unknown().optional(),
  }),
});

export type ChartResponse = z.infer<typeof chartResponseSchema>;

export interface YahooQuoteOptions {
  readonly baseUrl?: string;
  readonly timeoutMs: number;
  readonly fetchImpl?: typeof fetch;
}

export class YahooQuoteSource implements LivePriceSource {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: YahooQuoteOptions) {
    this.baseUrl = options.baseUrl ?? YAHOO_CHART_BASE_URL;
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async fetchPrice(symbol: string): Promise<number | null> {
    const url = `${this.baseUrl}/${encodeURIComponent(symbol)}?interval=1d&range=1d`;
    const response = await this.fetchImpl(url, {
      signal: AbortSignal.timeout(this.timeoutMs),
      headers: { accept: "application/json" },
    });

    if (!response.ok) {
      throw new Error(
        `Quote request failed (${response.status} ${response.statusText})`,
      );
    }

    const parsed = chartResponseSchema.parse(await response.json());
    return extractPrice(parsed);
  }
}

export function extractPrice(payload: ChartResponse): number | null {
  const first = payload.chart.result?.[0];
  if (!first) return null;

  const marketPrice = first.meta.regularMarketPrice;
  if (typeof marketPrice === "number" && marketPrice > 0) {
    return marketPrice;
  }

  const closes = first.indicators?.quote?.[0]?.close ?? [];
  for (let i = closes.length - 1; i >= 0; i--) {
    const close = closes[i];
    if (typeof close === "number" && close > 0) {
      return close;
    }
  }
  return null;
}
