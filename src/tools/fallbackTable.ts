import { readFile } from "node:fs/promises";

import type { Logger } from "../logging/logger.js";

export type FallbackTable = ReadonlyMap<string, number>;

/**
 * Parses `symbol,price[,...]` rows. The first line is a header. Rows with a
 * blank symbol or a price that is not a finite, non-negative number are
 * dropped.
 */
export function parseFallbackCsv(text: string): FallbackTable {
  const table = new Map<string, number>();
  const lines = text.split(/\r?\n/);

  for (const [index, line] of lines.entries()) {
    if (index === 0) continue;

    const parts = line.split(",").map((value) => value.trim());
    if (parts.length < 2) continue;

    const [rawSymbol = "", rawPrice = ""] = parts;
    const symbol = rawSymbol.toUpperCase();
    if (!symbol || !/^[+]?(\d+(\.\d*)?|\.\d+)$/.test(rawPrice)) continue;

    const price = Number(rawPrice);
    if (!Number.isFinite(price)) continue;

    table.set(symbol, price);
  }

  return table;
}

export async function loadFallbackTable(
  csvPath: string,
  logger: Logger,
): Promise<FallbackTable> {
  let text: string;
  try {
    text = await readFile(csvPath, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) {
      logger.log("warn", "Fallback CSV missing; continuing with an empty table", {
        path: csvPath,
      });
      return new Map();
    }
    throw error;
  }

  const table = parseFallbackCsv(text);
  logger.log("info", "Loaded fallback price table", {
    path: csvPath,
    symbols: table.size,
  });
  return table;
}

function isMissingFile(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}
