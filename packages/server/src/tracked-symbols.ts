export const DEFAULT_TRACKED_SYMBOLS: Record<string, string> = {
  GOOGL: "Alphabet",
  AMZN: "Amazon",
  AAPL: "Apple",
  META: "Meta Platforms",
  MSFT: "Microsoft",
  NVDA: "Nvidia",
  TSLA: "Tesla",
  ORCL: "Oracle",
  AVGO: "Broadcom"
};

export interface TrackedSymbol {
  symbol: string;
  name: string;
}

export function normalizeSymbol(raw: string): string {
  return raw.trim().toUpperCase();
}

export function getDefaultCompanyName(symbol: string): string | undefined {
  return DEFAULT_TRACKED_SYMBOLS[normalizeSymbol(symbol)];
}

/**
 * Parses a comma separated list such as `AAPL, MSFT:Microsoft Corp`.
 * Entries without an explicit name fall back to the default display name, or
 * to the ticker itself. Duplicate tickers keep their first position.
 */
export function parseTrackedSymbols(raw: string): TrackedSymbol[] {
  const seen = new Set<string>();
  const tracked: TrackedSymbol[] = [];
  for (const entry of raw.split(",")) {
    const [rawSymbol = "", ...nameParts] = entry.split(":");
    const symbol = normalizeSymbol(rawSymbol);
    if (!symbol || seen.has(symbol)) {
      continue;
    }
    seen.add(symbol);
    const explicitName = nameParts.join(":").trim();
    tracked.push({
      symbol,
      name: explicitName || getDefaultCompanyName(symbol) || symbol
    });
  }
  return tracked;
}

export function defaultTrackedSymbolList(): string {
  return Object.keys(DEFAULT_TRACKED_SYMBOLS).join(",");
}
