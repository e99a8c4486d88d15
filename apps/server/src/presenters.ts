import { CacheEntry, DashboardQuote, RefreshFailure, RefreshStatus, Snapshot, SortKey } from "./types";

type QuoteList = readonly Readonly<DashboardQuote>[];

export function sortQuotes(quotes: QuoteList, sort: SortKey): Readonly<DashboardQuote>[] {
  const copy = [...quotes];
  switch (sort) {
    case "name":
      return copy.sort((a, b) => a.companyName.localeCompare(b.companyName));
    case "price":
      return copy.sort((a, b) => b.price - a.price);
    case "change":
      return copy.sort((a, b) => b.changePercent - a.changePercent);
    default:
      return copy;
  }
}

export function parseSortKey(value: unknown, fallback: SortKey = "name"): SortKey {
  const raw: unknown = Array.isArray(value) ? value[0] : value;
  if (raw === undefined || raw === "") {
    return fallback;
  }
  if (raw === "name" || raw === "price" || raw === "change") {
    return raw;
  }
  return "default";
}

export function toApiQuote(quote: Readonly<DashboardQuote>) {
  return {
    symbol: quote.symbol,
    company_name: quote.companyName,
    price: quote.price,
    previous_close: quote.previousClose,
    change: quote.change,
    change_percent: quote.changePercent,
    volume: quote.volume,
    volume_millions: quote.volumeMillions,
    market_cap: quote.marketCap,
    is_positive: quote.isPositive,
    is_negative: quote.isNegative,
    fetched_at: quote.fetchedAt,
    stale: quote.stale
  };
}

export function toApiSnapshot(snapshot: Snapshot, sort: SortKey = "default") {
  return {
    quotes: sortQuotes(snapshot.quotes, sort).map(toApiQuote),
    generated_at: snapshot.generatedAt,
    stats: { ...snapshot.stats },
    failures: snapshot.failures.map((failure) => ({
      symbol: failure.symbol,
      kind: failure.kind,
      message: failure.message,
      carried_forward: failure.carriedForward
    }))
  };
}

export function toApiError(error: Readonly<RefreshFailure> | null) {
  if (!error) {
    return null;
  }
  return { kind: error.kind, message: error.message, at: error.at };
}

export function toApiStocks(entry: CacheEntry, sort: SortKey, refreshIntervalSeconds: number) {
  const snapshot = entry.snapshot;
  return {
    quotes: snapshot ? sortQuotes(snapshot.quotes, sort).map(toApiQuote) : [],
    generated_at: snapshot?.generatedAt ?? null,
    stats: snapshot ? { ...snapshot.stats } : { up: 0, down: 0, unchanged: 0, stale: 0, total: 0 },
    last_success_at: entry.lastSuccessAt,
    last_error: toApiError(entry.lastError),
    stale: isShowingStaleData(entry),
    refresh_interval: refreshIntervalSeconds
  };
}

export function toApiStatus(
  status: RefreshStatus,
  extra: {
    refreshIntervalSeconds: number;
    backgroundRefreshRunning: boolean;
    trackedSymbols: string[];
    marketOpen: boolean;
  }
) {
  return {
    status: "running",
    has_data: status.hasData,
    last_success_at: status.lastSuccessAt,
    last_error: toApiError(status.lastError),
    refreshing: status.refreshing,
    refresh_count: status.refreshCount,
    refresh_interval: extra.refreshIntervalSeconds,
    background_refresh_running: extra.backgroundRefreshRunning,
    tracked_symbols: extra.trackedSymbols,
    market_open: extra.marketOpen
  };
}

/** True when the page should warn that what it shows is not fully fresh. */
export function isShowingStaleData(entry: CacheEntry) {
  if (!entry.snapshot) {
    return entry.lastError !== null;
  }
  return entry.lastError !== null || entry.snapshot.stats.stale > 0;
}
