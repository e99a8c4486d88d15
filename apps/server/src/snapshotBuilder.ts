import { AllSymbolsFailedError, isTransient, QuoteFetchError, toQuoteFetchError } from "./errors";
import { createTelemetry, QuoteTelemetry } from "./telemetry";
import { DashboardQuote, ProviderQuote, QuoteProvider, Snapshot, SnapshotStats, SymbolFailure } from "./types";

export interface SnapshotBuilderOptions {
  provider: QuoteProvider;
  fetchTimeoutMs: number;
  maxRetries?: number;
  retryDelayMs?: number;
  /** Carried-forward quotes older than this are dropped. 0 keeps them forever. */
  maxStaleAgeMs?: number;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
  telemetry?: QuoteTelemetry;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class SnapshotBuilder {
  private readonly provider: QuoteProvider;
  private readonly fetchTimeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly maxStaleAgeMs: number;
  private readonly now: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly telemetry: QuoteTelemetry;

  constructor(options: SnapshotBuilderOptions) {
    this.provider = options.provider;
    this.fetchTimeoutMs = options.fetchTimeoutMs;
    this.maxRetries = options.maxRetries ?? 0;
    this.retryDelayMs = options.retryDelayMs ?? 0;
    this.maxStaleAgeMs = options.maxStaleAgeMs ?? 0;
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? defaultSleep;
    this.telemetry = options.telemetry ?? createTelemetry();
  }

  async build(symbols: readonly string[], previous: Snapshot | null): Promise<Snapshot> {
    const unique = Array.from(new Set(symbols));
    if (unique.length === 0) {
      throw new AllSymbolsFailedError([]);
    }
    return this.telemetry.traceExecution("snapshot.build", { "stock.symbol_count": unique.length }, () =>
      this.buildSnapshot(unique, previous)
    );
  }

  private async buildSnapshot(unique: string[], previous: Snapshot | null): Promise<Snapshot> {
    const results = await Promise.allSettled(unique.map((symbol) => this.fetchWithRetry(symbol)));
    const generatedAt = this.now();
    const previousQuotes = new Map((previous?.quotes ?? []).map((quote) => [quote.symbol, quote]));

    const quotes: DashboardQuote[] = [];
    const failures: SymbolFailure[] = [];
    let fresh = 0;

    results.forEach((result, index) => {
      const symbol = unique[index];
      if (result.status === "fulfilled") {
        quotes.push(deriveQuote(result.value, false));
        fresh += 1;
        return;
      }

      const error = toQuoteFetchError(result.reason, symbol);
      const prior = previousQuotes.get(symbol);
      const carry = prior !== undefined && !this.isExpired(prior, generatedAt);
      if (prior && carry) {
        quotes.push(deriveQuote(prior, true));
      }
      failures.push({ symbol, kind: error.kind, message: error.message, carriedForward: carry });
      console.warn(
        `Quote for ${symbol} unavailable (${error.kind}); ${carry ? "carrying forward previous quote" : "omitting symbol"}`,
        error.message
      );
    });

    if (fresh === 0 && quotes.length === 0) {
      throw new AllSymbolsFailedError(failures);
    }

    console.info(`Fetched ${fresh}/${unique.length} quotes`);

    return freezeSnapshot({
      quotes,
      generatedAt: generatedAt.toISOString(),
      stats: computeStats(quotes),
      failures
    });
  }

  private fetchWithRetry(symbol: string): Promise<ProviderQuote> {
    return this.telemetry.traceExecution("quote.fetch", { "stock.symbol": symbol }, async () => {
      const startedAt = Date.now();
      try {
        const quote = await this.fetchAttempts(symbol);
        this.telemetry.recordFetch({ symbol, durationMs: Date.now() - startedAt });
        return quote;
      } catch (error) {
        const failure = toQuoteFetchError(error, symbol);
        this.telemetry.recordFetch({ symbol, durationMs: Date.now() - startedAt, errorKind: failure.kind });
        throw failure;
      }
    });
  }

  private async fetchAttempts(symbol: string): Promise<ProviderQuote> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await withTimeout(this.provider.fetchQuote(symbol), this.fetchTimeoutMs, symbol);
      } catch (error) {
        const failure = toQuoteFetchError(error, symbol);
        if (attempt > this.maxRetries || !isTransient(failure.kind)) {
          throw failure;
        }
        console.warn(`Quote fetch for ${symbol} failed (${failure.kind}). Retrying (${attempt}/${this.maxRetries})...`);
        await this.sleep(this.retryDelayMs * attempt);
      }
    }
  }

  private isExpired(quote: ProviderQuote, at: Date) {
    if (this.maxStaleAgeMs <= 0) {
      return false;
    }
    const fetchedAt = Date.parse(quote.fetchedAt);
    return Number.isFinite(fetchedAt) && at.getTime() - fetchedAt > this.maxStaleAgeMs;
  }
}

export function deriveQuote(base: ProviderQuote, stale: boolean): DashboardQuote {
  const change = base.price - base.previousClose;
  const rawPercent = base.previousClose !== 0 ? (change / base.previousClose) * 100 : 0;
  return {
    symbol: base.symbol,
    companyName: base.companyName,
    price: base.price,
    previousClose: base.previousClose,
    volume: base.volume,
    marketCap: base.marketCap,
    fetchedAt: base.fetchedAt,
    change,
    changePercent: Number.isFinite(rawPercent) ? rawPercent : 0,
    volumeMillions: base.volume / 1_000_000,
    isPositive: change > 0,
    isNegative: change < 0,
    stale
  };
}

export function computeStats(quotes: readonly DashboardQuote[]): SnapshotStats {
  const up = quotes.filter((quote) => quote.isPositive).length;
  const down = quotes.filter((quote) => quote.isNegative).length;
  return {
    up,
    down,
    unchanged: quotes.length - up - down,
    stale: quotes.filter((quote) => quote.stale).length,
    total: quotes.length
  };
}

function freezeSnapshot(snapshot: {
  quotes: DashboardQuote[];
  generatedAt: string;
  stats: SnapshotStats;
  failures: SymbolFailure[];
}): Snapshot {
  return Object.freeze({
    quotes: Object.freeze(snapshot.quotes.map((quote) => Object.freeze(quote))),
    generatedAt: snapshot.generatedAt,
    stats: Object.freeze(snapshot.stats),
    failures: Object.freeze(snapshot.failures.map((failure) => Object.freeze(failure)))
  });
}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number, symbol: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new QuoteFetchError("FetchTimeout", symbol, `Quote fetch for ${symbol} timed out after ${timeoutMs}ms`));
    }, timeoutMs);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}
