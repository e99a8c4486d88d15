import { QuoteErrorKind, SymbolFailure } from "./types";

export class QuoteFetchError extends Error {
  readonly kind: QuoteErrorKind;
  readonly symbol: string;

  constructor(kind: QuoteErrorKind, symbol: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "QuoteFetchError";
    this.kind = kind;
    this.symbol = symbol;
  }
}

export class AllSymbolsFailedError extends Error {
  readonly kind = "AllSymbolsFailed" as const;
  failures: SymbolFailure[];

  constructor(failures: SymbolFailure[]) {
    super(
      failures.length
        ? `All ${failures.length} symbols failed to fetch (${failures.map((failure) => `${failure.symbol}: ${failure.kind}`).join(", ")})`
        : "No symbols to fetch"
    );
    this.name = "AllSymbolsFailedError";
    this.failures = failures;
  }
}

// FetchTimeout is final: the timed-out call is never cancelled.
const TRANSIENT_KINDS: ReadonlySet<QuoteErrorKind> = new Set(["NetworkUnavailable", "RateLimited"]);

export function isTransient(kind: QuoteErrorKind) {
  return TRANSIENT_KINDS.has(kind);
}

export function toQuoteFetchError(error: unknown, symbol: string): QuoteFetchError {
  if (error instanceof QuoteFetchError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new QuoteFetchError("MalformedProviderData", symbol, message, { cause: error });
}
