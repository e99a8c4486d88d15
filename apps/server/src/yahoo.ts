import yahooFinance from "yahoo-finance2";
import { z } from "zod";
import { QuoteFetchError } from "./errors";
import { ProviderQuote, QuoteErrorKind, QuoteProvider } from "./types";

export interface YahooQuoteClient {
  quote(symbol: string): Promise<unknown>;
}

export interface YahooQuoteProviderOptions {
  client?: YahooQuoteClient;
  companyNames?: Record<string, string>;
  now?: () => Date;
}

const finiteNumber = z.number().finite();

const yahooQuoteSchema = z.object({
  symbol: z.string().min(1),
  regularMarketPrice: finiteNumber.positive(),
  regularMarketPreviousClose: finiteNumber.nonnegative(),
  regularMarketVolume: finiteNumber.nonnegative().nullish(),
  marketCap: finiteNumber.nullish(),
  longName: z.string().nullish(),
  shortName: z.string().nullish()
});

const NETWORK_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "EAI_AGAIN",
  "ETIMEDOUT",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_SOCKET"
]);

const defaultClient: YahooQuoteClient = {
  quote: (symbol) => yahooFinance.quote(symbol)
};

export function createYahooQuoteProvider(options: YahooQuoteProviderOptions = {}): QuoteProvider {
  const client = options.client ?? defaultClient;
  const companyNames = options.companyNames ?? {};
  const now = options.now ?? (() => new Date());

  return {
    async fetchQuote(symbol: string): Promise<ProviderQuote> {
      let raw: unknown;
      try {
        raw = await client.quote(symbol);
      } catch (error) {
        const kind = classifyYahooError(error);
        throw new QuoteFetchError(kind, symbol, `Yahoo Finance quote for ${symbol} failed: ${describeError(error)}`, {
          cause: error
        });
      }
      return parseYahooQuote(raw, symbol, companyNames[symbol], now());
    }
  };
}

export function parseYahooQuote(
  raw: unknown,
  symbol: string,
  configuredName: string | undefined,
  fetchedAt: Date
): ProviderQuote {
  if (raw === undefined || raw === null || (Array.isArray(raw) && raw.length === 0)) {
    throw new QuoteFetchError("SymbolNotFound", symbol, `Yahoo Finance returned no data for ${symbol}`);
  }

  const parsed = yahooQuoteSchema.safeParse(raw);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join(".") || "(root)").join(", ");
    throw new QuoteFetchError(
      "MalformedProviderData",
      symbol,
      `Yahoo Finance returned incomplete data for ${symbol} (${fields})`,
      { cause: parsed.error }
    );
  }

  const quote = parsed.data;
  return {
    symbol,
    companyName: configuredName ?? quote.longName ?? quote.shortName ?? symbol,
    price: quote.regularMarketPrice,
    previousClose: quote.regularMarketPreviousClose,
    volume: Math.trunc(quote.regularMarketVolume ?? 0),
    marketCap: quote.marketCap ?? null,
    fetchedAt: fetchedAt.toISOString()
  };
}

export function classifyYahooError(error: unknown): QuoteErrorKind {
  const name = error instanceof Error ? error.name : "";
  const message = describeError(error).toLowerCase();
  const code = errorCode(error) ?? errorCode(error instanceof Error ? error.cause : undefined);

  if (/too many requests|rate limit|\b429\b/.test(message)) {
    return "RateLimited";
  }
  if (/not found|no data|invalid symbol/.test(message)) {
    return "SymbolNotFound";
  }
  if (name === "FailedYahooValidationError" || name === "SyntaxError") {
    return "MalformedProviderData";
  }
  if ((code && NETWORK_ERROR_CODES.has(code)) || /fetch failed|network|socket hang up/.test(message)) {
    return "NetworkUnavailable";
  }
  return "MalformedProviderData";
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
