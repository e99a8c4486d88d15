import { describe, expect, it, vi } from "vitest";
import { QuoteFetchError } from "../src/errors";
import { classifyYahooError, createYahooQuoteProvider, parseYahooQuote } from "../src/yahoo";

const FETCHED_AT = new Date("2024-05-01T14:30:00.000Z");

const appleQuote = {
  symbol: "AAPL",
  regularMarketPrice: 178.45,
  regularMarketPreviousClose: 176.1,
  regularMarketVolume: 45_200_000,
  marketCap: 2_800_000_000_000,
  longName: "Apple Inc.",
  shortName: "Apple"
};

async function captureError(promise: Promise<unknown>): Promise<QuoteFetchError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof QuoteFetchError) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected the quote fetch to fail");
}

function captureSync(run: () => unknown): QuoteFetchError {
  try {
    run();
  } catch (error) {
    if (error instanceof QuoteFetchError) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected parsing to fail");
}

describe("parseYahooQuote", () => {
  it("maps a Yahoo quote to a provider quote", () => {
    expect(parseYahooQuote(appleQuote, "AAPL", "Apple", FETCHED_AT)).toEqual({
      symbol: "AAPL",
      companyName: "Apple",
      price: 178.45,
      previousClose: 176.1,
      volume: 45_200_000,
      marketCap: 2_800_000_000_000,
      fetchedAt: "2024-05-01T14:30:00.000Z"
    });
  });

  it("falls back to the long name, the short name and then the ticker", () => {
    expect(parseYahooQuote(appleQuote, "AAPL", undefined, FETCHED_AT).companyName).toBe("Apple Inc.");
    expect(parseYahooQuote({ ...appleQuote, longName: null }, "AAPL", undefined, FETCHED_AT).companyName).toBe(
      "Apple"
    );
    expect(
      parseYahooQuote({ ...appleQuote, longName: undefined, shortName: undefined }, "AAPL", undefined, FETCHED_AT)
        .companyName
    ).toBe("AAPL");
  });

  it("defaults a missing volume to 0 and a missing market cap to null", () => {
    const quote = parseYahooQuote(
      { ...appleQuote, regularMarketVolume: undefined, marketCap: undefined },
      "AAPL",
      "Apple",
      FETCHED_AT
    );

    expect(quote.volume).toBe(0);
    expect(quote.marketCap).toBeNull();
  });

  it("accepts a previous close of zero", () => {
    expect(
      parseYahooQuote({ ...appleQuote, regularMarketPreviousClose: 0 }, "AAPL", "Apple", FETCHED_AT).previousClose
    ).toBe(0);
  });

  it("reports an empty response as SymbolNotFound", () => {
    const error = captureSync(() => parseYahooQuote(undefined, "ZZZZ", undefined, FETCHED_AT));

    expect(error.kind).toBe("SymbolNotFound");
    expect(error.symbol).toBe("ZZZZ");
    expect(error.message).toBe("Yahoo Finance returned no data for ZZZZ");
    expect(captureSync(() => parseYahooQuote([], "ZZZZ", undefined, FETCHED_AT)).kind).toBe("SymbolNotFound");
  });

  it("reports missing or invalid prices as MalformedProviderData", () => {
    const missing = captureSync(() =>
      parseYahooQuote({ ...appleQuote, regularMarketPrice: undefined }, "AAPL", "Apple", FETCHED_AT)
    );
    expect(missing.kind).toBe("MalformedProviderData");
    expect(missing.message).toBe("Yahoo Finance returned incomplete data for AAPL (regularMarketPrice)");

    const negative = captureSync(() =>
      parseYahooQuote({ ...appleQuote, regularMarketPreviousClose: -1 }, "AAPL", "Apple", FETCHED_AT)
    );
    expect(negative.message).toBe("Yahoo Finance returned incomplete data for AAPL (regularMarketPreviousClose)");

    expect(
      captureSync(() => parseYahooQuote({ ...appleQuote, regularMarketPrice: Number.NaN }, "AAPL", "Apple", FETCHED_AT))
        .kind
    ).toBe("MalformedProviderData");
  });
});

describe("classifyYahooError", () => {
  it("detects rate limiting", () => {
    expect(classifyYahooError(new Error("Too Many Requests"))).toBe("RateLimited");
    expect(classifyYahooError(new Error("HTTP 429"))).toBe("RateLimited");
  });

  it("detects unknown symbols", () => {
    expect(classifyYahooError(new Error("Quote not found for ticker symbol: ZZZZ"))).toBe("SymbolNotFound");
  });

  it("detects network failures from the message or the error code", () => {
    expect(classifyYahooError(new TypeError("fetch failed"))).toBe("NetworkUnavailable");
    expect(
      classifyYahooError(Object.assign(new Error("getaddrinfo ENOTFOUND query2.example"), { code: "ENOTFOUND" }))
    ).toBe("NetworkUnavailable");
    expect(
      classifyYahooError(
        new Error("request aborted", { cause: Object.assign(new Error("connect refused"), { code: "ECONNREFUSED" }) })
      )
    ).toBe("NetworkUnavailable");
  });

  it("treats validation and parse errors as malformed data", () => {
    const validation = new Error("Failed Yahoo Schema validation");
    validation.name = "FailedYahooValidationError";

    expect(classifyYahooError(validation)).toBe("MalformedProviderData");
    expect(classifyYahooError(new SyntaxError("Unexpected token < in JSON"))).toBe("MalformedProviderData");
    expect(classifyYahooError("something odd")).toBe("MalformedProviderData");
  });
});

describe("createYahooQuoteProvider", () => {
  it("fetches through the client and applies configured names", async () => {
    const quote = vi.fn(async (_symbol: string): Promise<unknown> => appleQuote);
    const provider = createYahooQuoteProvider({
      client: { quote },
      companyNames: { AAPL: "Apple" },
      now: () => FETCHED_AT
    });

    const result = await provider.fetchQuote("AAPL");

    expect(quote).toHaveBeenCalledWith("AAPL");
    expect(result.companyName).toBe("Apple");
    expect(result.fetchedAt).toBe("2024-05-01T14:30:00.000Z");
  });

  it("wraps client errors with their kind", async () => {
    const provider = createYahooQuoteProvider({
      client: {
        quote: async () => {
          throw new Error("Too Many Requests");
        }
      }
    });

    const error = await captureError(provider.fetchQuote("MSFT"));

    expect(error.kind).toBe("RateLimited");
    expect(error.symbol).toBe("MSFT");
    expect(error.message).toBe("Yahoo Finance quote for MSFT failed: Too Many Requests");
  });

  it("rejects when the client returns nothing", async () => {
    const provider = createYahooQuoteProvider({ client: { quote: async () => undefined } });

    const error = await captureError(provider.fetchQuote("ZZZZ"));

    expect(error.kind).toBe("SymbolNotFound");
  });
});
