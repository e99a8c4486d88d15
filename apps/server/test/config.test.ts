import { describe, expect, it } from "vitest";
import { ConfigError, loadConfig } from "../src/config";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({});

    expect(config.port).toBe(8080);
    expect(config.host).toBe("127.0.0.1");
    expect(config.trackedSymbols.map((tracked) => tracked.symbol)).toEqual([
      "GOOGL",
      "AMZN",
      "AAPL",
      "META",
      "MSFT",
      "NVDA",
      "TSLA",
      "ORCL",
      "AVGO"
    ]);
    expect(config.trackedSymbols[0]).toEqual({ symbol: "GOOGL", name: "Alphabet" });
    expect(config.refreshIntervalSeconds).toBe(60);
    expect(config.pricePrecision).toBe(2);
    expect(config.volumePrecision).toBe(1);
    expect(config.fetchTimeoutMs).toBe(10_000);
    expect(config.maxRetries).toBe(2);
    expect(config.retryDelayMs).toBe(2_000);
    expect(config.maxStaleAgeMs).toBe(0);
    expect(config.clientOrigins).toEqual([]);
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      PORT: "9000",
      TRACKED_SYMBOLS: "aapl, msft:Microsoft Corp, aapl, XYZ",
      REFRESH_INTERVAL_SECONDS: "15",
      STALE_QUOTE_MAX_AGE_SECONDS: "300",
      CLIENT_ORIGIN: "http://a.test, http://b.test"
    });

    expect(config.port).toBe(9000);
    expect(config.trackedSymbols).toEqual([
      { symbol: "AAPL", name: "Apple" },
      { symbol: "MSFT", name: "Microsoft Corp" },
      { symbol: "XYZ", name: "XYZ" }
    ]);
    expect(config.refreshIntervalSeconds).toBe(15);
    expect(config.maxStaleAgeMs).toBe(300_000);
    expect(config.clientOrigins).toEqual(["http://a.test", "http://b.test"]);
  });

  it("treats blank values as unset", () => {
    expect(loadConfig({ PORT: "", REFRESH_INTERVAL_SECONDS: "  " }).port).toBe(8080);
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ REFRESH_INTERVAL_SECONDS: "0" })).toThrow(ConfigError);
    expect(() => loadConfig({ PORT: "eighty" })).toThrow("Invalid configuration: PORT:");
  });

  it("rejects a symbol list without symbols", () => {
    expect(() => loadConfig({ TRACKED_SYMBOLS: " , " })).toThrow(
      "Invalid configuration: TRACKED_SYMBOLS: TRACKED_SYMBOLS must name at least one symbol"
    );
  });
});
