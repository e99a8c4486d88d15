import { readFileSync } from "node:fs";
import path from "node:path";
import { JSDOM } from "jsdom";
import { describe, expect, it, vi } from "vitest";
import { renderDashboard } from "../src/dashboardView";
import { toApiSnapshot } from "../src/presenters";
import { computeStats, deriveQuote } from "../src/snapshotBuilder";
import type { Snapshot } from "../src/types";

const script = readFileSync(path.resolve(__dirname, "../public/app.js"), "utf8");

function refreshedSnapshot(): Snapshot {
  const quotes = [
    deriveQuote(
      {
        symbol: "AAPL",
        companyName: "Apple",
        price: 178.45,
        previousClose: 176.1,
        volume: 45_200_000,
        marketCap: null,
        fetchedAt: "2024-05-01T14:30:00.000Z"
      },
      false
    )
  ];
  return { quotes, generatedAt: "2024-05-01T14:30:05.000Z", stats: computeStats(quotes), failures: [] };
}

function openDashboard(pricePrecision: number, volumePrecision: number) {
  const html = renderDashboard({
    entry: { snapshot: null, lastSuccessAt: null, lastError: null },
    sort: "name",
    refreshIntervalSeconds: 60,
    pricePrecision,
    volumePrecision,
    marketOpen: false
  });
  const dom = new JSDOM(html, { runScripts: "outside-only" });
  const fetch = vi.fn(async () => ({
    json: async () => ({ success: true, data: toApiSnapshot(refreshedSnapshot()), error: null })
  }));
  Object.assign(dom.window, { fetch });
  dom.window.eval(script);
  return { dom, fetch };
}

function cellText(dom: JSDOM, className: string) {
  return dom.window.document.querySelector(`tr[data-symbol="AAPL"] td.${className}`)?.textContent;
}

describe("dashboard script", () => {
  it("keeps a configured precision of 0 after a manual refresh", async () => {
    const { dom, fetch } = openDashboard(0, 0);
    try {
      dom.window.document.getElementById("refresh-btn")?.click();

      await vi.waitFor(() => {
        expect(cellText(dom, "price")).toBe("$178");
      });
      expect(fetch).toHaveBeenCalledTimes(1);
      expect(cellText(dom, "change")).toBe("+2");
      expect(cellText(dom, "change-percent")).toBe("+1.33%");
      expect(cellText(dom, "volume")).toBe("45M");
    } finally {
      dom.window.close();
    }
  });

  it("uses the configured precision for refreshed rows", async () => {
    const { dom } = openDashboard(3, 2);
    try {
      dom.window.document.getElementById("refresh-btn")?.click();

      await vi.waitFor(() => {
        expect(cellText(dom, "price")).toBe("$178.450");
      });
      expect(cellText(dom, "volume")).toBe("45.20M");
    } finally {
      dom.window.close();
    }
  });
});
