import { formatCurrency, formatPrice, formatSigned, formatVolume } from "@tech-tracker/server-shared";
import { isShowingStaleData, sortQuotes } from "./presenters";
import { CacheEntry, DashboardQuote, SortKey } from "./types";

export interface DashboardViewModel {
  entry: CacheEntry;
  sort: SortKey;
  refreshIntervalSeconds: number;
  pricePrecision: number;
  volumePrecision: number;
  marketOpen: boolean;
}

const SORT_OPTIONS: { key: SortKey; label: string }[] = [
  { key: "name", label: "Name" },
  { key: "price", label: "Price" },
  { key: "change", label: "Change %" }
];

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;"
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

export function directionClass(quote: Pick<DashboardQuote, "isPositive" | "isNegative">) {
  if (quote.isPositive) {
    return "positive";
  }
  if (quote.isNegative) {
    return "negative";
  }
  return "neutral";
}

export function renderQuoteRow(quote: Readonly<DashboardQuote>, pricePrecision: number, volumePrecision: number): string {
  const classes = ["stock-row", directionClass(quote)];
  if (quote.stale) {
    classes.push("stale");
  }
  const staleBadge = quote.stale
    ? ` <span class="badge stale-badge" title="Last updated ${escapeHtml(quote.fetchedAt)}">stale</span>`
    : "";
  return [
    `<tr class="${classes.join(" ")}" data-symbol="${escapeHtml(quote.symbol)}">`,
    `<td class="symbol">${escapeHtml(quote.symbol)}${staleBadge}</td>`,
    `<td class="company">${escapeHtml(quote.companyName)}</td>`,
    `<td class="price">${formatPrice(quote.price, pricePrecision)}</td>`,
    `<td class="change">${formatSigned(quote.change, pricePrecision)}</td>`,
    `<td class="change-percent">${formatSigned(quote.changePercent, 2, "%")}</td>`,
    `<td class="volume">${formatVolume(quote.volume, volumePrecision)}</td>`,
    `<td class="market-cap">${quote.marketCap !== null ? formatCurrency(quote.marketCap, 2) : "-"}</td>`,
    "</tr>"
  ].join("");
}

function renderBanner(entry: CacheEntry): string {
  if (entry.lastError) {
    const shown = entry.snapshot ? "Showing the last successful data." : "No data available yet.";
    return `<div id="stale-banner" class="banner banner-error">Last refresh failed: ${escapeHtml(entry.lastError.message)}. ${shown}</div>`;
  }
  if (isShowingStaleData(entry)) {
    const count = entry.snapshot?.stats.stale ?? 0;
    return `<div id="stale-banner" class="banner banner-warning">${count} quote${count === 1 ? "" : "s"} could not be refreshed and show${count === 1 ? "s" : ""} earlier data.</div>`;
  }
  return `<div id="stale-banner" class="banner" hidden></div>`;
}

function renderSortLinks(current: SortKey): string {
  return SORT_OPTIONS.map(
    ({ key, label }) =>
      `<a href="/?sort=${key}" class="sort-link${key === current ? " active" : ""}" data-sort="${key}">${label}</a>`
  ).join(" ");
}

export function renderDashboard(model: DashboardViewModel): string {
  const { entry, sort } = model;
  const snapshot = entry.snapshot;
  const quotes = snapshot ? sortQuotes(snapshot.quotes, sort) : [];
  const stats = snapshot?.stats ?? { up: 0, down: 0, unchanged: 0, stale: 0, total: 0 };
  const rows = quotes.length
    ? quotes.map((quote) => renderQuoteRow(quote, model.pricePrecision, model.volumePrecision)).join("\n")
    : `<tr class="empty-row"><td colspan="7">No stock data available yet.</td></tr>`;
  const lastUpdate = snapshot ? escapeHtml(snapshot.generatedAt) : "never";

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>Tech Stock Tracker</title>
<link rel="stylesheet" href="/static/styles.css">
</head>
<body data-refresh-interval="${model.refreshIntervalSeconds}" data-price-precision="${model.pricePrecision}" data-volume-precision="${model.volumePrecision}" data-sort="${sort}">
<header>
<h1>Tech Stock Tracker</h1>
<div class="meta">
<span id="market-status" class="market-status ${model.marketOpen ? "open" : "closed"}">Market ${model.marketOpen ? "open" : "closed"}</span>
<span>Last update: <time id="last-update" datetime="${lastUpdate}">${lastUpdate}</time></span>
<span id="refresh-countdown">Next refresh in ${model.refreshIntervalSeconds}s</span>
<button id="refresh-btn" type="button">Refresh now</button>
</div>
</header>
<main>
${renderBanner(entry)}
<div id="status-message" class="status-message" hidden></div>
<section class="stats">
<span class="stat positive">Up: <strong id="stats-up">${stats.up}</strong></span>
<span class="stat negative">Down: <strong id="stats-down">${stats.down}</strong></span>
<span class="stat">Tracked: <strong id="stats-total">${stats.total}</strong></span>
</section>
<nav class="sort">Sort by: ${renderSortLinks(sort)}</nav>
<table class="stock-table">
<thead>
<tr><th>Symbol</th><th>Company</th><th>Price</th><th>Change</th><th>Change %</th><th>Volume</th><th>Market Cap</th></tr>
</thead>
<tbody id="stock-table-body">
${rows}
</tbody>
</table>
<p class="countdown">Auto refresh in <span id="countdown">${model.refreshIntervalSeconds}</span>s</p>
</main>
<script src="/static/app.js" defer></script>
</body>
</html>
`;
}

export function renderErrorPage(code: number, message: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>${code} - Tech Stock Tracker</title>
<link rel="stylesheet" href="/static/styles.css">
</head>
<body>
<main class="error-page">
<h1>${code}</h1>
<p>${escapeHtml(message)}</p>
<a href="/">Back to the dashboard</a>
</main>
</body>
</html>
`;
}
