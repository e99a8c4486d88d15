export type QuoteErrorKind =
  | "NetworkUnavailable"
  | "SymbolNotFound"
  | "MalformedProviderData"
  | "RateLimited"
  | "FetchTimeout";

export type RefreshErrorKind = QuoteErrorKind | "AllSymbolsFailed" | "Unexpected";

export type RefreshTrigger = "startup" | "timer" | "manual";

export type SortKey = "name" | "price" | "change" | "default";

export interface ProviderQuote {
  symbol: string;
  companyName: string;
  price: number;
  previousClose: number;
  volume: number;
  marketCap: number | null;
  fetchedAt: string;
}

export interface DashboardQuote extends ProviderQuote {
  change: number;
  changePercent: number;
  volumeMillions: number;
  isPositive: boolean;
  isNegative: boolean;
  stale: boolean;
}

export interface SnapshotStats {
  up: number;
  down: number;
  unchanged: number;
  stale: number;
  total: number;
}

export interface SymbolFailure {
  symbol: string;
  kind: QuoteErrorKind;
  message: string;
  carriedForward: boolean;
}

export interface Snapshot {
  readonly quotes: readonly Readonly<DashboardQuote>[];
  readonly generatedAt: string;
  readonly stats: Readonly<SnapshotStats>;
  readonly failures: readonly Readonly<SymbolFailure>[];
}

export interface RefreshFailure {
  kind: RefreshErrorKind;
  message: string;
  at: string;
}

export interface CacheEntry {
  readonly snapshot: Snapshot | null;
  readonly lastSuccessAt: string | null;
  readonly lastError: Readonly<RefreshFailure> | null;
}

export type RefreshResult =
  | { success: true; snapshot: Snapshot }
  | { success: false; error: RefreshFailure };

export interface RefreshStatus {
  hasData: boolean;
  lastSuccessAt: string | null;
  lastError: RefreshFailure | null;
  refreshing: boolean;
  refreshCount: number;
}

export interface QuoteProvider {
  fetchQuote(symbol: string): Promise<ProviderQuote>;
}
