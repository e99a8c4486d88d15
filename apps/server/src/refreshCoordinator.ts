import { AllSymbolsFailedError, QuoteFetchError } from "./errors";
import type { SnapshotBuilder } from "./snapshotBuilder";
import type { SnapshotCache } from "./snapshotCache";
import { RefreshFailure, RefreshResult, RefreshStatus, RefreshTrigger } from "./types";

export interface RefreshCoordinatorOptions {
  builder: Pick<SnapshotBuilder, "build">;
  cache: SnapshotCache;
  symbols: readonly string[];
  now?: () => Date;
}

export class RefreshCoordinator {
  private readonly builder: Pick<SnapshotBuilder, "build">;
  private readonly cache: SnapshotCache;
  private readonly symbols: readonly string[];
  private readonly now: () => Date;
  private inFlight: Promise<RefreshResult> | null = null;
  private refreshCount = 0;

  constructor(options: RefreshCoordinatorOptions) {
    this.builder = options.builder;
    this.cache = options.cache;
    this.symbols = [...options.symbols];
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Starts a build unless one is already running, in which case the caller
   * shares the result of the running build. Never rejects.
   */
  refresh(trigger: RefreshTrigger = "manual"): Promise<RefreshResult> {
    if (this.inFlight) {
      console.info(`Refresh (${trigger}) joined the build already in progress`);
      return this.inFlight;
    }
    const run = this.runRefresh(trigger).finally(() => {
      this.inFlight = null;
    });
    this.inFlight = run;
    return run;
  }

  status(): RefreshStatus {
    const entry = this.cache.get();
    return {
      hasData: entry.snapshot !== null,
      lastSuccessAt: entry.lastSuccessAt,
      lastError: entry.lastError ? { ...entry.lastError } : null,
      refreshing: this.inFlight !== null,
      refreshCount: this.refreshCount
    };
  }

  private async runRefresh(trigger: RefreshTrigger): Promise<RefreshResult> {
    this.refreshCount += 1;
    const previous = this.cache.get().snapshot;
    console.info(`Refreshing ${this.symbols.length} quotes (${trigger})`);

    try {
      const snapshot = await this.builder.build(this.symbols, previous);
      if (snapshot.quotes.length > 0 && snapshot.stats.stale === snapshot.quotes.length) {
        const failure: RefreshFailure = {
          kind: "AllSymbolsFailed",
          message: new AllSymbolsFailedError([...snapshot.failures]).message,
          at: this.now().toISOString()
        };
        this.cache.commitCarriedForward(snapshot, failure);
        console.warn(`Refresh (${trigger}) fetched nothing; showing carried-forward quotes`, failure.message);
        return { success: true, snapshot };
      }
      this.cache.commit(snapshot, this.now());
      return { success: true, snapshot };
    } catch (error) {
      const failure = toRefreshFailure(error, this.now());
      this.cache.recordFailure(failure);
      console.error(`Refresh (${trigger}) failed: ${failure.message}`, error);
      return { success: false, error: failure };
    }
  }
}

export function toRefreshFailure(error: unknown, at: Date): RefreshFailure {
  if (error instanceof AllSymbolsFailedError || error instanceof QuoteFetchError) {
    return { kind: error.kind, message: error.message, at: at.toISOString() };
  }
  return {
    kind: "Unexpected",
    message: error instanceof Error ? error.message : String(error),
    at: at.toISOString()
  };
}
