import { CacheEntry, RefreshFailure, Snapshot } from "./types";

const EMPTY_ENTRY: CacheEntry = Object.freeze({
  snapshot: null,
  lastSuccessAt: null,
  lastError: null
});

/**
 * Holds the latest committed snapshot. Every write swaps in a new frozen entry,
 * so a reader either sees the previous entry or the next one, never a mix.
 * Only the refresh coordinator writes to it.
 */
export class SnapshotCache {
  private entry: CacheEntry = EMPTY_ENTRY;

  get(): CacheEntry {
    return this.entry;
  }

  commit(snapshot: Snapshot, at: Date = new Date()) {
    this.entry = Object.freeze({
      snapshot,
      lastSuccessAt: at.toISOString(),
      lastError: null
    });
  }

  /** Stores a snapshot built only from carried-forward quotes; the last success time stays put. */
  commitCarriedForward(snapshot: Snapshot, failure: RefreshFailure) {
    this.entry = Object.freeze({
      snapshot,
      lastSuccessAt: this.entry.lastSuccessAt,
      lastError: Object.freeze({ ...failure })
    });
  }

  recordFailure(failure: RefreshFailure) {
    this.entry = Object.freeze({
      ...this.entry,
      lastError: Object.freeze({ ...failure })
    });
  }
}
