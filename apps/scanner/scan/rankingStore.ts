export type EntryLocation = { status: 'pending' } | { status: 'resolved'; value: string };

export interface RankEntry {
  address: string;
  latency: number;
  location: EntryLocation;
}

/** Result of an enrichment task, applied to the board by address. */
export interface LocationUpdate {
  address: string;
  location: string;
}

export type AdmissionHook = (address: string) => void;

/**
 * Bounded leaderboard of the `limit` lowest latencies seen so far.
 *
 * Every method is synchronous and never yields to the event loop, so each
 * call runs as one critical section against probe completions and
 * enrichment results alike.
 */
export class RankingStore {
  private entries: RankEntry[] = [];
  private dirty = false;

  constructor(
    readonly limit: number,
    private readonly onAdmit: AdmissionHook = () => undefined
  ) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Leaderboard limit must be a positive integer, got ${limit}`);
    }
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Admits the result if the board has room or it beats the current worst
   * entry strictly. Equal latencies keep arrival order.
   */
  offer(address: string, latency: number): boolean {
    const worst = this.entries[this.limit - 1];
    if (this.entries.length >= this.limit && worst !== undefined && latency >= worst.latency) {
      return false;
    }

    this.entries.push({ address, latency, location: { status: 'pending' } });
    // Array.prototype.sort is stable
    this.entries.sort((a, b) => a.latency - b.latency);
    this.entries = this.entries.slice(0, this.limit);
    this.dirty = true;

    this.onAdmit(address);
    return true;
  }

  /** Drops the update when the address has been evicted meanwhile. */
  applyLocation(update: LocationUpdate): boolean {
    const entry = this.entries.find((candidate) => candidate.address === update.address);
    if (!entry) return false;

    entry.location = { status: 'resolved', value: update.location };
    this.dirty = true;
    return true;
  }

  snapshot(): RankEntry[] {
    return this.entries.map((entry) => ({ ...entry, location: { ...entry.location } }));
  }

  /** Returns whether the board changed since the last call, and clears the flag. */
  takeDirty(): boolean {
    const wasDirty = this.dirty;
    this.dirty = false;
    return wasDirty;
  }
}
