/** Default number of fingerprints remembered across batches. */
export const DEFAULT_HISTORY_LIMIT = 500;

/**
 * Bounded FIFO of recently delivered question fingerprints with O(1) membership.
 * The order array and the membership set always hold the same keys.
 */
export class RecencyCache {
  private order: string[] = [];
  private readonly members = new Set<string>();
  private readonly limit: number;

  /** Create an empty cache holding at most `capacity` fingerprints (default 500). */
  public constructor({ capacity = DEFAULT_HISTORY_LIMIT }: { capacity?: number } = {}) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Recency cache capacity must be a positive integer, got ${capacity}`);
    }
    this.limit = capacity;
  }

  /** Rebuild a cache from persisted entries (oldest first); only the newest `capacity` survive. */
  public static from(entries: Iterable<string>, capacity?: number): RecencyCache {
    const cache = new RecencyCache({ capacity });
    for (const entry of entries) cache.register(entry);
    return cache;
  }

  public get size(): number {
    return this.order.length;
  }

  public get capacity(): number {
    return this.limit;
  }

  public has(fingerprint: string): boolean {
    return this.members.has(fingerprint);
  }

  /** Insert if absent, evicting the oldest entries past capacity. Returns whether it inserted. */
  public register(fingerprint: string): boolean {
    if (this.members.has(fingerprint)) return false;
    this.order.push(fingerprint);
    this.members.add(fingerprint);
    if (this.order.length > this.limit) {
      this.evictOldest(this.order.length - this.limit);
    }
    return true;
  }

  /**
   * Insert absent `fingerprints` behind everything already held, as if they
   * had been registered first, then trim the oldest past capacity. Returns how
   * many were inserted.
   */
  public registerOlder(fingerprints: Iterable<string>): number {
    const older: string[] = [];
    for (const fingerprint of fingerprints) {
      if (this.members.has(fingerprint)) continue;
      this.members.add(fingerprint);
      older.push(fingerprint);
    }
    this.order = [...older, ...this.order];
    if (this.order.length > this.limit) {
      this.evictOldest(this.order.length - this.limit);
    }
    return older.length;
  }

  /** Drop the `count` oldest fingerprints. */
  public evictOldest(count = 1): void {
    if (count <= 0) return;
    const evicted = this.order.slice(0, count);
    this.order = this.order.slice(count);
    for (const fingerprint of evicted) this.members.delete(fingerprint);
  }

  /** Snapshot of the remembered fingerprints, oldest first. */
  public entries(): string[] {
    return [...this.order];
  }
}
