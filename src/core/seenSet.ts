/**
 * Bounded memory of already-acted-on event identities.
 *
 * Oldest entries are evicted first once `maxEntries` is reached, and entries
 * older than `maxAgeMs` (when set) count as unseen again.
 */
export class BoundedSeenSet {
  private readonly entries = new Map<string, number>();

  constructor(
    private readonly maxEntries = 500,
    private readonly maxAgeMs?: number,
    private readonly now: () => number = Date.now
  ) {}

  has(key: string): boolean {
    const seenAt = this.entries.get(key);
    if (seenAt === undefined) return false;
    if (this.maxAgeMs !== undefined && this.now() - seenAt > this.maxAgeMs) {
      this.entries.delete(key);
      return false;
    }
    return true;
  }

  add(key: string): void {
    this.entries.delete(key);
    this.entries.set(key, this.now());
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  /** Marks `key` as seen; returns false when it had already been seen. */
  markIfNew(key: string): boolean {
    if (this.has(key)) return false;
    this.add(key);
    return true;
  }

  get size(): number {
    return this.entries.size;
  }
}
