type Entry<V> = { value: V; storedAt: number };

export type CacheStats = {
  entries: number;
  maxEntries: number;
  ttlMs: number;
};

/**
 * In-process LRU with a time-to-live. Expired entries are dropped when read;
 * the least recently used entry is evicted once `maxEntries` is exceeded.
 */
export class TtlCache<V> {
  private readonly entries = new Map<string, Entry<V>>();

  constructor(
    private readonly ttlMs: number,
    private readonly maxEntries: number,
    private readonly now: () => number = Date.now
  ) {}

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.now() - entry.storedAt >= this.ttlMs) {
      this.entries.delete(key);
      return undefined;
    }
    // Map keeps insertion order, so re-inserting marks the key most recently used
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.value;
  }

  set(key: string, value: V) {
    this.entries.delete(key);
    this.entries.set(key, { value, storedAt: this.now() });
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  clear() {
    this.entries.clear();
  }

  get size() {
    return this.entries.size;
  }

  stats(): CacheStats {
    return { entries: this.entries.size, maxEntries: this.maxEntries, ttlMs: this.ttlMs };
  }
}
