/**
 * In-memory keyed store with per-entry expiry and a size cap.
 *
 * Reads refresh recency; once `maxEntries` is reached the least recently
 * used entry is evicted. Expired entries are dropped lazily on access and
 * eagerly by `sweep()`.
 */

export type TtlStoreOptions<K, V> = {
  ttlMs: number;
  maxEntries: number;
  now?: () => number;
  onEvict?: (key: K, value: V, reason: "expired" | "capacity") => void;
};

type Entry<V> = {
  value: V;
  expiresAt: number;
};

export class TtlStore<K, V> {
  private readonly entries = new Map<K, Entry<V>>();
  private readonly now: () => number;

  constructor(private readonly options: TtlStoreOptions<K, V>) {
    if (options.maxEntries <= 0) {
      throw new Error(`maxEntries must be positive, got ${options.maxEntries}`);
    }
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  set(key: K, value: V, ttlMs: number = this.options.ttlMs): void {
    this.entries.delete(key);
    while (this.entries.size >= this.options.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.evict(oldest.value, "capacity");
    }
    this.entries.set(key, { value, expiresAt: this.now() + ttlMs });
  }

  get(key: K): V | undefined {
    const entry = this.live(key);
    if (!entry) return undefined;
    // Re-insert to move the key to the most recent position
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.value;
  }

  has(key: K): boolean {
    return this.live(key) !== undefined;
  }

  /** Remove and return the entry; the only way a single-use value is consumed. */
  take(key: K): V | undefined {
    const entry = this.live(key);
    if (!entry) return undefined;
    this.entries.delete(key);
    return entry.value;
  }

  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  /** Drop every expired entry; returns how many were removed. */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of [...this.entries]) {
      if (entry.expiresAt <= now) {
        this.evict(key, "expired");
        removed++;
      }
    }
    return removed;
  }

  private live(key: K): Entry<V> | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.evict(key, "expired");
      return undefined;
    }
    return entry;
  }

  private evict(key: K, reason: "expired" | "capacity"): void {
    const entry = this.entries.get(key);
    if (!entry) return;
    this.entries.delete(key);
    this.options.onEvict?.(key, entry.value, reason);
  }
}
