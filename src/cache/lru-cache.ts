// ---------------------------------------------------------------------------
// Fixed-capacity in-memory LRU cache.
// ---------------------------------------------------------------------------

/** Internal cache entry; boxing keeps `undefined` values distinguishable. */
interface CacheEntry<V> {
  value: V;
}

/** Counters describing a cache's lifetime activity. */
export interface LruCacheCounters {
  capacity: number;
  size: number;
  evictions: number;
}

/**
 * A generic LRU (Least Recently Used) cache with a fixed entry capacity.
 *
 * Backed by a `Map`, which preserves insertion order:
 * - On `get`, the entry is moved to the end (most recently used).
 * - On `set` of a new key at capacity, the *first* entry (least recently
 *   used) is evicted before the new one is inserted.
 *
 * Keys are compared with SameValueZero, so `24428` and `"24428"` are
 * distinct entries.  Entries never expire; they leave only by eviction,
 * `delete` or `clear`.
 */
export class LruCache<K, V> {
  private readonly store = new Map<K, CacheEntry<V>>();
  private readonly maxEntries: number;
  private evictionCount = 0;

  constructor(maxEntries: number) {
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new RangeError("maxEntries must be an integer of at least 1");
    }
    this.maxEntries = maxEntries;
  }

  /**
   * Return the value stored under `key`, or `undefined` when absent.
   * A present key becomes the most recently used.
   */
  get(key: K): V | undefined {
    const entry = this.store.get(key);

    if (!entry) {
      return undefined;
    }

    // Promote to most recently used: delete + re-insert at end
    this.store.delete(key);
    this.store.set(key, entry);

    return entry.value;
  }

  /** Presence test that leaves recency untouched. */
  has(key: K): boolean {
    return this.store.has(key);
  }

  /**
   * Insert or replace `key`.  Replacing refreshes recency without evicting;
   * inserting a new key at capacity evicts the least recently used entry.
   *
   * @returns the evicted key, if any.
   */
  set(key: K, value: V): K | undefined {
    let evicted: K | undefined;

    if (this.store.has(key)) {
      this.store.delete(key);
    } else if (this.store.size >= this.maxEntries) {
      const oldest = this.store.keys().next();
      if (!oldest.done) {
        evicted = oldest.value;
        this.store.delete(oldest.value);
        this.evictionCount++;
      }
    }

    this.store.set(key, { value });
    return evicted;
  }

  delete(key: K): boolean {
    return this.store.delete(key);
  }

  clear(): void {
    this.store.clear();
  }

  /** Keys from least to most recently used. */
  keys(): K[] {
    return Array.from(this.store.keys());
  }

  get size(): number {
    return this.store.size;
  }

  get capacity(): number {
    return this.maxEntries;
  }

  counters(): LruCacheCounters {
    return {
      capacity: this.maxEntries,
      size: this.store.size,
      evictions: this.evictionCount,
    };
  }
}
