// ---------------------------------------------------------------------------
// MemoizedLookup – bounded LRU memoization around one async operation.
// ---------------------------------------------------------------------------

import type pino from "pino";
import type { CacheStats } from "../core/types.js";
import { LruCache } from "./lru-cache.js";

export interface MemoizedLookupOptions<V> {
  /** Label used in logs and stats, e.g. `"movie-details"`. */
  name: string;
  maxEntries: number;
  /**
   * Decides whether a freshly loaded value is stored.  Defaults to storing
   * everything, failures included.
   */
  shouldCache?: (value: V) => boolean;
}

/**
 * Memoizes `load(key)` through an {@link LruCache}.
 *
 * - **hit**: the stored value is returned and promoted; `load` is not called.
 * - **miss**: `load` runs once, its value is stored (subject to
 *   `shouldCache`) and returned.
 *
 * Concurrent misses for the same key share a single in-flight `load` call.
 * Thread-safe in a single-threaded Node.js environment because the pending
 * promise is registered before the first await.  A rejected `load` is passed
 * to every waiter and nothing is stored.
 *
 * `V` excludes `undefined` so that an absent entry is unambiguous.
 */
export class MemoizedLookup<K, V extends NonNullable<unknown>> {
  public readonly name: string;

  private readonly cache: LruCache<K, V>;
  private readonly inFlight = new Map<K, Promise<V>>();
  private readonly load: (key: K) => Promise<V>;
  private readonly shouldCache: (value: V) => boolean;
  private readonly logger: pino.Logger;

  private hits = 0;
  private misses = 0;

  constructor(
    load: (key: K) => Promise<V>,
    options: MemoizedLookupOptions<V>,
    logger: pino.Logger,
  ) {
    this.name = options.name;
    this.cache = new LruCache<K, V>(options.maxEntries);
    this.load = load;
    this.shouldCache = options.shouldCache ?? (() => true);
    this.logger = logger.child({ component: "MemoizedLookup", cache: options.name });
  }

  get(key: K): Promise<V> {
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      this.hits++;
      this.logger.debug({ key }, "cache hit");
      return Promise.resolve(cached);
    }

    // Coalesce concurrent misses for the same key.
    const pending = this.inFlight.get(key);
    if (pending) {
      this.hits++;
      this.logger.debug({ key }, "cache hit (in flight)");
      return pending;
    }

    this.misses++;
    this.logger.debug({ key }, "cache miss");

    const request = this.load(key)
      .then((value) => {
        if (this.shouldCache(value)) {
          const evicted = this.cache.set(key, value);
          if (evicted !== undefined) {
            this.logger.debug({ key, evicted }, "cache evicted");
          }
        }
        return value;
      })
      .finally(() => {
        this.inFlight.delete(key);
      });

    this.inFlight.set(key, request);
    return request;
  }

  /** Whether `key` currently has a stored value. Does not affect recency. */
  has(key: K): boolean {
    return this.cache.has(key);
  }

  get size(): number {
    return this.cache.size;
  }

  stats(): CacheStats {
    const counters = this.cache.counters();
    return {
      name: this.name,
      capacity: counters.capacity,
      size: counters.size,
      hits: this.hits,
      misses: this.misses,
      evictions: counters.evictions,
    };
  }
}
