// ---------------------------------------------------------------------------
// MovieCatalog – the cached, timed entry point the routes call into.
// ---------------------------------------------------------------------------

import type pino from "pino";

import type {
  CacheConfig,
  CacheStats,
  MovieId,
  Timed,
  UpstreamResult,
} from "../core/types.js";
import { MemoizedLookup } from "../cache/memoized-lookup.js";

/** The two upstream operations the catalog memoizes. */
export interface MovieSource {
  fetchDetails(movieId: MovieId): Promise<UpstreamResult>;
  search(query: string): Promise<UpstreamResult>;
}

/**
 * Holds one memoized lookup per upstream operation.  Detail lookups and
 * searches never share entries or capacity.
 *
 * Built once at startup and passed to the routes; it lives as long as the
 * process and is never cleared.
 */
export class MovieCatalog {
  private readonly details: MemoizedLookup<MovieId, UpstreamResult>;
  private readonly searches: MemoizedLookup<string, UpstreamResult>;

  constructor(source: MovieSource, config: CacheConfig, logger: pino.Logger) {
    const shouldCache = config.cacheFailures
      ? undefined
      : (result: UpstreamResult) => result.kind === "ok";

    this.details = new MemoizedLookup<MovieId, UpstreamResult>(
      (movieId) => source.fetchDetails(movieId),
      { name: "movie-details", maxEntries: config.detailsMaxEntries, shouldCache },
      logger,
    );
    this.searches = new MemoizedLookup<string, UpstreamResult>(
      (query) => source.search(query),
      { name: "movie-search", maxEntries: config.searchMaxEntries, shouldCache },
      logger,
    );
  }

  getMovie(movieId: MovieId): Promise<Timed<UpstreamResult>> {
    return timed(() => this.details.get(movieId));
  }

  searchMovies(query: string): Promise<Timed<UpstreamResult>> {
    return timed(() => this.searches.get(query));
  }

  cacheStats(): CacheStats[] {
    return [this.details.stats(), this.searches.stats()];
  }
}

/** Run `fn`, measuring elapsed milliseconds rounded to two decimals. */
export async function timed<T>(fn: () => Promise<T>): Promise<Timed<T>> {
  const start = performance.now();
  const value = await fn();
  const durationMs = Math.round((performance.now() - start) * 100) / 100;
  return { value, durationMs };
}
