// ---------------------------------------------------------------------------
// Core types for the Movie Info service.
// All other modules import from this file.
// ---------------------------------------------------------------------------

// ── Branded primitives ──────────────────────────────────────────────────────

/** A validated TMDB movie identifier (positive safe integer). */
export type MovieId = number & { readonly __brand: "MovieId" };

// ── Upstream results ────────────────────────────────────────────────────────

export const UpstreamErrorCode = {
  UPSTREAM: "upstream_error",
  NETWORK: "network_error",
} as const;
export type UpstreamErrorCode =
  (typeof UpstreamErrorCode)[keyof typeof UpstreamErrorCode];

export interface UpstreamFailure {
  code: UpstreamErrorCode;
  message: string;
  /** HTTP status for `upstream_error`, null for transport failures. */
  status: number | null;
}

/** Parsed JSON body as returned by TMDB, field names untouched. */
export type UpstreamPayload = Record<string, unknown>;

/**
 * Outcome of a single upstream call.  The client never throws; every
 * outcome is one of these three shapes.
 */
export type UpstreamResult =
  | { kind: "ok"; payload: UpstreamPayload }
  | { kind: "not_found" }
  | { kind: "error"; error: UpstreamFailure };

/** A value together with the wall-clock time spent producing it. */
export interface Timed<T> {
  value: T;
  durationMs: number;
}

// ── Cache ───────────────────────────────────────────────────────────────────

export interface CacheStats {
  name: string;
  capacity: number;
  size: number;
  hits: number;
  misses: number;
  evictions: number;
}

// ── Public response shapes ──────────────────────────────────────────────────

export interface MovieDetailsResponse {
  movie_id: number;
  title: string;
  release_date: string | null;
  rating: number;
  summary: string;
  duration_ms: number;
}

export interface MovieSearchResult {
  movie_id: number;
  title: string;
  release_date: string | null;
}

export interface SearchResponse {
  query: string;
  total_results: number;
  results: MovieSearchResult[];
  duration_ms: number;
}

// ── Config types ────────────────────────────────────────────────────────────

export interface AppConfig {
  env: "development" | "test" | "production";
  port: number;
  logging: LoggingConfig;
  tmdb: TmdbConfig;
  cache: CacheConfig;
}

export interface TmdbConfig {
  /** Null when `TMDB_BASE_URL` is not set. */
  baseUrl: string | null;
  /** Null when `TMDB_API_KEY` is not set. */
  apiKey: string | null;
  /** Per-request timeout; null means no explicit deadline. */
  timeoutMs: number | null;
}

export interface CacheConfig {
  detailsMaxEntries: number;
  searchMaxEntries: number;
  /** Store error and not-found results alongside successes. */
  cacheFailures: boolean;
}

export interface LoggingConfig {
  level: string;
  prettyPrint: boolean;
  redactSecrets: boolean;
}
