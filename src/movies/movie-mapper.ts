// ---------------------------------------------------------------------------
// Shapes raw TMDB payloads into the service's public response schema.
// ---------------------------------------------------------------------------

import { z } from "zod";

import type {
  MovieDetailsResponse,
  MovieSearchResult,
  SearchResponse,
  UpstreamPayload,
} from "../core/types.js";
import { MappingError } from "../core/errors.js";

export const DETAILS_MAPPING_ERROR =
  "Error processing external data structure. Internal service error.";
export const SEARCH_MAPPING_ERROR =
  "Error processing external search results. Internal service error.";

// ── Zod schemas (TMDB field names) ──────────────────────────────────────────

/** `""`, `null` and a missing key all mean "no release date". */
const ReleaseDateSchema = z
  .string()
  .nullish()
  .transform((v) => (v ? v : null));

export const TmdbMovieSchema = z.object({
  id: z.number().int().positive(),
  title: z.string(),
  release_date: ReleaseDateSchema,
  vote_average: z.number(),
  overview: z.string(),
});

export const TmdbSearchItemSchema = z.object({
  id: z.number().int().positive(),
  title: z.string(),
  release_date: ReleaseDateSchema,
});

export const TmdbSearchPageSchema = z.object({
  total_results: z.number().int().nonnegative().nullish(),
  results: z.array(TmdbSearchItemSchema).nullish(),
});

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map(
    (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
  );
}

// ── Mappers ─────────────────────────────────────────────────────────────────

/**
 * Map a TMDB movie detail payload.
 *
 * @throws MappingError when `id`, `title`, `vote_average` or `overview`
 *   is missing or has the wrong type.
 */
export function toMovieDetails(
  payload: UpstreamPayload,
  durationMs: number,
): MovieDetailsResponse {
  const parsed = TmdbMovieSchema.safeParse(payload);
  if (!parsed.success) {
    throw new MappingError(DETAILS_MAPPING_ERROR, describeIssues(parsed.error), {
      cause: parsed.error,
    });
  }

  const movie = parsed.data;
  return {
    movie_id: movie.id,
    title: movie.title,
    release_date: movie.release_date,
    rating: movie.vote_average,
    summary: movie.overview,
    duration_ms: durationMs,
  };
}

/**
 * Map a TMDB search page.  A page without a `results` array is an empty
 * search, not an error; `total_results` falls back to the number of items.
 *
 * @throws MappingError when an item lacks `id` or `title`.
 */
export function toSearchResponse(
  query: string,
  payload: UpstreamPayload,
  durationMs: number,
): SearchResponse {
  const parsed = TmdbSearchPageSchema.safeParse(payload);
  if (!parsed.success) {
    throw new MappingError(SEARCH_MAPPING_ERROR, describeIssues(parsed.error), {
      cause: parsed.error,
    });
  }

  const page = parsed.data;
  if (!page.results) {
    return { query, total_results: 0, results: [], duration_ms: durationMs };
  }

  const results: MovieSearchResult[] = page.results.map((item) => ({
    movie_id: item.id,
    title: item.title,
    release_date: item.release_date,
  }));

  return {
    query,
    total_results: page.total_results ?? results.length,
    results,
    duration_ms: durationMs,
  };
}
