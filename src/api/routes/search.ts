// ---------------------------------------------------------------------------
// Search routes.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type { MovieCatalog } from "../../movies/movie-catalog.js";
import { toSearchResponse } from "../../movies/movie-mapper.js";
import {
  RequestValidationError,
  ServiceUnavailableError,
  UpstreamServiceError,
} from "../../core/errors.js";
import type { AppEnv } from "../env.js";

/** Shortest accepted search term. */
export const MIN_QUERY_LENGTH = 2;

/** Dependencies required by search routes. */
export interface SearchRouteDeps {
  /** Null when the TMDB client failed to initialize. */
  catalog: MovieCatalog | null;
}

/**
 * Mounts search endpoints:
 *
 * - `GET /search?query=<title>` -- Movies whose title matches, served from
 *   the search cache when possible.  The query string is used verbatim as
 *   the cache key.
 */
export function searchRoutes(deps: SearchRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.get("/", async (c) => {
    if (!deps.catalog) {
      throw new ServiceUnavailableError();
    }

    const query = c.req.query("query");
    if (query === undefined) {
      throw new RequestValidationError("query", "parameter is required");
    }
    if (query.length < MIN_QUERY_LENGTH) {
      throw new RequestValidationError(
        "query",
        `must be at least ${MIN_QUERY_LENGTH} characters`,
      );
    }

    const { value, durationMs } = await deps.catalog.searchMovies(query);

    if (value.kind === "error") {
      throw new UpstreamServiceError(value.error);
    }
    if (value.kind === "not_found") {
      // The client never reports not_found for searches; treat it as empty.
      return c.json({ query, total_results: 0, results: [], duration_ms: durationMs });
    }

    return c.json(toSearchResponse(query, value.payload, durationMs));
  });

  return app;
}
