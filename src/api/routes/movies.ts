// ---------------------------------------------------------------------------
// Movie detail routes.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type { MovieCatalog } from "../../movies/movie-catalog.js";
import { toMovieDetails } from "../../movies/movie-mapper.js";
import { parseMovieId } from "../../domain/movie/movie-id.js";
import {
  MovieNotFoundError,
  RequestValidationError,
  ServiceUnavailableError,
  UpstreamServiceError,
} from "../../core/errors.js";
import type { AppEnv } from "../env.js";

/** Dependencies required by movie routes. */
export interface MovieRouteDeps {
  /** Null when the TMDB client failed to initialize. */
  catalog: MovieCatalog | null;
}

/**
 * Mounts movie endpoints:
 *
 * - `GET /movies/:movieId` -- Details for one movie, served from the
 *   details cache when possible.  The response's `duration_ms` is the time
 *   the cached lookup took.
 */
export function movieRoutes(deps: MovieRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.get("/:movieId", async (c) => {
    if (!deps.catalog) {
      throw new ServiceUnavailableError();
    }

    const rawId = c.req.param("movieId");
    const parsed = parseMovieId(rawId);
    if (!parsed.ok) {
      throw new RequestValidationError("movie_id", `"${rawId}" ${parsed.reason}`);
    }

    const { value, durationMs } = await deps.catalog.getMovie(parsed.movieId);

    switch (value.kind) {
      case "not_found":
        throw new MovieNotFoundError(parsed.movieId);
      case "error":
        throw new UpstreamServiceError(value.error);
      case "ok":
        return c.json(toMovieDetails(value.payload, durationMs));
    }
  });

  return app;
}
