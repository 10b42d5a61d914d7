// ---------------------------------------------------------------------------
// Hono application factory.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type pino from "pino";
import type { MovieCatalog } from "../movies/movie-catalog.js";

import { requestIdMiddleware } from "./middleware/request-id.js";
import { createRequestLogger } from "../logging/context.js";
import { errorHandler } from "./middleware/error-handler.js";

import { movieRoutes } from "./routes/movies.js";
import { searchRoutes } from "./routes/search.js";
import { healthRoutes } from "./routes/health.js";
import type { AppEnv } from "./env.js";

// ── Dependency bundle ──────────────────────────────────────────────────────

export interface AppDependencies {
  /**
   * Cached TMDB access.  Null when the client could not be constructed;
   * movie routes then answer 503 while `/` and `/health` keep working.
   */
  catalog: MovieCatalog | null;
  logger: pino.Logger;
}

// ── App factory ────────────────────────────────────────────────────────────

/**
 * Create and configure the Hono application.
 *
 * Middleware stack (applied in order):
 * 1. Request ID generation (`X-Request-ID`).
 * 2. Request-scoped child logger attached to context.
 * 3. Route handlers.
 * 4. Global error handler (maps domain errors to HTTP status codes).
 */
export function createApp(deps: AppDependencies): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // ── Global middleware ──────────────────────────────────────────────────

  app.use("*", requestIdMiddleware());
  app.use("*", createRequestLogger(deps.logger));

  // ── Routes ────────────────────────────────────────────────────────────

  app.get("/", (c) =>
    c.json({
      message: "Movie Info API is running.",
      routes: ["/movies/:movieId", "/search?query=", "/health", "/health/cache"],
    }),
  );

  app.route("/movies", movieRoutes({ catalog: deps.catalog }));
  app.route("/search", searchRoutes({ catalog: deps.catalog }));
  app.route("/health", healthRoutes({ catalog: deps.catalog }));

  // ── Error handler ─────────────────────────────────────────────────────

  app.onError(errorHandler);

  return app;
}
