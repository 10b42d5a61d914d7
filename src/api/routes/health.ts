// ---------------------------------------------------------------------------
// Health check routes.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type { MovieCatalog } from "../../movies/movie-catalog.js";
import { ServiceUnavailableError } from "../../core/errors.js";
import type { AppEnv } from "../env.js";

/** Dependencies required by health routes. */
export interface HealthRouteDeps {
  catalog: MovieCatalog | null;
}

const startedAt = Date.now();

/**
 * Mounts health-check endpoints:
 *
 * - `GET /health`       -- Basic liveness probe; reports whether the
 *   upstream client is configured.  Answers 200 either way.
 * - `GET /health/cache` -- Size and hit/miss/eviction counters per cache.
 */
export function healthRoutes(deps: HealthRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // GET /health
  app.get("/", (c) => {
    const uptimeMs = Date.now() - startedAt;
    return c.json({
      status: "ok",
      uptime: uptimeMs,
      timestamp: new Date().toISOString(),
      upstream: deps.catalog ? "configured" : "unavailable",
    });
  });

  // GET /health/cache
  app.get("/cache", (c) => {
    if (!deps.catalog) {
      throw new ServiceUnavailableError();
    }
    return c.json({ caches: deps.catalog.cacheStats() });
  });

  return app;
}
