// ---------------------------------------------------------------------------
// Movie Info -- Application bootstrap.
// ---------------------------------------------------------------------------

import type { Hono } from "hono";
import type pino from "pino";

import type { AppConfig } from "./core/types.js";
import { ConfigurationError } from "./core/errors.js";
import { loadConfig } from "./config/config.js";
import { createLogger } from "./logging/logger.js";
import { TmdbClient } from "./tmdb/tmdb-client.js";
import { MovieCatalog } from "./movies/movie-catalog.js";
import { createApp } from "./api/server.js";
import type { AppEnv } from "./api/env.js";

export interface BuiltApp {
  app: Hono<AppEnv>;
  config: AppConfig;
  logger: pino.Logger;
  /** Null when the TMDB client could not be constructed. */
  catalog: MovieCatalog | null;
}

export interface BuildAppOptions {
  env?: Record<string, string | undefined>;
  /** Overrides the logger built from configuration (tests pass a silent one). */
  logger?: pino.Logger;
}

// ── Main ───────────────────────────────────────────────────────────────────

/**
 * Wire configuration, logging, the TMDB client and the caches into a Hono
 * app.  A missing TMDB credential is logged as fatal but does not stop the
 * service: movie routes answer 503 and the rest keeps serving.
 *
 * @throws ConfigurationError when an environment variable is malformed.
 */
export function buildApp(options: BuildAppOptions = {}): BuiltApp {
  // 1. Load configuration
  const config = loadConfig(options.env);

  // 2. Create logger
  const logger = options.logger ?? createLogger(config.logging);

  // 3. Create the upstream client and the caches around it
  let catalog: MovieCatalog | null = null;
  try {
    const client = new TmdbClient(config.tmdb, logger.child({ module: "tmdb" }));
    catalog = new MovieCatalog(client, config.cache, logger.child({ module: "cache" }));
  } catch (err) {
    if (!(err instanceof ConfigurationError)) {
      throw err;
    }
    logger.fatal(
      { err: { name: err.name, message: err.message } },
      "TMDB client failed to initialize; movie routes disabled",
    );
  }

  // 4. Create Hono app
  const app = createApp({ catalog, logger });

  // 5. Log startup summary
  logger.info(
    {
      port: config.port,
      env: config.env,
      upstream: catalog ? "configured" : "unavailable",
      detailsCacheEntries: config.cache.detailsMaxEntries,
      searchCacheEntries: config.cache.searchMaxEntries,
      cacheFailures: config.cache.cacheFailures,
    },
    "movie-info ready",
  );

  return { app, config, logger, catalog };
}
