// ---------------------------------------------------------------------------
// Typed configuration loader.
// Reads environment variables, validates them with Zod, and fills defaults.
// ---------------------------------------------------------------------------

import { z } from "zod";
import type { AppConfig } from "../core/types.js";
import { ConfigurationError } from "../core/errors.js";

/** Unset and whitespace-only variables are treated the same. */
function blankAsUndefined(value: unknown): unknown {
  return typeof value === "string" && value.trim() === "" ? undefined : value;
}

const optionalString = z.preprocess(blankAsUndefined, z.string().optional());

const flag = (fallback: "true" | "false") =>
  z
    .preprocess(
      blankAsUndefined,
      z.enum(["true", "false", "1", "0"]).default(fallback),
    )
    .transform((v) => v === "true" || v === "1");

const positiveInt = (fallback: number) =>
  z.preprocess(
    blankAsUndefined,
    z.coerce.number().int().min(1).default(fallback),
  );

// ── Zod schema ──────────────────────────────────────────────────────────────

export const EnvSchema = z.object({
  NODE_ENV: z.preprocess(
    blankAsUndefined,
    z.enum(["development", "test", "production"]).default("development"),
  ),
  PORT: z.preprocess(
    blankAsUndefined,
    z.coerce.number().int().min(1).max(65_535).default(8000),
  ),
  LOG_LEVEL: z.preprocess(
    blankAsUndefined,
    z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .default("info"),
  ),
  LOG_PRETTY: flag("false"),

  // The TMDB variables are optional here: their absence disables the movie
  // routes instead of stopping the process.
  TMDB_BASE_URL: z.preprocess(blankAsUndefined, z.string().url().optional()),
  TMDB_API_KEY: optionalString,
  TMDB_TIMEOUT_MS: z.preprocess(
    blankAsUndefined,
    z.coerce.number().int().positive().optional(),
  ),

  CACHE_DETAILS_MAX_ENTRIES: positiveInt(128),
  CACHE_SEARCH_MAX_ENTRIES: positiveInt(32),
  CACHE_FAILURES: flag("true"),
});

/**
 * Load the application configuration from environment variables.
 *
 * Everything except the TMDB credentials has a default, so the service can
 * start locally with nothing but `TMDB_BASE_URL` and `TMDB_API_KEY` set.
 *
 * @throws ConfigurationError when a variable is present but malformed.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`,
    );
    throw new ConfigurationError(
      `Invalid environment configuration: ${problems.join("; ")}`,
    );
  }

  const vars = parsed.data;

  return {
    env: vars.NODE_ENV,
    port: vars.PORT,

    logging: {
      level: vars.LOG_LEVEL,
      prettyPrint: vars.LOG_PRETTY,
      redactSecrets: true,
    },

    tmdb: {
      baseUrl: vars.TMDB_BASE_URL ?? null,
      apiKey: vars.TMDB_API_KEY ?? null,
      timeoutMs: vars.TMDB_TIMEOUT_MS ?? null,
    },

    cache: {
      detailsMaxEntries: vars.CACHE_DETAILS_MAX_ENTRIES,
      searchMaxEntries: vars.CACHE_SEARCH_MAX_ENTRIES,
      cacheFailures: vars.CACHE_FAILURES,
    },
  };
}
