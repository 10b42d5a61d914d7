// ---------------------------------------------------------------------------
// Hono error handler: maps domain errors to HTTP responses.
// ---------------------------------------------------------------------------

import type { Context } from "hono";
import {
  MappingError,
  MovieNotFoundError,
  RequestValidationError,
  ServiceUnavailableError,
  UpstreamServiceError,
} from "../../core/errors.js";
import type { AppEnv } from "../env.js";

/**
 * Hono `onError` handler that inspects the thrown error and returns an
 * appropriate HTTP status code with a JSON body of the form
 * `{ error, type }`.
 *
 * Mapping:
 * - `RequestValidationError`  -> 400 Bad Request
 * - `MovieNotFoundError`      -> 404 Not Found
 * - `UpstreamServiceError`    -> 500 (`upstream_error` / `network_error`)
 * - `MappingError`            -> 500 (`mapping_error`)
 * - `ServiceUnavailableError` -> 503 Service Unavailable
 * - Everything else           -> 500 Internal Server Error
 *
 * Upstream payloads never reach the client; mapping details go to the log.
 */
export function errorHandler(err: Error, c: Context<AppEnv>): Response {
  const isProduction = process.env["NODE_ENV"] === "production";
  const logger = c.get("logger");

  if (err instanceof RequestValidationError) {
    return c.json({ error: err.message, type: "validation_error" }, 400);
  }

  if (err instanceof MovieNotFoundError) {
    return c.json({ error: err.message, type: "not_found" }, 404);
  }

  if (err instanceof UpstreamServiceError) {
    return c.json({ error: err.message, type: err.failure.code }, 500);
  }

  if (err instanceof MappingError) {
    logger?.error({ issues: err.issues }, "Validation/mapping error");
    return c.json({ error: err.message, type: "mapping_error" }, 500);
  }

  if (err instanceof ServiceUnavailableError) {
    return c.json({ error: err.message, type: "service_unavailable" }, 503);
  }

  logger?.error({ err }, "Unhandled error");

  // Default: 500 -- NEVER leak internal error details in production.
  const message = isProduction ? "Internal server error" : err.message;

  return c.json({ error: message, type: "internal_error" }, 500);
}
