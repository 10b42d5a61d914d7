// ---------------------------------------------------------------------------
// Error hierarchy for the Movie Info service.
// ---------------------------------------------------------------------------

import type { UpstreamFailure } from "./types.js";

// ── Base error ──────────────────────────────────────────────────────────────

/**
 * Root of all Movie Info domain errors.
 */
export class MovieServiceError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "MovieServiceError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ── Upstream errors ─────────────────────────────────────────────────────────

/** TMDB has no movie with the requested identifier. */
export class MovieNotFoundError extends MovieServiceError {
  public readonly movieId: number;

  constructor(movieId: number, options?: ErrorOptions) {
    super(`Movie with ID ${movieId} not found.`, options);
    this.name = "MovieNotFoundError";
    this.movieId = movieId;
  }
}

/**
 * TMDB answered with a non-2xx status, or could not be reached at all.
 * The failure value produced by the client is kept on the error.
 */
export class UpstreamServiceError extends MovieServiceError {
  public readonly failure: UpstreamFailure;

  constructor(failure: UpstreamFailure, options?: ErrorOptions) {
    super(`External API Error: ${failure.message}`, options);
    this.name = "UpstreamServiceError";
    this.failure = failure;
  }
}

/** The upstream payload lacks a field the public response requires. */
export class MappingError extends MovieServiceError {
  /** Field-level problems, for logs only. */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: ErrorOptions) {
    super(message, options);
    this.name = "MappingError";
    this.issues = issues;
  }
}

// ── Request errors ──────────────────────────────────────────────────────────

/** A path or query parameter failed validation. */
export class RequestValidationError extends MovieServiceError {
  public readonly parameter: string;

  constructor(parameter: string, reason: string, options?: ErrorOptions) {
    super(`Invalid ${parameter}: ${reason}`, options);
    this.name = "RequestValidationError";
    this.parameter = parameter;
  }
}

// ── Infrastructure errors ───────────────────────────────────────────────────

/** A required configuration value is missing or invalid. */
export class ConfigurationError extends MovieServiceError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

/** The movie data capability failed to start and cannot serve requests. */
export class ServiceUnavailableError extends MovieServiceError {
  constructor(options?: ErrorOptions) {
    super(
      "External API Client failed to initialize. Check environment variables.",
      options,
    );
    this.name = "ServiceUnavailableError";
  }
}
