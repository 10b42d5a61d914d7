// ---------------------------------------------------------------------------
// Movie identifier parsing.
// ---------------------------------------------------------------------------

import type { MovieId } from "../../core/types.js";

export type MovieIdParseResult =
  | { ok: true; movieId: MovieId }
  | { ok: false; raw: string; reason: string };

const DIGITS_RE = /^[0-9]+$/;

/**
 * Parse a path segment into a {@link MovieId}.
 *
 * Only plain decimal digits are accepted: no sign, no exponent, no
 * surrounding whitespace.  The value must be at least 1 and a safe integer.
 */
export function parseMovieId(raw: string): MovieIdParseResult {
  if (!DIGITS_RE.test(raw)) {
    return { ok: false, raw, reason: "must be a positive integer" };
  }

  const value = Number(raw);
  if (!Number.isSafeInteger(value)) {
    return { ok: false, raw, reason: "is too large" };
  }
  if (value < 1) {
    return { ok: false, raw, reason: "must be greater than or equal to 1" };
  }

  return { ok: true, movieId: toMovieId(value) };
}

/** Brand an already-validated integer. */
function toMovieId(value: number): MovieId {
  return value as MovieId;
}
