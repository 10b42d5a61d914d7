// ---------------------------------------------------------------------------
// TmdbClient – thin HTTP client for the TMDB v3 API.
//
// Detail endpoint: GET ${baseUrl}/movie/{id}
// Search endpoint: GET ${baseUrl}/search/movie?query=...
// Authentication:  Authorization: Bearer <API read access token>
//
// Every outcome is returned as an UpstreamResult value; nothing is thrown
// after construction.  One attempt per call, no retries.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

import type {
  MovieId,
  TmdbConfig,
  UpstreamFailure,
  UpstreamPayload,
  UpstreamResult,
} from "../core/types.js";
import { UpstreamErrorCode } from "../core/types.js";
import { ConfigurationError } from "../core/errors.js";

/** Used when TMDB's error body carries no `status_message`. */
export const UNKNOWN_API_ERROR = "Unknown API error";

/** Used when a 2xx body cannot be parsed into a JSON object. */
export const MALFORMED_BODY_ERROR = "Upstream returned a malformed JSON body";

function isRecord(value: unknown): value is UpstreamPayload {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Options for a single request. */
interface RequestOptions {
  /** Log bindings identifying the call (movie id or query). */
  context: Record<string, unknown>;
  /** Map HTTP 404 to `not_found` instead of an error. */
  notFoundIsAbsence: boolean;
}

export class TmdbClient {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number | null;
  private readonly logger: Logger;

  /**
   * @throws ConfigurationError when the API key or base URL is missing.
   */
  constructor(config: TmdbConfig, logger: Logger) {
    if (!config.apiKey) {
      throw new ConfigurationError(
        "TMDB_API_KEY environment variable is not set.",
      );
    }
    if (!config.baseUrl) {
      throw new ConfigurationError(
        "TMDB_BASE_URL environment variable is not set.",
      );
    }

    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.headers = {
      Authorization: `Bearer ${config.apiKey}`,
      Accept: "application/json",
    };
    this.timeoutMs = config.timeoutMs;
    this.logger = logger.child({ component: "TmdbClient" });
  }

  // ── Operations ──────────────────────────────────────────────────────────

  /** Fetch the full detail record of one movie. */
  fetchDetails(movieId: MovieId): Promise<UpstreamResult> {
    return this.request(`${this.baseUrl}/movie/${movieId}`, {
      context: { movieId },
      notFoundIsAbsence: true,
    });
  }

  /** Search movies by title.  Never yields `not_found`. */
  search(query: string): Promise<UpstreamResult> {
    const url = new URL(`${this.baseUrl}/search/movie`);
    url.searchParams.set("query", query);

    return this.request(url.toString(), {
      context: { query },
      notFoundIsAbsence: false,
    });
  }

  // ── Private ─────────────────────────────────────────────────────────────

  private async request(
    url: string,
    options: RequestOptions,
  ): Promise<UpstreamResult> {
    this.logger.debug({ ...options.context, url }, "Requesting TMDB");

    let response: Response;
    try {
      response = await fetch(url, {
        headers: this.headers,
        signal:
          this.timeoutMs !== null
            ? AbortSignal.timeout(this.timeoutMs)
            : undefined,
      });
    } catch (error: unknown) {
      return this.fail(options, {
        code: UpstreamErrorCode.NETWORK,
        message: this.describeTransportError(error),
        status: null,
      });
    }

    if (response.status === 404 && options.notFoundIsAbsence) {
      this.logger.debug(options.context, "TMDB reported not found");
      return { kind: "not_found" };
    }

    if (!response.ok) {
      return this.fail(options, {
        code: UpstreamErrorCode.UPSTREAM,
        message: await readStatusMessage(response),
        status: response.status,
      });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error: unknown) {
      // A body that breaks off mid-stream is a transport problem, not a
      // parse problem.
      if (!(error instanceof SyntaxError)) {
        return this.fail(options, {
          code: UpstreamErrorCode.NETWORK,
          message: this.describeTransportError(error),
          status: null,
        });
      }
      body = undefined;
    }

    if (!isRecord(body)) {
      return this.fail(options, {
        code: UpstreamErrorCode.UPSTREAM,
        message: MALFORMED_BODY_ERROR,
        status: response.status,
      });
    }

    return { kind: "ok", payload: body };
  }

  private fail(
    options: RequestOptions,
    failure: UpstreamFailure,
  ): UpstreamResult {
    this.logger.warn(
      { ...options.context, ...failure },
      "TMDB request failed",
    );
    return { kind: "error", error: failure };
  }

  /**
   * Flatten fetch's error shapes into one readable message.  Node's fetch
   * reports DNS and socket failures as `TypeError("fetch failed")` with the
   * real reason on `cause`.
   */
  private describeTransportError(error: unknown): string {
    if (!(error instanceof Error)) {
      return String(error);
    }

    if (error.name === "TimeoutError" || error.name === "AbortError") {
      return this.timeoutMs !== null
        ? `Request timed out after ${this.timeoutMs}ms`
        : "Request was aborted";
    }

    const cause: unknown = error.cause;
    if (cause instanceof Error && cause.message) {
      return `${error.message}: ${cause.message}`;
    }

    return error.message;
  }
}

/** Extract TMDB's `status_message` from an error response body. */
async function readStatusMessage(response: Response): Promise<string> {
  const body: unknown = await response.json().catch(() => undefined);
  const message = isRecord(body) ? body["status_message"] : undefined;
  return typeof message === "string" && message !== ""
    ? message
    : UNKNOWN_API_ERROR;
}
