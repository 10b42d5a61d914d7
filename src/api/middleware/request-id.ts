// ---------------------------------------------------------------------------
// Request ID middleware for Hono.
// ---------------------------------------------------------------------------

import type { Context, Next } from "hono";
import type { AppEnv } from "../env.js";

/** UUIDs or short alphanumeric tokens; anything else is replaced. */
const SAFE_REQUEST_ID_RE = /^[a-zA-Z0-9_-]{1,128}$/;

/**
 * Returns a Hono middleware that assigns a request ID to every incoming
 * request, stores it on the context as `"requestId"` and echoes it in the
 * `X-Request-ID` response header.
 *
 * A client-supplied `X-Request-ID` is reused only when it matches
 * {@link SAFE_REQUEST_ID_RE}, which keeps newlines and control characters
 * out of the logs.
 */
export function requestIdMiddleware(): (
  c: Context<AppEnv>,
  next: Next,
) => Promise<void> {
  return async (c: Context<AppEnv>, next: Next): Promise<void> => {
    const incoming = c.req.header("x-request-id");
    const requestId =
      incoming !== undefined && SAFE_REQUEST_ID_RE.test(incoming)
        ? incoming
        : crypto.randomUUID();

    c.set("requestId", requestId);
    c.header("X-Request-ID", requestId);

    await next();
  };
}
