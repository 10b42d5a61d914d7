// ---------------------------------------------------------------------------
// Hono environment shared by the app, middleware and routes.
// ---------------------------------------------------------------------------

import type pino from "pino";

/** Per-request variables set by middleware. */
export interface AppEnv {
  Variables: {
    requestId: string;
    logger: pino.Logger;
  };
}
