// ---------------------------------------------------------------------------
// Pino structured JSON logger factory.
// ---------------------------------------------------------------------------

import pino from "pino";
import type { LoggingConfig } from "../core/types.js";

/** Re-export pino's Logger type for convenience. */
export type Logger = pino.Logger;

const SERVICE_NAME = "movie-info";

/**
 * Key paths scrubbed from every log line.  The TMDB credential travels as
 * `apiKey` in config objects and as a bearer `Authorization` header.
 */
export const SECRET_PATHS: readonly string[] = [
  "apiKey",
  "*.apiKey",
  "headers.Authorization",
  "*.headers.Authorization",
  "req.headers.authorization",
];

/**
 * Create the service logger.
 *
 * Lines are JSON with `service` and `version` base fields and a standard
 * `err` serializer.  With `prettyPrint` the output goes through the
 * `pino-pretty` transport instead, and `destination` is ignored.
 */
export function createLogger(
  config: LoggingConfig,
  destination?: pino.DestinationStream,
): Logger {
  const options: pino.LoggerOptions = {
    level: config.level,
    base: {
      service: SERVICE_NAME,
      version: process.env["APP_VERSION"] ?? "dev",
    },
    serializers: { err: pino.stdSerializers.err },
    redact: config.redactSecrets
      ? { paths: [...SECRET_PATHS], censor: "[REDACTED]" }
      : undefined,
  };

  if (config.prettyPrint) {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname,service,version",
        },
      },
    });
  }

  return destination ? pino(options, destination) : pino(options);
}
