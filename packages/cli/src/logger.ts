/**
 * Structured logging.
 *
 * Uses pino for JSON-structured logs on stderr, keeping stdout free for
 * the CSV output. Pretty-printed through pino-pretty in development.
 */

import pino from "pino";
import type { DestinationStream, Logger } from "pino";
import type { Rejection, RejectionHandler } from "@ledger-replay/ledger";
import type { AppConfig } from "./config.js";

const STDERR_FD = 2;

/**
 * Create the run logger.
 *
 * @param destination overrides stderr (used by tests)
 */
export function createLogger(
  config: Pick<AppConfig, "LOG_LEVEL" | "NODE_ENV">,
  destination?: DestinationStream,
): Logger {
  if (destination !== undefined) {
    return pino({ level: config.LOG_LEVEL }, destination);
  }

  if (config.NODE_ENV === "development") {
    return pino({
      level: config.LOG_LEVEL,
      transport: { target: "pino-pretty", options: { destination: STDERR_FD } },
    });
  }

  return pino({ level: config.LOG_LEVEL }, pino.destination(STDERR_FD));
}

/**
 * Log a rejected record at warn level.
 */
export function logRejection(logger: Logger, rejection: Rejection): void {
  logger.warn(
    {
      code: rejection.code,
      kind: rejection.kind,
      client: rejection.client,
      tx: rejection.tx,
    },
    rejection.message,
  );
}

/**
 * Adapt a logger to the processor's rejection hook.
 */
export function rejectionLogger(logger: Logger): RejectionHandler {
  return (rejection) => {
    logRejection(logger, rejection);
  };
}
