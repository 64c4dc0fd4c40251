/**
 * Process-wide pino logger.
 *
 * @module utils/logger
 * @license AGPL-3.0-or-later
 */

import pino from "pino";

let logger: pino.Logger | undefined;

export function createLogger(level = "info"): pino.Logger {
  if (logger) {
    logger.level = level;
    return logger;
  }

  logger = pino({
    level,
    base: { service: "ballot-service" },
    timestamp: pino.stdTimeFunctions.isoTime,
  });

  return logger;
}

export function getLogger(): pino.Logger {
  if (!logger) return createLogger(process.env.LOG_LEVEL ?? "info");
  return logger;
}
