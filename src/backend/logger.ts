/**
 * logger.ts — Shared pino logger for all backend modules
 *
 * A single pino instance is created at startup and exported here.
 * Every module should import `logger` and call `.child({ module: "<name>" })`
 * to create a scoped logger that includes the module name in every entry.
 *
 * Fastify is built from the same `loggerOptions`, so request logs and
 * controller logs share level and formatting.
 *
 * Log level:
 *   • BTPAD_LOG_LEVEL env var overrides everything (e.g. "debug", "trace")
 *   • NODE_ENV === "production" → "info"   (NDJSON, no pretty-print)
 *   • NODE_ENV === "test"       → "silent"
 *   • otherwise                → "debug"  (pino-pretty, colorised)
 */

import pino, { type LoggerOptions } from "pino";

const env    = process.env.NODE_ENV;
const plain  = env === "production" || env === "test";
const level  = process.env.BTPAD_LOG_LEVEL ?? (env === "production" ? "info" : env === "test" ? "silent" : "debug");

export const loggerOptions: LoggerOptions = plain
  ? { level }
  : {
      level,
      transport: {
        target:  "pino-pretty",
        options: { colorize: true },
      },
    };

export const logger = pino(loggerOptions);
