import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

export type Component = "gateway" | "api" | "turns" | "finalizer" | "sweeper" | "reporter";

const REDACTED = "***REDACTED***";

// API keys travel in config objects and request headers
const REDACT_PATHS = ["apiKey", "*.apiKey", 'headers["x-api-key"]', '*.headers["x-api-key"]'];

/**
 * Root logger for the process. Pass `destination` to write JSON lines to a
 * stream of your own instead of stdout or `config.file`.
 */
export function createLogger(
  config?: LoggingConfig,
  destination?: pino.DestinationStream,
): Logger {
  const level = config?.level ?? "info";
  const base: pino.LoggerOptions = {
    level,
    base: { service: "decoy" },
    redact: { paths: REDACT_PATHS, censor: REDACTED },
  };

  if (destination) return pino(base, destination);
  if (config?.file) return pino(base, pino.destination(config.file));

  const isJson = config?.json ?? process.env["NODE_ENV"] === "production";
  if (isJson) return pino(base);

  return pino({
    ...base,
    transport: {
      target: "pino-pretty",
      options: { colorize: true, translateTime: "HH:MM:ss", ignore: "pid,hostname,service" },
    },
  });
}

/** Child logger tagging every record with the subsystem that wrote it. */
export function componentLogger(parent: Logger, component: Component): Logger {
  return parent.child({ component });
}
