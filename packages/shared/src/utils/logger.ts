import { pino, type DestinationStream, type Logger } from "pino";

export interface LoggerOptions {
  /** Overrides LOG_LEVEL for this logger only. */
  level?: string;
  /** Where log lines go. Defaults to stdout. */
  destination?: DestinationStream;
}

/**
 * Create a Pino logger for one logscope component.
 *
 * Every line is a JSON object carrying the component name, an ISO timestamp
 * and the textual level label ("info", "warn", ...) rather than pino's
 * numeric level.
 *
 * Usage:
 *   const logger = createLogger("loader");
 *   logger.warn({ path }, "Log source not found, skipping");
 *
 * @param component - Name bound to every line as `name`.
 */
export function createLogger(component: string, options: LoggerOptions = {}): Logger {
  const config = {
    name: component,
    level: options.level ?? process.env["LOG_LEVEL"] ?? "info",
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
  };

  return options.destination ? pino(config, options.destination) : pino(config);
}
