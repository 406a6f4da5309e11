import { createLogger, format, transports, Logger } from "winston";

/**
 * Console logger tagged with the module name:
 *   2024-01-01T00:00:00.000Z [INFO] [ENGINE] message
 *
 * Silent under NODE_ENV=test so jest output stays readable.
 */
export function createServiceLogger(tag: string): Logger {
  return createLogger({
    level: process.env.LOG_LEVEL || "info",
    silent: process.env.NODE_ENV === "test",
    format: format.combine(
      format.timestamp(),
      format.printf(
        ({ timestamp, level, message }) =>
          `${timestamp} [${level.toUpperCase()}] [${tag}] ${message}`
      )
    ),
    transports: [new transports.Console()],
  });
}
