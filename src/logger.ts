import pino from "pino";

/**
 * Creates a configured pino logger instance for structured JSON output.
 *
 * - Returns log level as string label (not numeric) for readability
 * - ISO 8601 timestamps
 * - Level configurable via `LOG_LEVEL` env var, defaults to `info`
 * - Writes to stderr unless a destination is given, so stdout stays free for
 *   the OPML document or diff report
 *
 * @param level - Optional override for log level (defaults to LOG_LEVEL env var or "info")
 * @param destination - Optional stream to write to (defaults to stderr)
 */
export function createLogger(
  level?: string,
  destination?: pino.DestinationStream,
): pino.Logger {
  return pino(
    {
      level: level ?? process.env["LOG_LEVEL"] ?? "info",
      formatters: {
        level(label: string) {
          return { level: label };
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    destination ?? pino.destination(2),
  );
}
