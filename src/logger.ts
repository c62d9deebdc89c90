import pino from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "silent";

/**
 * Diagnostics logger. Operator-facing progress goes to the console from the CLI;
 * this one carries structured session and engine events, written to stderr so it
 * never mixes with result output.
 */
export const logger = pino(
  { name: "graph-bench", level: "warn" },
  pino.destination(2)
);

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}
