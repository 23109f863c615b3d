import { destination, pino } from "pino";
import type { LogLevel } from "../core/config/schema.js";

export interface Logger {
  debug?(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

/**
 * JSON-lines logger on stderr, leaving stdout to the run summary.
 */
export function createLogger(level: LogLevel = "info"): Logger {
  return pino({ name: "locomo-mc10", level }, destination(2));
}
