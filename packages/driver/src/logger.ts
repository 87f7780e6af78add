import type { LogContext } from "./types.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

let enabled = isTruthy(process.env.AOC_PILOT_LOG);

function isTruthy(value: string | undefined): boolean {
  return value === "1" || value?.toLowerCase() === "true";
}

/**
 * Turn driver logging on or off.
 * Logging is off unless AOC_PILOT_LOG is set, so the core stays silent
 * for callers that own presentation.
 */
export function configureLogging(options: { enabled: boolean }): void {
  enabled = options.enabled;
}

export function isLoggingEnabled(): boolean {
  return enabled;
}

/**
 * Logging helper
 * Includes context like puzzle, year/day/part, and session fingerprint when relevant
 */
export function log(
  level: LogLevel,
  message: string,
  context?: LogContext,
): void {
  if (!enabled) return;

  const timestamp = new Date().toISOString();
  const contextStr = context ? ` ${JSON.stringify(context)}` : "";
  console[level](`[${timestamp}] [driver] ${message}${contextStr}`);
}
