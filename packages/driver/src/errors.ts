/**
 * Error codes surfaced by the driver
 *
 * - FETCH_ERROR: puzzle input could not be fetched or cached
 * - AUTH_ERROR: session token missing or rejected by the judge (never retried)
 * - TRANSPORT_ERROR: network failure, timeout, or unexpected HTTP status
 * - SOLUTION_ERROR: the user's solution function threw
 * - CONFIG_ERROR: configuration or challenge table is invalid
 */
export type DriverErrorCode =
  | "FETCH_ERROR"
  | "AUTH_ERROR"
  | "TRANSPORT_ERROR"
  | "SOLUTION_ERROR"
  | "CONFIG_ERROR";

/**
 * Custom error class for driver failures
 *
 * Core operations return these inside a {@link Result} instead of throwing.
 * The one exception is SOLUTION_ERROR, which the orchestrator rethrows.
 *
 * @example
 * ```ts
 * const input = await cache.get({ year: 2022, day: 1 }, token);
 * if (!input.ok && input.error.code === "AUTH_ERROR") {
 *   // Session expired: do not retry
 * }
 * ```
 */
export class DriverError extends Error {
  public status?: number;

  /**
   * @param code - Error code (e.g., "AUTH_ERROR", "TRANSPORT_ERROR")
   * @param message - Human-readable error message
   * @param options.status - HTTP status, when the judge answered
   * @param options.cause - Underlying error
   */
  constructor(
    public code: DriverErrorCode,
    message: string,
    options: { status?: number; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "DriverError";
    this.status = options.status;
    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DriverError);
    }
  }
}

/**
 * Message of an unknown thrown value
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
