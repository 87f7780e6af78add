import { formatPuzzleKey, type DayRef, type PuzzleKey } from "@aoc-pilot/contracts";
import type { FetchLike, JudgeClientConfig, LogContext, Result } from "./types.js";
import { err, ok } from "./types.js";
import {
  DEFAULT_BASE_URL,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
} from "./constants.js";
import { DriverError, describeError } from "./errors.js";
import { log } from "./logger.js";
import type { SessionToken } from "./session.js";

/**
 * The two authenticated operations the judge offers.
 * Neither retries: retry policy belongs to the orchestrator.
 */
export interface JudgeClient {
  /** Raw puzzle input for a day (body text, unmodified) */
  fetchInput(ref: DayRef, token: SessionToken): Promise<Result<string>>;
  /** Raw HTML body the judge returns for an answer */
  submitAnswer(key: PuzzleKey, token: SessionToken, answer: string): Promise<Result<string>>;
}

// ============================================================================
// HTTP Helpers
// ============================================================================

/**
 * Build common headers for judge requests
 */
function buildHeaders(config: JudgeClientConfig, token: SessionToken): Record<string, string> {
  return {
    Cookie: token.cookieHeader(),
    "User-Agent": config.userAgent,
  };
}

/**
 * Statuses the judge uses for a missing or expired session.
 * An input request without a valid session gets a 400 ("please log in").
 */
function isAuthStatus(status: number): boolean {
  return status === 400 || status === 401 || status === 403;
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError");
}

/**
 * Perform one request and map every failure onto a DriverError
 */
async function request(
  config: JudgeClientConfig,
  url: URL,
  init: RequestInit,
  context: LogContext,
): Promise<Result<string>> {
  const fetchImpl: FetchLike = config.fetch ?? fetch;

  let response: Response;
  try {
    response = await fetchImpl(url.toString(), {
      ...init,
      signal: AbortSignal.timeout(config.timeoutMs),
    });
  } catch (error) {
    if (isTimeout(error)) {
      log("error", "Judge request timed out", { ...context, timeoutMs: config.timeoutMs });
      return err(
        new DriverError("TRANSPORT_ERROR", `Request timed out after ${config.timeoutMs}ms`, {
          cause: error,
        }),
      );
    }
    log("error", "Judge request failed", { ...context, error: describeError(error) });
    return err(
      new DriverError("TRANSPORT_ERROR", `Request failed: ${describeError(error)}`, {
        cause: error,
      }),
    );
  }

  if (!response.ok) {
    const errorText = await response.text().catch(() => "");
    if (isAuthStatus(response.status)) {
      log("warn", "Session rejected by judge", { ...context, status: response.status });
      return err(
        new DriverError(
          "AUTH_ERROR",
          `Session rejected by judge (${response.status})${errorText ? `: ${errorText.trim()}` : ""}`,
          { status: response.status },
        ),
      );
    }
    log("error", "Judge API error", { ...context, status: response.status });
    return err(
      new DriverError("TRANSPORT_ERROR", `Judge API error: ${response.status}${response.statusText ? ` ${response.statusText}` : ""}`, {
        status: response.status,
      }),
    );
  }

  try {
    return ok(await response.text());
  } catch (error) {
    log("error", "Failed to read judge response", { ...context, error: describeError(error) });
    return err(
      new DriverError("TRANSPORT_ERROR", `Failed to read response: ${describeError(error)}`, {
        cause: error,
      }),
    );
  }
}

// ============================================================================
// Client
// ============================================================================

/**
 * Create a judge client
 *
 * @example
 * ```ts
 * const client = createJudgeClient({ timeoutMs: 10_000 });
 * const body = await client.fetchInput({ year: 2022, day: 1 }, token);
 * if (body.ok) console.log(body.value.length);
 * ```
 */
export function createJudgeClient(options: Partial<JudgeClientConfig> = {}): JudgeClient {
  const config: JudgeClientConfig = {
    baseUrl: options.baseUrl ?? DEFAULT_BASE_URL,
    userAgent: options.userAgent ?? DEFAULT_USER_AGENT,
    timeoutMs: options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
    fetch: options.fetch,
  };

  return {
    async fetchInput(ref, token) {
      const url = new URL(`/${ref.year}/day/${ref.day}/input`, config.baseUrl);
      const context: LogContext = {
        year: ref.year,
        day: ref.day,
        session: token.fingerprint,
      };

      log("info", "Fetching puzzle input", context);
      const result = await request(
        config,
        url,
        { method: "GET", headers: buildHeaders(config, token) },
        context,
      );
      if (result.ok) {
        log("info", "Puzzle input fetched", { ...context, bytes: result.value.length });
      }
      return result;
    },

    async submitAnswer(key, token, answer) {
      const url = new URL(`/${key.year}/day/${key.day}/answer`, config.baseUrl);
      const context: LogContext = {
        puzzle: formatPuzzleKey(key),
        session: token.fingerprint,
      };

      const form = new URLSearchParams({
        level: String(key.part),
        answer,
      });

      log("info", "Submitting answer", context);
      return request(
        config,
        url,
        {
          method: "POST",
          headers: {
            ...buildHeaders(config, token),
            "Content-Type": "application/x-www-form-urlencoded",
          },
          body: form.toString(),
        },
        context,
      );
    },
  };
}
