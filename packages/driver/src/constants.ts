// ============================================================================
// Judge Endpoints
// ============================================================================

/** Base URL of the puzzle judge */
export const DEFAULT_BASE_URL = "https://adventofcode.com";

/**
 * User-Agent sent with every request.
 * The judge asks automated tools to identify themselves.
 */
export const DEFAULT_USER_AGENT = "aoc-pilot/0.1.0 (node)";

/** Per-request timeout in milliseconds (15 seconds) */
export const DEFAULT_REQUEST_TIMEOUT_MS = 15_000;

// ============================================================================
// Rate Limiting
// ============================================================================

/**
 * Wait assumed when the judge reports a cooldown but the duration
 * cannot be read from the response (60 seconds)
 */
export const DEFAULT_RATE_LIMIT_BACKOFF_MS = 60_000;

/** Resubmissions allowed after a rate-limit verdict when waiting is enabled */
export const MAX_RATE_LIMIT_RESUBMITS = 1;

// ============================================================================
// Local Storage
// ============================================================================

/** Directory for cached puzzle inputs (`<dir>/<year>/<day>.txt`) */
export const DEFAULT_INPUT_DIR = "inputs";

/** Directory for submission records (`<dir>/<year>/<day>.json`) */
export const DEFAULT_CACHE_DIR = "cache";

/** File holding the session cookie value */
export const DEFAULT_SESSION_FILE = ".session.txt";
