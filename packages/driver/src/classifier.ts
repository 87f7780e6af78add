import type { AnswerHint, ResponsePatternTable, Verdict } from "@aoc-pilot/contracts";
import { DEFAULT_RATE_LIMIT_BACKOFF_MS } from "./constants.js";
import { DEFAULT_RESPONSE_PATTERNS } from "./patterns.js";

// ============================================================================
// Body Normalisation
// ============================================================================

const ENTITIES: Record<string, string> = {
  "&amp;": "&",
  "&apos;": "'",
  "&#39;": "'",
  "&#x27;": "'",
  "&quot;": '"',
  "&nbsp;": " ",
  "&rsquo;": "'",
};

/**
 * Reduce an HTML body to lowercase plain text with single spaces.
 * Tags are dropped rather than parsed; only the sentence wording matters.
 */
export function normalizeResponse(body: string): string {
  return body
    .replace(/<[^>]*>/g, " ")
    .replace(/&(?:amp|apos|quot|nbsp|rsquo|#39|#x27);/gi, (entity) => ENTITIES[entity.toLowerCase()] ?? entity)
    .replace(/’/g, "'")
    .replace(/\s+/g, " ")
    .trim()
    .toLowerCase();
}

/**
 * Earliest position of any phrase in already-normalised text, or -1
 */
function findPhrase(text: string, phrases: readonly string[]): number {
  let earliest = -1;
  for (const phrase of phrases) {
    const index = text.indexOf(normalizeResponse(phrase));
    if (index !== -1 && (earliest === -1 || index < earliest)) {
      earliest = index;
    }
  }
  return earliest;
}

// ============================================================================
// Wait Durations
// ============================================================================

const NUMBER_WORDS: Record<string, number> = {
  a: 1,
  an: 1,
  one: 1,
  two: 2,
  three: 3,
  four: 4,
  five: 5,
  six: 6,
  seven: 7,
  eight: 8,
  nine: 9,
  ten: 10,
};

const UNIT_MS: Record<string, number> = {
  h: 3_600_000,
  m: 60_000,
  s: 1_000,
};

/**
 * One `<amount><unit>` term: "5m", "30s", "1 minute", "one minute", "an hour"
 */
const DURATION_TERM =
  /\b(?:(\d+)\s*|(an?|one|two|three|four|five|six|seven|eight|nine|ten)\s+)(hours?|hrs?|h|minutes?|mins?|m|seconds?|secs?|s)\b/gi;

/** What may sit between two terms of the same duration: "1m 2s", "1 minute and 5 seconds" */
const TERM_SEPARATOR = /^(?:\s|,|and)*$/i;

/**
 * Parse the first duration in a piece of text, in milliseconds.
 * Adjacent terms are summed ("5m 30s" is 330 seconds). Returns null if no duration is found.
 */
export function parseWaitDuration(text: string): number | null {
  let totalMs: number | null = null;
  let previousEnd = -1;

  for (const match of text.matchAll(DURATION_TERM)) {
    const start = match.index ?? 0;
    if (totalMs !== null && !TERM_SEPARATOR.test(text.slice(previousEnd, start))) {
      break;
    }

    const [term, digits, word, unit] = match;
    const amount = digits !== undefined ? parseInt(digits, 10) : (NUMBER_WORDS[(word ?? "").toLowerCase()] ?? 0);
    const unitMs = UNIT_MS[(unit ?? "s").charAt(0).toLowerCase()] ?? 1_000;

    totalMs = (totalMs ?? 0) + amount * unitMs;
    previousEnd = start + term.length;
  }

  return totalMs;
}

// ============================================================================
// Classification
// ============================================================================

/**
 * Duration stated in the sentence that contains position `at`, or after it
 */
function waitStatedAt(text: string, at: number): number | null {
  const sentenceStart = text.lastIndexOf(".", at) + 1;
  return parseWaitDuration(text.slice(sentenceStart));
}

function detectHint(text: string, patterns: ResponsePatternTable): AnswerHint | undefined {
  if (findPhrase(text, patterns.tooHigh) !== -1) return "too_high";
  if (findPhrase(text, patterns.tooLow) !== -1) return "too_low";
  return undefined;
}

/**
 * Classify a submission response body into a verdict.
 *
 * Checked in priority order: already solved, correct, incorrect, rate limited.
 * Anything else is a parse_error carrying the raw body; this never throws.
 *
 * @example
 * ```ts
 * classify("<p>That's the right answer!</p>"); // { kind: "correct" }
 * classify("please wait 5m 30s before trying again"); // { kind: "rate_limited", retryAfterMs: 330000 }
 * ```
 */
export function classify(
  body: string,
  patterns: ResponsePatternTable = DEFAULT_RESPONSE_PATTERNS,
): Verdict {
  const text = normalizeResponse(body);

  if (findPhrase(text, patterns.alreadySolved) !== -1) {
    return { kind: "already_solved" };
  }

  if (findPhrase(text, patterns.correct) !== -1) {
    return { kind: "correct" };
  }

  const incorrectAt = findPhrase(text, patterns.incorrect);
  if (incorrectAt !== -1) {
    const rest = text.slice(incorrectAt);
    const waitAt = findPhrase(rest, patterns.rateLimited);
    const retryAfterMs = waitAt === -1 ? null : waitStatedAt(rest, waitAt);
    const hint = detectHint(rest, patterns);

    return {
      kind: "incorrect",
      ...(hint ? { hint } : {}),
      ...(retryAfterMs !== null ? { retryAfterMs } : {}),
    };
  }

  const limitedAt = findPhrase(text, patterns.rateLimited);
  if (limitedAt !== -1) {
    return {
      kind: "rate_limited",
      retryAfterMs: waitStatedAt(text, limitedAt) ?? DEFAULT_RATE_LIMIT_BACKOFF_MS,
    };
  }

  return {
    kind: "parse_error",
    detail: `Unrecognised judge response (pattern table v${patterns.version})`,
    body,
  };
}
