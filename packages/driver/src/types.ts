import type { PuzzleKey, TestCase, Verdict } from "@aoc-pilot/contracts";
import type { DriverError } from "./errors.js";

// ============================================================================
// Logging Types
// ============================================================================

export interface LogContext {
  puzzle?: string;
  year?: number;
  day?: number;
  part?: number;
  /** Short hash of the session token, never the token itself */
  session?: string;
  [key: string]: unknown;
}

// ============================================================================
// Results
// ============================================================================

/**
 * Outcome of a core operation. Failures are values, not exceptions.
 */
export type Result<T, E = DriverError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

// ============================================================================
// HTTP
// ============================================================================

/**
 * The subset of `fetch` the judge client needs (injectable for tests)
 */
export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

/**
 * Configuration for the judge HTTP client
 */
export interface JudgeClientConfig {
  /** Judge base URL (e.g., https://adventofcode.com) */
  baseUrl: string;
  /** User-Agent header sent with every request */
  userAgent: string;
  /** Per-request timeout in milliseconds */
  timeoutMs: number;
  /** fetch implementation (defaults to the global fetch) */
  fetch?: FetchLike;
}

// ============================================================================
// Solutions
// ============================================================================

export type SolutionOutput = string | number | bigint;

/**
 * A user solution: a synchronous transformation of the puzzle input
 */
export type SolutionFn = (input: string) => SolutionOutput;

export interface TestCaseResult {
  name: string;
  passed: boolean;
  expected: string;
  received: string;
}

// ============================================================================
// Orchestrator Types
// ============================================================================

export type OrchestratorStateName =
  | "idle"
  | "testing"
  | "input_resolved"
  | "answer_computed"
  | "submitting"
  | "done"
  | "failed";

/**
 * What the orchestrator does when the judge asks it to wait:
 * - wait: sleep the stated duration, then resubmit once
 * - surface: return the rate-limited verdict to the caller
 */
export type RateLimitPolicy = "wait" | "surface";

export interface StoragePaths {
  /** Root of the input cache (`<inputDir>/<year>/<day>.txt`) */
  inputDir: string;
  /** Root of the submission records (`<cacheDir>/<year>/<day>.json`) */
  cacheDir: string;
}

export type RunOutcome =
  | {
      status: "done";
      key: PuzzleKey;
      answer: string;
      verdict: Verdict;
      /** Submissions actually sent to the judge */
      submissions: number;
      /** Non-fatal problems, e.g. a submission record that could not be saved */
      warnings: string[];
      trace: OrchestratorStateName[];
    }
  | {
      status: "tests_failed";
      key: PuzzleKey;
      tests: TestCaseResult[];
      trace: OrchestratorStateName[];
    }
  | {
      status: "failed";
      key: PuzzleKey;
      error: DriverError;
      trace: OrchestratorStateName[];
    };

export interface RunRequest {
  key: PuzzleKey;
  solution: SolutionFn;
  token: import("./session.js").SessionToken;
  paths: StoragePaths;
  /** Local examples checked before anything touches the network */
  tests?: TestCase[];
}
