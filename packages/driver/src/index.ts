/**
 * @aoc-pilot/driver - fetch, solve, and submit puzzle answers
 *
 * - Orchestrator.run: input (cached) → solution → submission → verdict
 * - createJudgeClient: the two authenticated judge requests
 * - classify: judge HTML → structured verdict
 *
 * Security: the session token grants full access to the account.
 * - It is only ever sent in the Cookie header
 * - Logs and serialised tokens show a fingerprint, never the value
 */

export { Orchestrator, type OrchestratorOptions } from "./orchestrator.js";
export { runChallengeTable, type ChallengeRunOptions } from "./challenges.js";
export { createJudgeClient, type JudgeClient } from "./judge-client.js";
export { classify, normalizeResponse, parseWaitDuration } from "./classifier.js";
export { BUNDLED_PATTERNS_PATH, DEFAULT_RESPONSE_PATTERNS, loadResponsePatterns } from "./patterns.js";
export { InputCache, normalizeInput, resolveInputPath } from "./input-cache.js";
export { COOLDOWN_FILE, SubmissionStore, resolveRecordPath } from "./submission-store.js";
export { CooldownTracker, withSubmissionLock } from "./submission-lock.js";
export { runSolution, runTestCases } from "./runner.js";
export { SessionToken, loadSessionToken } from "./session.js";
export {
  loadChallengeTable,
  loadDriverConfig,
  loadEnvFiles,
  parseChallengeTable,
  resolveSessionToken,
  type DriverConfig,
} from "./config.js";
export { DriverError, type DriverErrorCode } from "./errors.js";
export { configureLogging, isLoggingEnabled, log, type LogLevel } from "./logger.js";
export * from "./constants.js";
export type {
  FetchLike,
  JudgeClientConfig,
  LogContext,
  OrchestratorStateName,
  RateLimitPolicy,
  Result,
  RunOutcome,
  RunRequest,
  SolutionFn,
  SolutionOutput,
  StoragePaths,
  TestCaseResult,
} from "./types.js";
export { ok, err } from "./types.js";
