import { formatPuzzleKey, type PuzzleKey, type ResponsePatternTable, type Verdict } from "@aoc-pilot/contracts";
import type {
  LogContext,
  OrchestratorStateName,
  RateLimitPolicy,
  RunOutcome,
  RunRequest,
  TestCaseResult,
} from "./types.js";
import { MAX_RATE_LIMIT_RESUBMITS } from "./constants.js";
import { classify } from "./classifier.js";
import { DriverError, describeError } from "./errors.js";
import { InputCache } from "./input-cache.js";
import type { JudgeClient } from "./judge-client.js";
import { log } from "./logger.js";
import { DEFAULT_RESPONSE_PATTERNS } from "./patterns.js";
import { runSolution, runTestCases } from "./runner.js";
import type { SessionToken } from "./session.js";
import { CooldownTracker, withSubmissionLock } from "./submission-lock.js";
import { SubmissionStore } from "./submission-store.js";

export interface OrchestratorOptions {
  client: JudgeClient;
  /** Default: "surface" */
  rateLimitPolicy?: RateLimitPolicy;
  /** Response phrases (default: bundled table) */
  patterns?: ResponsePatternTable;
  /** Account cooldowns (default: shared by every orchestrator in the process) */
  cooldowns?: CooldownTracker;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

const sharedCooldowns = new CooldownTracker();

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Submission state threaded through one run
 */
interface SubmitContext {
  key: PuzzleKey;
  token: SessionToken;
  answer: string;
  store: SubmissionStore;
  log: LogContext;
  warnings: string[];
}

type SubmitOutcome =
  | { ok: true; verdict: Verdict; submissions: number; warnings: string[] }
  | { ok: false; error: DriverError; submissions: number };

/**
 * Drives one puzzle from input to verdict:
 * `idle → (testing) → input_resolved → answer_computed → submitting → done`,
 * with `failed` reachable from any step.
 *
 * Never prints and never exits; the caller decides how to present the outcome.
 */
export class Orchestrator {
  private readonly client: JudgeClient;
  private readonly rateLimitPolicy: RateLimitPolicy;
  private readonly patterns: ResponsePatternTable;
  private readonly cooldowns: CooldownTracker;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  /** One cache per input dir, so concurrent runs for the same day share a fetch */
  private readonly inputCaches = new Map<string, InputCache>();

  constructor(options: OrchestratorOptions) {
    this.client = options.client;
    this.rateLimitPolicy = options.rateLimitPolicy ?? "surface";
    this.patterns = options.patterns ?? DEFAULT_RESPONSE_PATTERNS;
    this.cooldowns = options.cooldowns ?? sharedCooldowns;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  /**
   * Resolve input, compute the answer, and submit it unless the outcome is already known.
   *
   * @returns `done` with a verdict, `tests_failed`, or `failed` (AUTH_ERROR / FETCH_ERROR)
   * @throws {DriverError} SOLUTION_ERROR when the solution throws, with the original error as `cause`
   */
  async run(request: RunRequest): Promise<RunOutcome> {
    const { key, solution, token, paths } = request;
    const trace: OrchestratorStateName[] = ["idle"];
    const context: LogContext = { puzzle: formatPuzzleKey(key), session: token.fingerprint };

    const failed = (error: DriverError): RunOutcome => {
      trace.push("failed");
      log("error", "Run failed", { ...context, code: error.code, error: error.message });
      return { status: "failed", key, error, trace };
    };

    const solutionFailed = (error: unknown): DriverError => {
      trace.push("failed");
      log("error", "Solution threw", { ...context, error: describeError(error) });
      return new DriverError("SOLUTION_ERROR", `Solution for ${formatPuzzleKey(key)} threw: ${describeError(error)}`, {
        cause: error,
      });
    };

    // Examples first, so a wrong solution never reaches the network
    const tests = request.tests ?? [];
    if (tests.length > 0) {
      trace.push("testing");
      let results: TestCaseResult[];
      try {
        results = runTestCases(solution, tests);
      } catch (error) {
        throw solutionFailed(error);
      }
      const failures = results.filter((result) => !result.passed);
      log("info", "Example tests completed", {
        ...context,
        passedCount: results.length - failures.length,
        totalCount: results.length,
      });
      if (failures.length > 0) {
        return { status: "tests_failed", key, tests: results, trace };
      }
    }

    const input = await this.inputCacheFor(paths.inputDir).get(key, token);
    if (!input.ok) {
      return failed(input.error);
    }
    trace.push("input_resolved");

    let answer: string;
    try {
      answer = runSolution(solution, input.value);
    } catch (error) {
      throw solutionFailed(error);
    }
    trace.push("answer_computed");
    log("info", "Answer computed", { ...context, answer });

    const store = new SubmissionStore(paths.cacheDir);
    const outcome = await withSubmissionLock(token, () => {
      trace.push("submitting");
      return this.submit({ key, token, answer, store, log: context, warnings: [] });
    });

    if (!outcome.ok) {
      return failed(outcome.error);
    }

    trace.push("done");
    log("info", "Run finished", { ...context, verdict: outcome.verdict.kind, submissions: outcome.submissions });
    return {
      status: "done",
      key,
      answer,
      verdict: outcome.verdict,
      submissions: outcome.submissions,
      warnings: outcome.warnings,
      trace,
    };
  }

  private inputCacheFor(inputDir: string): InputCache {
    let cache = this.inputCaches.get(inputDir);
    if (!cache) {
      cache = new InputCache(this.client, inputDir);
      this.inputCaches.set(inputDir, cache);
    }
    return cache;
  }

  /**
   * Cooldown left for the account: the longer of this process's tracker and
   * the deadline a previous run stored
   */
  private async cooldownRemainingMs(store: SubmissionStore, token: SessionToken): Promise<number> {
    const now = this.now();
    const storedUntil = await store.cooldownUntil(token.fingerprint);
    return Math.max(this.cooldowns.remainingMs(token, now), storedUntil - now, 0);
  }

  private async startCooldown(ctx: SubmitContext, durationMs: number): Promise<void> {
    const now = this.now();
    this.cooldowns.start(ctx.token, durationMs, now);
    await ctx.store.extendCooldown(ctx.token.fingerprint, now + durationMs, now);
  }

  /**
   * Everything from the local short-circuits to the final verdict.
   * Runs under the account's submission lock.
   */
  private async submit(ctx: SubmitContext): Promise<SubmitOutcome> {
    const { key, token, answer, store, warnings } = ctx;

    if (await store.isSolved(key)) {
      log("info", "Already solved locally, skipping submission", ctx.log);
      return { ok: true, verdict: { kind: "already_solved" }, submissions: 0, warnings };
    }

    const rejected = await store.findRejected(key, answer);
    if (rejected) {
      log("info", "Answer was already rejected, skipping submission", ctx.log);
      return {
        ok: true,
        verdict: rejected.hint ? { kind: "incorrect", hint: rejected.hint } : { kind: "incorrect" },
        submissions: 0,
        warnings,
      };
    }

    const remainingMs = await this.cooldownRemainingMs(store, token);
    if (remainingMs > 0) {
      if (this.rateLimitPolicy === "surface") {
        log("warn", "Account cooldown still running", { ...ctx.log, retryAfterMs: remainingMs });
        return { ok: true, verdict: { kind: "rate_limited", retryAfterMs: remainingMs }, submissions: 0, warnings };
      }
      log("info", "Waiting for account cooldown", { ...ctx.log, waitMs: remainingMs });
      await this.sleep(remainingMs);
    }

    let submissions = 0;
    let resubmitsLeft = this.rateLimitPolicy === "wait" ? MAX_RATE_LIMIT_RESUBMITS : 0;

    for (;;) {
      const response = await this.client.submitAnswer(key, token, answer);
      submissions++;

      if (!response.ok) {
        if (response.error.code === "AUTH_ERROR") {
          return { ok: false, error: response.error, submissions };
        }
        return {
          ok: true,
          verdict: { kind: "transport_error", detail: response.error.message },
          submissions,
          warnings,
        };
      }

      const verdict = classify(response.value, this.patterns);
      log("info", "Judge verdict", { ...ctx.log, verdict: verdict.kind });

      try {
        await this.record(ctx, verdict);
      } catch (error) {
        // The verdict stands even if it could not be saved
        log("error", "Failed to update submission record", { ...ctx.log, error: describeError(error) });
        warnings.push(`Submission record not updated: ${describeError(error)}`);
      }

      if (verdict.kind === "rate_limited" && resubmitsLeft > 0) {
        resubmitsLeft--;
        log("info", "Rate limited, waiting before resubmitting", { ...ctx.log, waitMs: verdict.retryAfterMs });
        await this.sleep(verdict.retryAfterMs);
        continue;
      }

      return { ok: true, verdict, submissions, warnings };
    }
  }

  /**
   * Persist what a verdict teaches us
   */
  private async record(ctx: SubmitContext, verdict: Verdict): Promise<void> {
    const { key, answer, store } = ctx;
    switch (verdict.kind) {
      case "correct":
        await store.markSolved(key, answer);
        break;
      case "incorrect":
        await store.recordIncorrect(key, answer, verdict.hint);
        if (verdict.retryAfterMs !== undefined) {
          await this.startCooldown(ctx, verdict.retryAfterMs);
        }
        break;
      case "rate_limited":
        await this.startCooldown(ctx, verdict.retryAfterMs);
        break;
      default:
        break;
    }
  }
}
