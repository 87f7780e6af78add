import { comparePuzzleKeys, formatPuzzleKey, isSolvedVerdict, type ChallengeTable } from "@aoc-pilot/contracts";
import type { RunOutcome, SolutionFn } from "./types.js";
import { DriverError } from "./errors.js";
import { log } from "./logger.js";
import type { Orchestrator } from "./orchestrator.js";
import type { SessionToken } from "./session.js";

export interface ChallengeRunOptions {
  /** Keep going after a challenge that did not end solved (default: stop) */
  continueOnFailure?: boolean;
}

function isSuccess(outcome: RunOutcome): boolean {
  return outcome.status === "done" && isSolvedVerdict(outcome.verdict);
}

/**
 * Run every challenge of a table in (year, day, part) order, one at a time.
 *
 * Solutions are looked up by the name each challenge gives in `solution`.
 * Stops after the first challenge that does not end correct or already solved,
 * unless `continueOnFailure` is set.
 */
export async function runChallengeTable(
  table: ChallengeTable,
  solutions: Readonly<Record<string, SolutionFn>>,
  token: SessionToken,
  orchestrator: Orchestrator,
  options: ChallengeRunOptions = {},
): Promise<RunOutcome[]> {
  const ordered = [...table.challenges].sort((a, b) => comparePuzzleKeys(a.key, b.key));
  const outcomes: RunOutcome[] = [];

  for (const challenge of ordered) {
    const label = formatPuzzleKey(challenge.key);
    const solution = Object.hasOwn(solutions, challenge.solution) ? solutions[challenge.solution] : undefined;

    let outcome: RunOutcome;
    if (!solution) {
      outcome = {
        status: "failed",
        key: challenge.key,
        error: new DriverError("CONFIG_ERROR", `No solution registered as "${challenge.solution}" for ${label}`),
        trace: ["idle", "failed"],
      };
    } else {
      outcome = await orchestrator.run({
        key: challenge.key,
        solution,
        token,
        paths: { inputDir: table.inputDir, cacheDir: table.cacheDir },
        tests: challenge.tests,
      });
    }

    outcomes.push(outcome);
    log("info", "Challenge finished", { puzzle: label, status: outcome.status });

    if (!isSuccess(outcome) && !options.continueOnFailure) {
      break;
    }
  }

  return outcomes;
}
