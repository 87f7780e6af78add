import type { TestCase } from "@aoc-pilot/contracts";
import type { SolutionFn, TestCaseResult } from "./types.js";

/**
 * Run a solution against an input and stringify its answer.
 *
 * Errors thrown by the solution are not caught: a broken solution is a bug
 * the caller should see immediately.
 */
export function runSolution(solution: SolutionFn, input: string): string {
  return String(solution(input));
}

/**
 * Run a solution against named example cases.
 * A case passes when the stringified answer equals `expected` exactly.
 */
export function runTestCases(solution: SolutionFn, tests: readonly TestCase[]): TestCaseResult[] {
  return tests.map((test) => {
    const received = runSolution(solution, test.input);
    return {
      name: test.name,
      passed: received === test.expected,
      expected: test.expected,
      received,
    };
  });
}
