import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import {
  ResponsePatternTableSchema,
  type ResponsePatternTable,
} from "@aoc-pilot/contracts";
import { DriverError, describeError } from "./errors.js";
import { err, ok, type Result } from "./types.js";

/** Pattern table shipped with the package */
export const BUNDLED_PATTERNS_PATH = fileURLToPath(
  new URL("../data/response-patterns.json", import.meta.url),
);

/**
 * Load a response pattern table from a JSON file.
 *
 * The judge's wording changes over time, so the phrases live in data rather
 * than code; point AOC_RESPONSE_PATTERNS at an updated copy to override them.
 */
export function loadResponsePatterns(path: string = BUNDLED_PATTERNS_PATH): Result<ResponsePatternTable> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    return err(
      new DriverError("CONFIG_ERROR", `Could not read response patterns ${path}: ${describeError(error)}`, {
        cause: error,
      }),
    );
  }

  const parsed = ResponsePatternTableSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    return err(new DriverError("CONFIG_ERROR", `Invalid response patterns ${path}: ${issues}`));
  }
  return ok(parsed.data);
}

function loadBundledPatterns(): ResponsePatternTable {
  const bundled = loadResponsePatterns();
  if (!bundled.ok) {
    throw bundled.error;
  }
  return bundled.value;
}

export const DEFAULT_RESPONSE_PATTERNS: ResponsePatternTable = loadBundledPatterns();
