import { join } from "node:path";
import type { DayRef } from "@aoc-pilot/contracts";
import type { LogContext, Result } from "./types.js";
import { err, ok } from "./types.js";
import { DriverError, describeError } from "./errors.js";
import { atomicWrite, readIfExists } from "./fs-utils.js";
import type { JudgeClient } from "./judge-client.js";
import { log } from "./logger.js";
import type { SessionToken } from "./session.js";

// ============================================================================
// Paths and Normalisation
// ============================================================================

/**
 * Where the input for a day lives: `<inputDir>/<year>/<day>.txt`
 */
export function resolveInputPath(inputDir: string, ref: DayRef): string {
  return join(inputDir, String(ref.year), `${ref.day}.txt`);
}

/**
 * Inputs are stored without trailing whitespace (the judge ends them with a newline)
 */
export function normalizeInput(body: string): string {
  return body.trimEnd();
}

// ============================================================================
// Input Cache
// ============================================================================

/**
 * Write-once store of puzzle inputs backed by flat files.
 *
 * An existing file is returned as is and never re-fetched or overwritten.
 * The judge's input for a given account and day does not change.
 */
export class InputCache {
  /** In-flight fetches, so concurrent callers for one day share a request */
  private readonly pending = new Map<string, Promise<Result<string>>>();

  constructor(
    private readonly client: JudgeClient,
    private readonly inputDir: string,
  ) {}

  pathFor(ref: DayRef): string {
    return resolveInputPath(this.inputDir, ref);
  }

  /**
   * Input for a day, from disk if cached, otherwise from the judge.
   *
   * @returns The input text, or AUTH_ERROR / FETCH_ERROR. Nothing is written on failure.
   */
  async get(ref: DayRef, token: SessionToken): Promise<Result<string>> {
    const path = this.pathFor(ref);
    const inFlight = this.pending.get(path);
    if (inFlight) return inFlight;

    const pending = this.resolve(ref, path, token).finally(() => {
      this.pending.delete(path);
    });
    this.pending.set(path, pending);
    return pending;
  }

  private async resolve(ref: DayRef, path: string, token: SessionToken): Promise<Result<string>> {
    const context: LogContext = { year: ref.year, day: ref.day, path };

    let cached: string | null;
    try {
      cached = await readIfExists(path);
    } catch (error) {
      log("error", "Failed to read cached input", { ...context, error: describeError(error) });
      return err(
        new DriverError("FETCH_ERROR", `Could not read cached input ${path}: ${describeError(error)}`, {
          cause: error,
        }),
      );
    }

    if (cached !== null) {
      log("info", "Cache hit for puzzle input", context);
      return ok(cached);
    }

    log("info", "Cache miss for puzzle input", context);
    const fetched = await this.client.fetchInput(ref, token);
    if (!fetched.ok) {
      if (fetched.error.code === "AUTH_ERROR") {
        return fetched;
      }
      return err(
        new DriverError("FETCH_ERROR", `Could not fetch input for ${ref.year} day ${ref.day}: ${fetched.error.message}`, {
          status: fetched.error.status,
          cause: fetched.error,
        }),
      );
    }

    const input = normalizeInput(fetched.value);
    try {
      await atomicWrite(path, input);
    } catch (error) {
      log("error", "Failed to write cached input", { ...context, error: describeError(error) });
      return err(
        new DriverError("FETCH_ERROR", `Could not cache input at ${path}: ${describeError(error)}`, {
          cause: error,
        }),
      );
    }

    log("info", "Puzzle input cached", { ...context, bytes: input.length });
    return ok(input);
  }
}
