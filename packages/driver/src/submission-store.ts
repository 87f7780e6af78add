import { join } from "node:path";
import type { z } from "zod";
import {
  CooldownTableSchema,
  SubmissionRecordSchema,
  type AnswerHint,
  type CooldownTable,
  type DayRef,
  type PartRecord,
  type PuzzleKey,
  type RejectedAnswer,
  type SubmissionRecord,
} from "@aoc-pilot/contracts";
import { describeError } from "./errors.js";
import { atomicWrite, readIfExists } from "./fs-utils.js";
import { log } from "./logger.js";

/**
 * Where the submission record for a day lives: `<cacheDir>/<year>/<day>.json`
 */
export function resolveRecordPath(cacheDir: string, ref: DayRef): string {
  return join(cacheDir, String(ref.year), `${ref.day}.json`);
}

/** Per-account cooldown deadlines, shared by every day under a cache dir */
export const COOLDOWN_FILE = "cooldowns.json";

function emptyPart(): PartRecord {
  return { solved: false, incorrectAnswers: [] };
}

/**
 * Persisted knowledge about past submissions, one JSON file per day.
 *
 * - `solved` is only ever set after a correct verdict and is never cleared.
 * - Rejected answers are remembered so they are not sent to the judge again.
 * - Cooldowns outlive the process, so a later run does not submit early.
 */
export class SubmissionStore {
  constructor(private readonly cacheDir: string) {}

  pathFor(ref: DayRef): string {
    return resolveRecordPath(this.cacheDir, ref);
  }

  /**
   * Record for the key's part; an empty record if nothing was stored.
   * An unreadable or invalid file is treated as empty.
   */
  async getPart(key: PuzzleKey): Promise<PartRecord> {
    const record = await this.read(key);
    return record.parts[partKey(key)] ?? emptyPart();
  }

  async isSolved(key: PuzzleKey): Promise<boolean> {
    return (await this.getPart(key)).solved;
  }

  /**
   * Find an answer the judge already rejected for this part
   */
  async findRejected(key: PuzzleKey, answer: string): Promise<RejectedAnswer | null> {
    const part = await this.getPart(key);
    return part.incorrectAnswers.find((entry) => entry.answer === answer) ?? null;
  }

  async markSolved(key: PuzzleKey, answer: string): Promise<void> {
    await this.update(key, (part) => ({
      ...part,
      solved: true,
      correctAnswer: answer,
    }));
  }

  async recordIncorrect(key: PuzzleKey, answer: string, hint?: AnswerHint): Promise<void> {
    await this.update(key, (part) => {
      if (part.incorrectAnswers.some((entry) => entry.answer === answer)) {
        return part;
      }
      return {
        ...part,
        incorrectAnswers: [...part.incorrectAnswers, hint ? { answer, hint } : { answer }],
      };
    });
  }

  /**
   * Epoch ms before which the account should not submit, or 0
   */
  async cooldownUntil(account: string): Promise<number> {
    const table = await this.readJson<CooldownTable>(this.cooldownPath(), CooldownTableSchema, {});
    return table[account] ?? 0;
  }

  /**
   * Persist an account's cooldown; an earlier deadline never replaces a later one.
   * Expired entries are dropped on the way.
   */
  async extendCooldown(account: string, until: number, now: number): Promise<void> {
    const path = this.cooldownPath();
    const current = await this.readJson<CooldownTable>(path, CooldownTableSchema, {});

    const updated: CooldownTable = {};
    for (const [key, deadline] of Object.entries(current)) {
      if (deadline > now) updated[key] = deadline;
    }
    updated[account] = Math.max(updated[account] ?? 0, until);

    await atomicWrite(path, `${JSON.stringify(updated, null, 2)}\n`);
    log("info", "Cooldown recorded", { path, session: account, until });
  }

  private cooldownPath(): string {
    return join(this.cacheDir, COOLDOWN_FILE);
  }

  private read(ref: DayRef): Promise<SubmissionRecord> {
    return this.readJson<SubmissionRecord>(this.pathFor(ref), SubmissionRecordSchema, { parts: {} });
  }

  /**
   * Parse and validate a JSON file. Missing, unreadable or invalid files yield `fallback`.
   */
  private async readJson<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, fallback: T): Promise<T> {
    let raw: string | null;
    try {
      raw = await readIfExists(path);
    } catch (error) {
      log("warn", "Could not read stored state", { path, error: describeError(error) });
      return fallback;
    }
    if (raw === null) {
      return fallback;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      log("warn", "Stored state is not valid JSON", { path, error: describeError(error) });
      return fallback;
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      log("warn", "Stored state has an unexpected shape", { path, issues: parsed.error.issues.length });
      return fallback;
    }
    return parsed.data;
  }

  /**
   * Read-modify-write of one part. `solved` can only go from false to true.
   */
  private async update(key: PuzzleKey, change: (part: PartRecord) => PartRecord): Promise<void> {
    const record = await this.read(key);
    const current = record.parts[partKey(key)] ?? emptyPart();
    const next = change(current);

    const parts = { ...record.parts };
    parts[partKey(key)] = { ...next, solved: current.solved || next.solved };
    const updated: SubmissionRecord = { parts };

    const path = this.pathFor(key);
    await atomicWrite(path, `${JSON.stringify(updated, null, 2)}\n`);
    log("info", "Submission record updated", { path, part: key.part, solved: updated.parts[partKey(key)]?.solved });
  }
}

function partKey(key: PuzzleKey): "1" | "2" {
  return key.part === 1 ? "1" : "2";
}
