import { z } from "zod";
import { PuzzleKeySchema, parsePuzzleKeyLabel } from "./puzzle.js";

// ============================================================================
// Challenge Table
// ============================================================================

export const TestCaseSchema = z.object({
  name: z.string().min(1),
  input: z.string(),
  expected: z.string(),
});
export type TestCase = z.infer<typeof TestCaseSchema>;

/**
 * A key given either as an object or as a `year-day-part` label
 */
const ChallengeKeySchema = z.union([
  PuzzleKeySchema,
  z.string().transform((label, ctx) => {
    const key = parsePuzzleKeyLabel(label);
    if (!key) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid puzzle label "${label}" (expected year-day-part)`,
      });
      return z.NEVER;
    }
    return key;
  }),
]);

export const ChallengeSchema = z.object({
  key: ChallengeKeySchema,
  /** Name the caller registered the solution function under */
  solution: z.string().min(1),
  tests: z.array(TestCaseSchema).default([]),
});
export type Challenge = z.infer<typeof ChallengeSchema>;

export const ChallengeTableSchema = z
  .object({
    inputDir: z.string().min(1).default("inputs"),
    cacheDir: z.string().min(1).default("cache"),
    challenges: z.array(ChallengeSchema),
  })
  .superRefine((table, ctx) => {
    const seen = new Set<string>();
    table.challenges.forEach((challenge, index) => {
      const { year, day, part } = challenge.key;
      const label = `${year}-${day}-${part}`;
      if (seen.has(label)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["challenges", index, "key"],
          message: `Duplicate challenge ${label}`,
        });
      }
      seen.add(label);
    });
  });
export type ChallengeTable = z.infer<typeof ChallengeTableSchema>;

// ============================================================================
// Submission Record
// ============================================================================

export const RejectedAnswerSchema = z.object({
  answer: z.string(),
  hint: z.enum(["too_high", "too_low"]).optional(),
});
export type RejectedAnswer = z.infer<typeof RejectedAnswerSchema>;

export const PartRecordSchema = z.object({
  solved: z.boolean().default(false),
  correctAnswer: z.string().optional(),
  incorrectAnswers: z.array(RejectedAnswerSchema).default([]),
});
export type PartRecord = z.infer<typeof PartRecordSchema>;

/**
 * Persisted submission state for one (year, day), keyed by part number
 */
export const SubmissionRecordSchema = z.object({
  parts: z.record(z.enum(["1", "2"]), PartRecordSchema).default({}),
});
export type SubmissionRecord = z.infer<typeof SubmissionRecordSchema>;

/**
 * Submission cooldowns the judge announced, as the epoch ms each account
 * (keyed by token fingerprint) may submit again
 */
export const CooldownTableSchema = z.record(z.string(), z.number().int().nonnegative());
export type CooldownTable = z.infer<typeof CooldownTableSchema>;
