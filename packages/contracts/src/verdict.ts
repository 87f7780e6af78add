import { z } from "zod";

// ============================================================================
// Verdict Types
// ============================================================================

export const AnswerHintSchema = z.enum(["too_high", "too_low"]);
export type AnswerHint = z.infer<typeof AnswerHintSchema>;

/**
 * Classified outcome of one submission attempt
 */
export const VerdictSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("correct") }),
  z.object({
    kind: z.literal("incorrect"),
    hint: AnswerHintSchema.optional(),
    /** Cooldown the judge attached to the rejection, if it stated one */
    retryAfterMs: z.number().int().nonnegative().optional(),
  }),
  z.object({ kind: z.literal("already_solved") }),
  z.object({
    kind: z.literal("rate_limited"),
    retryAfterMs: z.number().int().nonnegative(),
  }),
  z.object({ kind: z.literal("transport_error"), detail: z.string() }),
  z.object({
    kind: z.literal("parse_error"),
    detail: z.string(),
    body: z.string(),
  }),
]);
export type Verdict = z.infer<typeof VerdictSchema>;
export type VerdictKind = Verdict["kind"];

/**
 * Verdicts after which a challenge counts as finished
 */
export function isSolvedVerdict(verdict: Verdict): boolean {
  return verdict.kind === "correct" || verdict.kind === "already_solved";
}

// ============================================================================
// Response Pattern Table
// ============================================================================

const PhraseListSchema = z.array(z.string().trim().min(1)).min(1);

/**
 * Phrases the classifier looks for in a judge response.
 * Matching is case-insensitive substring matching on the normalised body.
 */
export const ResponsePatternTableSchema = z.object({
  version: z.number().int().positive(),
  alreadySolved: PhraseListSchema,
  correct: PhraseListSchema,
  incorrect: PhraseListSchema,
  tooHigh: PhraseListSchema,
  tooLow: PhraseListSchema,
  rateLimited: PhraseListSchema,
});
export type ResponsePatternTable = z.infer<typeof ResponsePatternTableSchema>;
