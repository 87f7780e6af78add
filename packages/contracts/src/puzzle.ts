import { z } from "zod";

// ============================================================================
// Puzzle Identity
// ============================================================================

/** First year the judge published puzzles */
export const FIRST_PUZZLE_YEAR = 2015;

export const PartSchema = z.union([z.literal(1), z.literal(2)]);
export type Part = z.infer<typeof PartSchema>;

export const DayRefSchema = z.object({
  year: z.number().int().min(FIRST_PUZZLE_YEAR),
  day: z.number().int().min(1).max(25),
});
export type DayRef = Readonly<z.infer<typeof DayRefSchema>>;

/**
 * A single challenge instance: one part of one day of one year.
 */
export const PuzzleKeySchema = DayRefSchema.extend({
  part: PartSchema,
});
export type PuzzleKey = Readonly<z.infer<typeof PuzzleKeySchema>>;

/**
 * Build a validated, frozen puzzle key.
 * @throws {z.ZodError} If any component is out of range
 */
export function createPuzzleKey(year: number, day: number, part: number): PuzzleKey {
  return Object.freeze(PuzzleKeySchema.parse({ year, day, part }));
}

/**
 * Label in `year-day-part` form, e.g. `2015-1-2`
 */
export function formatPuzzleKey(key: PuzzleKey): string {
  return `${key.year}-${key.day}-${key.part}`;
}

/**
 * Parse a `year-day-part` label back into a key.
 * Returns null for anything malformed or out of range.
 */
export function parsePuzzleKeyLabel(label: string): PuzzleKey | null {
  const match = label.trim().match(/^(\d{4})-(\d{1,2})-(\d)$/);
  if (!match || !match[1] || !match[2] || !match[3]) return null;

  const parsed = PuzzleKeySchema.safeParse({
    year: parseInt(match[1], 10),
    day: parseInt(match[2], 10),
    part: parseInt(match[3], 10),
  });
  return parsed.success ? Object.freeze(parsed.data) : null;
}

/**
 * Order keys by year, then day, then part
 */
export function comparePuzzleKeys(a: PuzzleKey, b: PuzzleKey): number {
  return a.year - b.year || a.day - b.day || a.part - b.part;
}
