// ============================================================================
// @aoc-pilot/contracts - Source of Truth for Types and Schemas
// ============================================================================

// Puzzle identity
export * from "./puzzle.js";

// Verdicts and response patterns
export * from "./verdict.js";

// Challenge tables and submission records
export * from "./challenge.js";
