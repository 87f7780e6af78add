import type { SessionToken } from "./session.js";

// ============================================================================
// Submission Lock
// ============================================================================

/**
 * Tail of the submission chain per account (token fingerprint).
 * The judge's cooldown is per account, so submissions for different
 * puzzles made with one token still go one at a time.
 */
const chains = new Map<string, Promise<void>>();

/**
 * Run `task` once every earlier task for the same token has settled
 */
export async function withSubmissionLock<T>(token: SessionToken, task: () => Promise<T>): Promise<T> {
  const lockKey = token.fingerprint;
  const previous = chains.get(lockKey) ?? Promise.resolve();

  let release: () => void = () => {};
  const current = new Promise<void>((resolve) => {
    release = resolve;
  });
  const tail = previous.then(() => current);
  chains.set(lockKey, tail);

  await previous;
  try {
    return await task();
  } finally {
    release();
    if (chains.get(lockKey) === tail) {
      chains.delete(lockKey);
    }
  }
}

// ============================================================================
// Cooldown Tracking
// ============================================================================

/**
 * Time (epoch ms) before which an account should not submit again.
 * Kept in memory only.
 */
export class CooldownTracker {
  private readonly until = new Map<string, number>();

  /** Remaining wait for this account, 0 if none */
  remainingMs(token: SessionToken, now: number): number {
    const until = this.until.get(token.fingerprint);
    if (until === undefined) return 0;
    if (until <= now) {
      this.until.delete(token.fingerprint);
      return 0;
    }
    return until - now;
  }

  /** Start (or extend) the account's cooldown */
  start(token: SessionToken, durationMs: number, now: number): void {
    const until = now + durationMs;
    const existing = this.until.get(token.fingerprint) ?? 0;
    this.until.set(token.fingerprint, Math.max(existing, until));
  }
}
