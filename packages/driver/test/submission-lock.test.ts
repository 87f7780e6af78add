import test from "node:test";
import assert from "node:assert/strict";

import { CooldownTracker, withSubmissionLock } from "../src/submission-lock.js";
import { testToken } from "./helpers.js";

// ============================================================================
// Submission Lock
// ============================================================================

test("withSubmissionLock runs one task per account at a time", async () => {
  const token = testToken("test-lock");
  const events: string[] = [];
  let releaseFirst: () => void = () => {};
  const firstGate = new Promise<void>((resolve) => {
    releaseFirst = resolve;
  });

  const first = withSubmissionLock(token, async () => {
    events.push("first:start");
    await firstGate;
    events.push("first:end");
    return 1;
  });
  const second = withSubmissionLock(token, async () => {
    events.push("second:start");
    return 2;
  });

  await new Promise((resolve) => setImmediate(resolve));
  assert.deepEqual(events, ["first:start"]);

  releaseFirst();
  assert.deepEqual(await Promise.all([first, second]), [1, 2]);
  assert.deepEqual(events, ["first:start", "first:end", "second:start"]);
});

test("withSubmissionLock releases after a failing task", async () => {
  const token = testToken("test-lock-failure");

  await assert.rejects(
    withSubmissionLock(token, async () => {
      throw new Error("boom");
    }),
    { message: "boom" },
  );

  assert.equal(await withSubmissionLock(token, async () => "next"), "next");
});

test("different accounts do not wait for each other", async () => {
  const events: string[] = [];
  let releaseFirst: () => void = () => {};
  const gate = new Promise<void>((resolve) => {
    releaseFirst = resolve;
  });

  const first = withSubmissionLock(testToken("test-account-a"), async () => {
    await gate;
    events.push("a");
  });
  await withSubmissionLock(testToken("test-account-b"), async () => {
    events.push("b");
  });

  releaseFirst();
  await first;
  assert.deepEqual(events, ["b", "a"]);
});

// ============================================================================
// Cooldowns
// ============================================================================

test("CooldownTracker", () => {
  const cooldowns = new CooldownTracker();
  const token = testToken();

  assert.equal(cooldowns.remainingMs(token, 1_000), 0);

  cooldowns.start(token, 60_000, 1_000);
  assert.equal(cooldowns.remainingMs(token, 31_000), 30_000);

  // A shorter cooldown never cuts an existing one
  cooldowns.start(token, 5_000, 31_000);
  assert.equal(cooldowns.remainingMs(token, 31_000), 30_000);

  assert.equal(cooldowns.remainingMs(token, 61_000), 0);
  assert.equal(cooldowns.remainingMs(testToken("test-other"), 31_000), 0);
});
