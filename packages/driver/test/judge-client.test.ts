import test from "node:test";
import assert from "node:assert/strict";

import { DEFAULT_USER_AGENT } from "../src/constants.js";
import { createJudgeClient } from "../src/judge-client.js";
import { configureLogging } from "../src/logger.js";
import { TEST_BASE_URL, createFakeJudge, testToken } from "./helpers.js";

const token = testToken();

test("fetchInput requests the day's input with the session cookie", async () => {
  const judge = createFakeJudge(() => new Response("1\n2\n3\n", { status: 200 }));

  const result = await judge.client.fetchInput({ year: 2022, day: 7 }, token);

  assert.deepEqual(result, { ok: true, value: "1\n2\n3\n" });
  assert.equal(judge.calls.length, 1);
  assert.deepEqual(judge.calls[0], {
    url: `${TEST_BASE_URL}/2022/day/7/input`,
    method: "GET",
    cookie: "session=test-session",
    userAgent: DEFAULT_USER_AGENT,
    contentType: null,
    body: undefined,
  });
});

test("submitAnswer posts level and answer as a form", async () => {
  const judge = createFakeJudge(() => new Response("<p>That's the right answer!</p>", { status: 200 }));

  const result = await judge.client.submitAnswer({ year: 2021, day: 3, part: 2 }, token, "1234");

  assert.deepEqual(result, { ok: true, value: "<p>That's the right answer!</p>" });
  const [call] = judge.calls;
  assert.equal(call?.url, `${TEST_BASE_URL}/2021/day/3/answer`);
  assert.equal(call?.method, "POST");
  assert.equal(call?.cookie, "session=test-session");
  assert.equal(call?.contentType, "application/x-www-form-urlencoded");
  assert.equal(call?.body, "level=2&answer=1234");
});

test("custom user agent is sent", async () => {
  const seen: string[] = [];
  const client = createJudgeClient({
    baseUrl: TEST_BASE_URL,
    userAgent: "example.com/aoc by someone@example.com",
    fetch: async (_url, init) => {
      seen.push(new Headers(init.headers).get("user-agent") ?? "");
      return new Response("input", { status: 200 });
    },
  });

  await client.fetchInput({ year: 2020, day: 1 }, token);

  assert.deepEqual(seen, ["example.com/aoc by someone@example.com"]);
});

// ============================================================================
// Failures
// ============================================================================

test("HTTP failures", async (t) => {
  await t.test("400 is an AUTH_ERROR carrying the body", async () => {
    const judge = createFakeJudge(() => new Response("Please log in\n", { status: 400 }));
    const result = await judge.client.fetchInput({ year: 2022, day: 1 }, token);

    assert.equal(result.ok, false);
    if (result.ok) return;
    assert.equal(result.error.code, "AUTH_ERROR");
    assert.equal(result.error.status, 400);
    assert.equal(result.error.message, "Session rejected by judge (400): Please log in");
  });

  await t.test("403 without a body is an AUTH_ERROR", async () => {
    const judge = createFakeJudge(() => new Response(null, { status: 403 }));
    const result = await judge.client.submitAnswer({ year: 2022, day: 1, part: 1 }, token, "42");

    assert.equal(result.ok, false);
    if (result.ok) return;
    assert.equal(result.error.code, "AUTH_ERROR");
    assert.equal(result.error.message, "Session rejected by judge (403)");
  });

  await t.test("404 is a TRANSPORT_ERROR with the status text", async () => {
    const judge = createFakeJudge(() => new Response("", { status: 404, statusText: "Not Found" }));
    const result = await judge.client.fetchInput({ year: 2022, day: 25 }, token);

    assert.equal(result.ok, false);
    if (result.ok) return;
    assert.equal(result.error.code, "TRANSPORT_ERROR");
    assert.equal(result.error.status, 404);
    assert.equal(result.error.message, "Judge API error: 404 Not Found");
  });

  await t.test("503 without status text", async () => {
    const judge = createFakeJudge(() => new Response("", { status: 503 }));
    const result = await judge.client.fetchInput({ year: 2022, day: 1 }, token);

    assert.equal(result.ok, false);
    if (result.ok) return;
    assert.equal(result.error.message, "Judge API error: 503");
  });
});

test("network failures", async (t) => {
  await t.test("a thrown fetch is a TRANSPORT_ERROR", async () => {
    const cause = new TypeError("fetch failed");
    const judge = createFakeJudge(() => {
      throw cause;
    });
    const result = await judge.client.fetchInput({ year: 2022, day: 1 }, token);

    assert.equal(result.ok, false);
    if (result.ok) return;
    assert.equal(result.error.code, "TRANSPORT_ERROR");
    assert.equal(result.error.message, "Request failed: fetch failed");
    assert.equal(result.error.cause, cause);
  });

  await t.test("a timeout is reported with its limit", async () => {
    const judge = createFakeJudge(() => {
      const timeout = new Error("The operation was aborted due to timeout");
      timeout.name = "TimeoutError";
      throw timeout;
    });
    const result = await judge.client.submitAnswer({ year: 2022, day: 1, part: 1 }, token, "42");

    assert.equal(result.ok, false);
    if (result.ok) return;
    assert.equal(result.error.code, "TRANSPORT_ERROR");
    assert.equal(result.error.message, "Request timed out after 15000ms");
  });
});

// ============================================================================
// Logging
// ============================================================================

test("logs carry the session fingerprint, never the token", async (t) => {
  const lines: string[] = [];
  const capture = (...args: unknown[]): void => {
    lines.push(args.map(String).join(" "));
  };
  t.mock.method(console, "info", capture);
  t.mock.method(console, "warn", capture);
  t.mock.method(console, "error", capture);
  configureLogging({ enabled: true });
  t.after(() => configureLogging({ enabled: false }));

  const judge = createFakeJudge(() => new Response("", { status: 403 }));
  await judge.client.fetchInput({ year: 2022, day: 1 }, token);
  await judge.client.submitAnswer({ year: 2022, day: 1, part: 1 }, token, "42");

  assert.ok(lines.length > 0);
  for (const line of lines) {
    assert.equal(line.includes("test-session"), false, line);
  }
  assert.ok(lines.some((line) => line.includes(token.fingerprint)));
});
