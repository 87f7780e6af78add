import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createJudgeClient, type JudgeClient } from "../src/judge-client.js";
import { SessionToken } from "../src/session.js";
import type { FetchLike } from "../src/types.js";

export const TEST_BASE_URL = "https://judge.test";

export interface RecordedRequest {
  url: string;
  method: string;
  cookie: string | null;
  userAgent: string | null;
  contentType: string | null;
  body?: string;
}

type Route = (request: RecordedRequest) => Response | Promise<Response>;

/**
 * In-process stand-in for the judge: records every request and answers from `route`
 */
export function createFakeJudge(route: Route): {
  client: JudgeClient;
  fetch: FetchLike;
  calls: RecordedRequest[];
  inputCalls: () => RecordedRequest[];
  answerCalls: () => RecordedRequest[];
} {
  const calls: RecordedRequest[] = [];
  const fetch: FetchLike = async (url, init) => {
    const headers = new Headers(init.headers);
    const request: RecordedRequest = {
      url,
      method: init.method ?? "GET",
      cookie: headers.get("cookie"),
      userAgent: headers.get("user-agent"),
      contentType: headers.get("content-type"),
      body: typeof init.body === "string" ? init.body : undefined,
    };
    calls.push(request);
    return route(request);
  };

  return {
    client: createJudgeClient({ baseUrl: TEST_BASE_URL, fetch }),
    fetch,
    calls,
    inputCalls: () => calls.filter((call) => call.url.endsWith("/input")),
    answerCalls: () => calls.filter((call) => call.url.endsWith("/answer")),
  };
}

/**
 * Route that serves a fixed input and answers every submission with the next body in `answers`
 * (the last one repeats)
 */
export function judgeRoute(input: string, answers: string[]): Route {
  let next = 0;
  return (request) => {
    if (request.url.endsWith("/input")) {
      return new Response(input, { status: 200 });
    }
    const body = answers[Math.min(next, answers.length - 1)] ?? "";
    next++;
    return new Response(body, { status: 200 });
  };
}

export function testToken(raw = "test-session"): SessionToken {
  const token = SessionToken.from(raw);
  if (!token.ok) {
    throw token.error;
  }
  return token.value;
}

export async function makeTempDir(prefix = "aoc-pilot-test-"): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export const CORRECT_BODY =
  "<main><article><p>That's the right answer!  You are <span class=\"day-success\">one gold star</span> closer to collecting enough stars. [<a href=\"/2021/day/3#part2\">Continue to Part Two</a>]</p></article></main>";
