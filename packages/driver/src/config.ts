import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import { ChallengeTableSchema, type ChallengeTable, type ResponsePatternTable } from "@aoc-pilot/contracts";
import type { JudgeClientConfig, RateLimitPolicy, Result, StoragePaths } from "./types.js";
import { err, ok } from "./types.js";
import {
  DEFAULT_BASE_URL,
  DEFAULT_CACHE_DIR,
  DEFAULT_INPUT_DIR,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_SESSION_FILE,
  DEFAULT_USER_AGENT,
} from "./constants.js";
import { DriverError, describeError } from "./errors.js";
import { log } from "./logger.js";
import { DEFAULT_RESPONSE_PATTERNS, loadResponsePatterns } from "./patterns.js";
import { SessionToken, loadSessionToken } from "./session.js";

// ============================================================================
// Environment
// ============================================================================

/**
 * Load `.env.local` (takes precedence) or else `.env` from a directory.
 * Variables already set in the process are left alone.
 *
 * @returns The file that was loaded, or null if neither exists
 */
export function loadEnvFiles(rootDir: string = process.cwd()): string | null {
  const envLocalPath = resolve(rootDir, ".env.local");
  const envPath = resolve(rootDir, ".env");

  for (const path of [envLocalPath, envPath]) {
    if (existsSync(path)) {
      loadDotenv({ path });
      log("info", "Loaded environment file", { path });
      return path;
    }
  }
  return null;
}

const EnvSchema = z.object({
  AOC_SESSION: z.string().trim().min(1).optional(),
  AOC_SESSION_FILE: z.string().min(1).default(DEFAULT_SESSION_FILE),
  AOC_INPUT_DIR: z.string().min(1).default(DEFAULT_INPUT_DIR),
  AOC_CACHE_DIR: z.string().min(1).default(DEFAULT_CACHE_DIR),
  AOC_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
  AOC_USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
  AOC_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS),
  AOC_RATE_LIMIT_POLICY: z.enum(["wait", "surface"]).default("surface"),
  AOC_RESPONSE_PATTERNS: z.string().min(1).optional(),
});

/**
 * Driver settings resolved from the environment
 */
export interface DriverConfig {
  /** Inline session token; takes precedence over the session file */
  session?: string;
  sessionFile: string;
  paths: StoragePaths;
  client: JudgeClientConfig;
  rateLimitPolicy: RateLimitPolicy;
  patterns: ResponsePatternTable;
}

/**
 * Read driver settings from environment variables
 *
 * @example
 * ```ts
 * loadEnvFiles();
 * const config = loadDriverConfig();
 * if (!config.ok) throw config.error;
 * ```
 */
export function loadDriverConfig(env: NodeJS.ProcessEnv = process.env): Result<DriverConfig> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    return err(new DriverError("CONFIG_ERROR", `Invalid environment: ${issues}`));
  }
  const vars = parsed.data;

  let patterns = DEFAULT_RESPONSE_PATTERNS;
  if (vars.AOC_RESPONSE_PATTERNS) {
    const loaded = loadResponsePatterns(vars.AOC_RESPONSE_PATTERNS);
    if (!loaded.ok) return loaded;
    patterns = loaded.value;
  }

  return ok({
    session: vars.AOC_SESSION,
    sessionFile: vars.AOC_SESSION_FILE,
    paths: {
      inputDir: vars.AOC_INPUT_DIR,
      cacheDir: vars.AOC_CACHE_DIR,
    },
    client: {
      baseUrl: vars.AOC_BASE_URL,
      userAgent: vars.AOC_USER_AGENT,
      timeoutMs: vars.AOC_TIMEOUT_MS,
    },
    rateLimitPolicy: vars.AOC_RATE_LIMIT_POLICY,
    patterns,
  });
}

/**
 * The session token from AOC_SESSION, or else from the session file
 */
export async function resolveSessionToken(config: DriverConfig): Promise<Result<SessionToken>> {
  if (config.session !== undefined) {
    return SessionToken.from(config.session);
  }
  return loadSessionToken(config.sessionFile);
}

// ============================================================================
// Challenge Tables
// ============================================================================

/**
 * Read and validate a challenge table (JSON)
 */
export async function loadChallengeTable(path: string): Promise<Result<ChallengeTable>> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, "utf8"));
  } catch (error) {
    return err(
      new DriverError("CONFIG_ERROR", `Could not read challenge table ${path}: ${describeError(error)}`, {
        cause: error,
      }),
    );
  }
  return parseChallengeTable(raw, path);
}

export function parseChallengeTable(raw: unknown, source = "challenge table"): Result<ChallengeTable> {
  const parsed = ChallengeTableSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    return err(new DriverError("CONFIG_ERROR", `Invalid ${source}: ${issues}`));
  }
  return ok(parsed.data);
}
