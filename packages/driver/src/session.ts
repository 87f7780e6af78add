import { createHash } from "node:crypto";
import { readFile } from "node:fs/promises";
import { DriverError, describeError } from "./errors.js";
import { err, ok, type Result } from "./types.js";

/**
 * Session cookie value copied from a logged-in browser.
 *
 * The raw value is only reachable through {@link SessionToken.cookieHeader};
 * logging or serialising a token shows its fingerprint instead.
 */
export class SessionToken {
  private readonly value: string;

  /** First 12 hex chars of the token's sha256 */
  readonly fingerprint: string;

  private constructor(value: string) {
    this.value = value;
    this.fingerprint = createHash("sha256").update(value).digest("hex").slice(0, 12);
  }

  /**
   * Wrap a raw token. Surrounding whitespace is dropped; an empty value is an AUTH_ERROR.
   */
  static from(raw: string): Result<SessionToken> {
    const value = raw.trim();
    if (value.length === 0) {
      return err(new DriverError("AUTH_ERROR", "Session token is empty"));
    }
    return ok(new SessionToken(value));
  }

  /** Value for the `Cookie` request header */
  cookieHeader(): string {
    return `session=${this.value}`;
  }

  toJSON(): string {
    return `session:${this.fingerprint}`;
  }

  toString(): string {
    return this.toJSON();
  }
}

/**
 * Read the session token from a file (e.g. `.session.txt`)
 */
export async function loadSessionToken(path: string): Promise<Result<SessionToken>> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    return err(
      new DriverError("AUTH_ERROR", `Could not read session file ${path}: ${describeError(error)}`, {
        cause: error,
      }),
    );
  }
  return SessionToken.from(raw);
}
