import { promises as fs } from "node:fs";
import { dirname } from "node:path";
import { ensureDir } from "fs-extra/esm";
import { tmpName } from "tmp-promise";

/**
 * Write a file in one step: content goes to a temp file beside the target,
 * which is then renamed over it. Parent directories are created.
 * Readers never see a partial file; on failure the temp file is removed.
 */
export async function atomicWrite(path: string, content: string): Promise<void> {
  const dir = dirname(path);
  await ensureDir(dir);
  const tempPath = await tmpName({ dir, prefix: ".aoc-pilot-", postfix: ".tmp" });
  try {
    await fs.writeFile(tempPath, content, "utf8");
    await fs.rename(tempPath, path);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Read a text file, or null if it does not exist
 */
export async function readIfExists(path: string): Promise<string | null> {
  try {
    return await fs.readFile(path, "utf8");
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw error;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
