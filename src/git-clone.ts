import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { errorMessage } from "./errors.js";
import { execGit, GitError } from "./git-utils.js";

export interface CloneResult {
  tempDir: string;
  commit: string;
}

const MAX_ATTEMPTS = 3;
const RETRY_DELAYS = [500, 1000];

const AUTH_ERROR_PATTERNS = [
  "Authentication",
  "Permission denied",
  "could not read Username",
  "could not read Password",
];

function isAuthError(stderr: string): boolean {
  return AUTH_ERROR_PATTERNS.some((pattern) => stderr.includes(pattern));
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * `source` counts as a git URL when it carries a scheme or the scp-like
 * `user@host:path` form; anything else is a local directory.
 */
export function isGitUrl(source: string): boolean {
  return (
    /^(https?|ssh|git|file):\/\//.test(source) ||
    /^[\w.-]+@[\w.-]+:/.test(source)
  );
}

/**
 * Shallow-clones `url` into a fresh temp directory. Transient failures are
 * retried; authentication failures are not.
 */
export async function cloneSource(
  url: string,
  ref: string | null,
): Promise<CloneResult> {
  const tempDir = await mkdtemp(join(tmpdir(), "skillrig-"));

  const cloneArgs = ["clone", "--depth", "1"];
  if (ref !== null) {
    cloneArgs.push("--branch", ref);
  }
  cloneArgs.push(url, tempDir);

  let lastError: unknown;

  for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
    try {
      await execGit(cloneArgs, { timeout: 60_000 });
      const { stdout } = await execGit(["-C", tempDir, "rev-parse", "HEAD"]);
      return { tempDir, commit: stdout.trim() };
    } catch (err: unknown) {
      lastError = err;
      const stderr = err instanceof GitError ? err.stderr : "";

      if (isAuthError(stderr)) {
        await rm(tempDir, { recursive: true, force: true });
        throw new Error(`git clone failed: ${stderr || errorMessage(err)}`);
      }

      const wait = RETRY_DELAYS[attempt - 1];
      if (attempt < MAX_ATTEMPTS && wait !== undefined) {
        await delay(wait);
      }
    }
  }

  await rm(tempDir, { recursive: true, force: true });
  throw new Error(
    `git clone failed after ${MAX_ATTEMPTS} attempts: ${lastError === undefined ? "unknown error" : errorMessage(lastError)}`,
  );
}

export async function cleanupTempDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}
