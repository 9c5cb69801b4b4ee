import { execFile } from "child_process";
import { promisify } from "util";

const execFileAsync = promisify(execFile);

const GIT_TIMEOUT_MS = 5000;

/** Looks up when a file was last committed. Injected so tests stay off the git binary. */
export interface CommitDateLookup {
  lastCommitDate(fullPath: string, repoRoot: string): Promise<Date | undefined>;
}

export function parseCommitTimestamp(stdout: string): Date | undefined {
  const trimmed = stdout.trim();
  if (!/^\d+$/.test(trimmed)) return undefined;
  return new Date(Number(trimmed) * 1000);
}

/** Uncommitted files, a missing git binary and non-repositories all resolve to undefined. */
export const gitCommitDates: CommitDateLookup = {
  async lastCommitDate(fullPath, repoRoot) {
    try {
      const { stdout } = await execFileAsync(
        "git",
        ["log", "-1", "--format=%ct", "--", fullPath],
        { cwd: repoRoot, timeout: GIT_TIMEOUT_MS },
      );
      return parseCommitTimestamp(stdout);
    } catch {
      return undefined;
    }
  },
};
