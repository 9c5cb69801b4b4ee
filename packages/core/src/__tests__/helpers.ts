/**
 * helpers.ts: temp vault factories shared by the core tests
 */

import { mkdir, mkdtemp, rm, utimes, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { dirname, join } from "path";

export const NOW = new Date("2026-10-19T12:00:00.000Z");

export function daysBefore(now: Date, days: number): Date {
  return new Date(now.getTime() - days * 24 * 60 * 60 * 1000);
}

export async function makeVault(): Promise<string> {
  return mkdtemp(join(tmpdir(), "vault-keeper-test-"));
}

export async function removeVault(root: string): Promise<void> {
  await rm(root, { recursive: true, force: true });
}

/** Writes `content` at the vault-relative path, optionally pinning its mtime. */
export async function writeNote(
  root: string,
  relPath: string,
  content = "",
  mtime?: Date,
): Promise<string> {
  const fullPath = join(root, relPath);
  await mkdir(dirname(fullPath), { recursive: true });
  await writeFile(fullPath, content, "utf-8");
  if (mtime) await utimes(fullPath, mtime, mtime);
  return fullPath;
}

export async function makeDir(root: string, relPath: string): Promise<void> {
  await mkdir(join(root, relPath), { recursive: true });
}
