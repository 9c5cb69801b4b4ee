import { join, relative, extname, basename, dirname, sep } from "path";
import { readdir, readFile, rename, rm, stat, writeFile } from "fs/promises";
import { randomUUID } from "crypto";
import { NOTE_EXTENSION } from "../types/vault.ts";

export async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

export async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

/** Vault-relative path with forward slashes; the root itself is ".". */
export function toVaultPath(vaultPath: string, fullPath: string): string {
  const rel = relative(vaultPath, fullPath);
  return rel === "" ? "." : rel.split(sep).join("/");
}

export function noteTitle(fileName: string): string {
  return basename(fileName, NOTE_EXTENSION);
}

export async function readNote(fullPath: string): Promise<string> {
  return readFile(fullPath, "utf-8");
}

/**
 * Note files directly inside `dir`, sorted by name. Hidden entries, other
 * extensions and directories are left out.
 */
export async function listNoteFiles(
  dir: string,
  options: { exclude?: string[] } = {},
): Promise<string[]> {
  const exclude = new Set(options.exclude ?? []);
  const entries = await readdir(dir, { withFileTypes: true });

  return entries
    .filter(
      (entry) =>
        entry.isFile() &&
        !entry.name.startsWith(".") &&
        extname(entry.name) === NOTE_EXTENSION &&
        !exclude.has(entry.name),
    )
    .map((entry) => entry.name)
    .sort();
}

export async function listSubdirectories(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isDirectory() && !entry.name.startsWith("."))
    .map((entry) => join(dir, entry.name))
    .sort();
}

export async function getModifiedTime(fullPath: string): Promise<Date> {
  return (await stat(fullPath)).mtime;
}

/**
 * Writes through a temporary sibling and renames it into place, so readers
 * see either the old file or the complete new one.
 */
export async function writeFileAtomic(fullPath: string, content: string): Promise<void> {
  const tmpPath = join(dirname(fullPath), `.${basename(fullPath)}.${randomUUID()}.tmp`);
  try {
    await writeFile(tmpPath, content, "utf-8");
    await rename(tmpPath, fullPath);
  } catch (e) {
    await rm(tmpPath, { force: true });
    throw e;
  }
}
