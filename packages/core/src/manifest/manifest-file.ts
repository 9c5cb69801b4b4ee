import { basename, dirname, resolve } from "path";
import { readFile } from "fs/promises";
import { REFERENCE_DIR, type ManifestSource, type ReferenceSnapshot } from "../types/vault.ts";
import * as vaultFs from "../integrations/vault-fs.ts";
import { compareTitles } from "./format.ts";
import { compareManifest, type ManifestDrift, type ReconcileResult } from "./reconciler.ts";
import { errorMessage } from "../errors.ts";
import { debug } from "../utils/logger.ts";

export type ApplyOutcome =
  | { status: "unchanged"; result: ReconcileResult }
  | { status: "written"; result: ManifestDrift }
  | { status: "conflict"; result: ManifestDrift; reason: string };

function isNotFound(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}

export async function readManifestSource(manifestPath: string): Promise<ManifestSource> {
  try {
    return { kind: "present", content: await readFile(manifestPath, "utf-8") };
  } catch (e) {
    if (isNotFound(e)) return { kind: "absent" };
    return { kind: "unreadable", reason: errorMessage(e) };
  }
}

function sameSource(a: ManifestSource, b: ManifestSource): boolean {
  if (a.kind === "present" && b.kind === "present") return a.content === b.content;
  return a.kind === b.kind;
}

function sameTitles(a: string[], b: string[]): boolean {
  const sa = [...a].sort(compareTitles);
  const sb = [...b].sort(compareTitles);
  return sa.length === sb.length && sa.every((t, i) => t === sb[i]);
}

/**
 * Writes the regenerated manifest for one reference folder. Nothing is
 * written when the folder is in sync, or when the manifest or the note set
 * changed after `reference` was scanned.
 */
export async function applyManifest(reference: ReferenceSnapshot): Promise<ApplyOutcome> {
  const result = compareManifest(reference);
  if (result.status === "in_sync") {
    debug(`${reference.manifestPath} already in sync`);
    return { status: "unchanged", result };
  }

  const current = await readManifestSource(reference.manifestPath);
  if (!sameSource(current, reference.manifest)) {
    return { status: "conflict", result, reason: "manifest changed since it was scanned" };
  }

  const files = await vaultFs.listNoteFiles(reference.dir, {
    exclude: [basename(reference.manifestPath)],
  });
  const observed = [...reference.records.map((r) => r.title), ...reference.skipped];
  if (!sameTitles(files.map(vaultFs.noteTitle), observed)) {
    return { status: "conflict", result, reason: "notes changed since they were scanned" };
  }

  await vaultFs.writeFileAtomic(reference.manifestPath, result.content);
  debug(`Wrote ${reference.manifestPath}`);
  return { status: "written", result };
}

/** Nearest ancestor directory named Knowledge, if any. */
export function findReferenceFolder(filePath: string): string | undefined {
  let dir = dirname(resolve(filePath));
  for (;;) {
    if (basename(dir) === REFERENCE_DIR) return dir;
    const parent = dirname(dir);
    if (parent === dir) return undefined;
    dir = parent;
  }
}
