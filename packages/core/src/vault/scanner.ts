import { join } from "path";
import { readdir, stat } from "fs/promises";
import type { Dirent, Stats } from "fs";
import {
  ACTIVE_DIR,
  CAPTURE_DIR,
  REFERENCE_DIR,
  type NoteRecord,
  type PillarLocation,
  type PillarSnapshot,
  type ReferenceSnapshot,
  type ScanWarning,
  type TimedItem,
  type VaultSnapshot,
} from "../types/vault.ts";
import type { TimestampsConfig } from "../types/config.ts";
import * as vaultFs from "../integrations/vault-fs.ts";
import { gitCommitDates, type CommitDateLookup } from "../integrations/git.ts";
import { readManifestSource } from "../manifest/manifest-file.ts";
import { extractMetadata } from "../utils/markdown.ts";
import { debug } from "../utils/logger.ts";
import { VaultAccessError, errorMessage } from "../errors.ts";

export interface ScanOptions {
  manifestFileName?: string;
  timestampSource?: TimestampsConfig["source"];
  commitDates?: CommitDateLookup;
}

const DEFAULT_MANIFEST_FILE = "MANIFEST.md";

/**
 * Every non-hidden directory under `root` (the root included) that holds an
 * Inbox, Projects or Knowledge entry. Pillars nested inside other pillars are
 * reported separately.
 */
export async function discoverPillars(root: string): Promise<PillarLocation[]> {
  const pillars: PillarLocation[] = [];

  async function visit(dir: string, isRoot: boolean): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (e) {
      if (isRoot) throw e;
      debug(`Skipping unreadable directory ${dir}:`, errorMessage(e));
      return;
    }

    const names = new Set(entries.map((entry) => entry.name));
    const has = {
      capture: names.has(CAPTURE_DIR),
      active: names.has(ACTIVE_DIR),
      reference: names.has(REFERENCE_DIR),
    };
    if (has.capture || has.active || has.reference) {
      pillars.push({ path: vaultFs.toVaultPath(root, dir), absolutePath: dir, has });
    }

    for (const entry of entries) {
      if (entry.isDirectory() && !entry.name.startsWith(".")) {
        await visit(join(dir, entry.name), false);
      }
    }
  }

  await visit(root, true);
  return pillars.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}

export async function scanVault(root: string, options: ScanOptions = {}): Promise<VaultSnapshot> {
  let rootStat: Stats;
  try {
    rootStat = await stat(root);
  } catch (e) {
    throw new VaultAccessError(root, errorMessage(e));
  }
  if (!rootStat.isDirectory()) {
    throw new VaultAccessError(root, "not a directory");
  }

  let locations: PillarLocation[];
  try {
    locations = await discoverPillars(root);
  } catch (e) {
    throw new VaultAccessError(root, errorMessage(e));
  }
  debug(`Discovered ${locations.length} pillar(s) under ${root}`);

  const pillars: PillarSnapshot[] = [];
  for (const location of locations) {
    pillars.push(await scanPillar(root, location, options));
  }
  return { root, pillars };
}

export async function scanPillar(
  root: string,
  pillar: PillarLocation,
  options: ScanOptions = {},
): Promise<PillarSnapshot> {
  const snapshot: PillarSnapshot = {
    pillar,
    capture: [],
    active: [],
    warnings: [],
    errors: [],
  };

  if (pillar.has.reference) {
    const dir = join(pillar.absolutePath, REFERENCE_DIR);
    await guardFolder(snapshot, REFERENCE_DIR, dir, async () => {
      snapshot.reference = await scanReferenceFolder(root, pillar, dir, options, snapshot.warnings);
    });
  }
  if (pillar.has.active) {
    const dir = join(pillar.absolutePath, ACTIVE_DIR);
    await guardFolder(snapshot, ACTIVE_DIR, dir, async () => {
      snapshot.active = await scanTimedFolder(root, pillar, dir, options, snapshot.warnings);
    });
  }
  if (pillar.has.capture) {
    const dir = join(pillar.absolutePath, CAPTURE_DIR);
    await guardFolder(snapshot, CAPTURE_DIR, dir, async () => {
      snapshot.capture = await scanTimedFolder(root, pillar, dir, options, snapshot.warnings);
    });
  }

  return snapshot;
}

async function guardFolder(
  snapshot: PillarSnapshot,
  name: string,
  dir: string,
  scan: () => Promise<void>,
): Promise<void> {
  if (!(await vaultFs.isDirectory(dir))) {
    snapshot.errors.push(`${name} is not a directory`);
    return;
  }
  try {
    await scan();
  } catch (e) {
    snapshot.errors.push(`Cannot list ${name}: ${errorMessage(e)}`);
  }
}

async function scanReferenceFolder(
  root: string,
  pillar: PillarLocation,
  dir: string,
  options: ScanOptions,
  warnings: ScanWarning[],
): Promise<ReferenceSnapshot> {
  const manifestFileName = options.manifestFileName ?? DEFAULT_MANIFEST_FILE;
  const manifestPath = join(dir, manifestFileName);
  const files = await vaultFs.listNoteFiles(dir, { exclude: [manifestFileName] });

  const records: NoteRecord[] = [];
  const skipped: string[] = [];

  for (const file of files) {
    const fullPath = join(dir, file);
    const path = vaultFs.toVaultPath(root, fullPath);
    const title = vaultFs.noteTitle(file);

    let content: string;
    let modifiedAt: Date;
    try {
      content = await vaultFs.readNote(fullPath);
      modifiedAt = await vaultFs.getModifiedTime(fullPath);
    } catch (e) {
      warnings.push({ pillar: pillar.path, path, message: `Unreadable note: ${errorMessage(e)}` });
      skipped.push(title);
      continue;
    }

    const metadata = extractMetadata(content);
    if (metadata.status === "unparsed") {
      warnings.push({ pillar: pillar.path, path, message: `Malformed front matter: ${metadata.reason}` });
      skipped.push(title);
      continue;
    }

    records.push({ path, title, modifiedAt, tags: metadata.tags, links: metadata.links });
  }

  return {
    dir,
    manifestPath,
    records,
    skipped,
    manifest: await readManifestSource(manifestPath),
  };
}

async function scanTimedFolder(
  root: string,
  pillar: PillarLocation,
  dir: string,
  options: ScanOptions,
  warnings: ScanWarning[],
): Promise<TimedItem[]> {
  const files = await vaultFs.listNoteFiles(dir);
  const items: TimedItem[] = [];

  for (const file of files) {
    const fullPath = join(dir, file);
    const path = vaultFs.toVaultPath(root, fullPath);

    let content: string;
    let modifiedAt: Date;
    try {
      content = await vaultFs.readNote(fullPath);
      modifiedAt = await vaultFs.getModifiedTime(fullPath);
    } catch (e) {
      warnings.push({ pillar: pillar.path, path, message: `Unreadable note: ${errorMessage(e)}` });
      continue;
    }

    const metadata = extractMetadata(content);
    if (metadata.status === "unparsed") {
      warnings.push({ pillar: pillar.path, path, message: `Malformed front matter: ${metadata.reason}` });
    }

    const item = { path, title: vaultFs.noteTitle(file) };
    if (metadata.status === "parsed" && metadata.date) {
      items.push({ ...item, timestamp: metadata.date, timestampSource: "frontmatter" });
      continue;
    }
    if (options.timestampSource === "git") {
      const committed = await (options.commitDates ?? gitCommitDates).lastCommitDate(fullPath, root);
      if (committed) {
        items.push({ ...item, timestamp: committed, timestampSource: "git" });
        continue;
      }
    }
    items.push({ ...item, timestamp: modifiedAt, timestampSource: "filesystem" });
  }

  return items;
}
