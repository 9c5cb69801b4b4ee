import type { ManifestSource, NoteRecord } from "../types/vault.ts";
import type { ManifestState } from "../types/report.ts";
import { compareTitles, parseManifest, renderManifest, type ManifestRow } from "./format.ts";

export interface ReconcileInput {
  records: NoteRecord[];
  /** Notes on disk that could not be read; their rows are left alone. */
  skipped?: string[];
  manifest: ManifestSource;
}

export interface ManifestDrift {
  status: "drift";
  manifestState: ManifestState;
  missing: string[];
  orphaned: string[];
  changed: string[];
  content: string;
}

export type ReconcileResult = { status: "in_sync"; content: string } | ManifestDrift;

function existingRows(manifest: ManifestSource): { state: ManifestState; rows: ManifestRow[] } {
  switch (manifest.kind) {
    case "absent":
      return { state: "absent", rows: [] };
    case "unreadable":
      return { state: "unparsed", rows: [] };
    case "present": {
      const parsed = parseManifest(manifest.content);
      return parsed.status === "parsed"
        ? { state: "parsed", rows: parsed.rows }
        : { state: "unparsed", rows: [] };
    }
  }
}

function sameTags(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((tag, i) => tag === b[i]);
}

/**
 * Pure comparison of a reference folder's notes against its manifest. The
 * file set decides which rows exist; the manifest only contributes the
 * descriptions it already carries.
 */
export function compareManifest(input: ReconcileInput): ReconcileResult {
  const { state, rows } = existingRows(input.manifest);
  const byTitle = new Map(rows.map((row) => [row.title, row]));
  const noteTitles = new Set(input.records.map((r) => r.title));
  const skipped = new Set(input.skipped ?? []);

  const missing: string[] = [];
  const changed: string[] = [];
  const next: ManifestRow[] = [];

  for (const record of input.records) {
    const row = byTitle.get(record.title);
    if (!row) {
      missing.push(record.title);
    } else if (row.tags !== undefined && !sameTags(row.tags, record.tags)) {
      changed.push(record.title);
    }
    next.push({ title: record.title, tags: record.tags, description: row?.description ?? "" });
  }

  const orphaned: string[] = [];
  for (const row of rows) {
    if (noteTitles.has(row.title)) continue;
    if (skipped.has(row.title)) {
      next.push(row);
    } else {
      orphaned.push(row.title);
    }
  }

  const content = renderManifest(next);
  const current = input.manifest.kind === "present" ? input.manifest.content : undefined;

  if (state === "parsed" && current === content) {
    return { status: "in_sync", content };
  }

  return {
    status: "drift",
    manifestState: state,
    missing: missing.sort(compareTitles),
    orphaned: orphaned.sort(compareTitles),
    changed: changed.sort(compareTitles),
    content,
  };
}
