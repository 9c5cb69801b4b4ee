import { dirname, join } from "path";
import { REFERENCE_DIR, type PillarSnapshot, type ReferenceSnapshot, type ScanWarning } from "./types/vault.ts";
import type { Finding, ManifestState, Report, Thresholds } from "./types/report.ts";
import { DEFAULT_CONFIG } from "./types/config.ts";
import { scanPillar, scanVault, type ScanOptions } from "./vault/scanner.ts";
import { compareManifest } from "./manifest/reconciler.ts";
import { applyManifest, findReferenceFolder } from "./manifest/manifest-file.ts";
import { findStaleItems } from "./staleness.ts";
import { buildReport } from "./report.ts";
import { toVaultPath } from "./integrations/vault-fs.ts";
import { debug, warn } from "./utils/logger.ts";

export interface CheckOptions {
  root: string;
  /** Evaluation instant shared by every item in the run. */
  now?: Date;
  thresholds?: Partial<Thresholds>;
  scan?: ScanOptions;
}

interface DriftCounts {
  manifestState: ManifestState;
  missing: string[];
  orphaned: string[];
  changed: string[];
}

export type SyncOutcome =
  | { pillar: string; manifestPath: string; status: "in_sync" }
  | ({ pillar: string; manifestPath: string; status: "out_of_sync" | "written" } & DriftCounts)
  | { pillar: string; manifestPath: string; status: "conflict"; reason: string }
  | { pillar: string; manifestPath: string; status: "error"; message: string };

export interface SyncResult {
  outcomes: SyncOutcome[];
  warnings: ScanWarning[];
}

function logWarnings(warnings: ScanWarning[]): void {
  for (const w of warnings) warn(`${w.path}: ${w.message}`);
}

export async function runVaultCheck(options: CheckOptions): Promise<Report> {
  const now = options.now ?? new Date();
  const thresholds: Thresholds = {
    captureDays: options.thresholds?.captureDays ?? DEFAULT_CONFIG.thresholds.capture_days,
    activeDays: options.thresholds?.activeDays ?? DEFAULT_CONFIG.thresholds.active_days,
  };

  const snapshot = await scanVault(options.root, options.scan);
  const findings: Finding[] = [];
  const warnings: ScanWarning[] = [];

  for (const pillar of snapshot.pillars) {
    const name = pillar.pillar.path;
    warnings.push(...pillar.warnings);
    for (const message of pillar.errors) {
      findings.push({ kind: "pillar_error", pillar: name, message });
    }

    if (pillar.reference) {
      const result = compareManifest(pillar.reference);
      if (result.status === "drift") {
        findings.push({
          kind: "manifest_drift",
          pillar: name,
          manifestPath: toVaultPath(options.root, pillar.reference.manifestPath),
          manifestState: result.manifestState,
          missing: result.missing,
          orphaned: result.orphaned,
          changed: result.changed,
        });
      }
    }

    findings.push(...findStaleItems(name, pillar, thresholds, now));
  }

  logWarnings(warnings);
  debug(`Check finished with ${findings.length} finding(s)`);

  return buildReport({
    root: options.root,
    generatedAt: now,
    thresholds,
    pillars: snapshot.pillars.map((p) => p.pillar.path),
    findings,
    warnings,
  });
}

async function syncReference(
  root: string,
  pillar: string,
  reference: ReferenceSnapshot,
  check: boolean,
): Promise<SyncOutcome> {
  const manifestPath = toVaultPath(root, reference.manifestPath);

  if (check) {
    const result = compareManifest(reference);
    if (result.status === "in_sync") return { pillar, manifestPath, status: "in_sync" };
    const { manifestState, missing, orphaned, changed } = result;
    return { pillar, manifestPath, status: "out_of_sync", manifestState, missing, orphaned, changed };
  }

  const applied = await applyManifest(reference);
  switch (applied.status) {
    case "unchanged":
      return { pillar, manifestPath, status: "in_sync" };
    case "conflict":
      return { pillar, manifestPath, status: "conflict", reason: applied.reason };
    case "written": {
      const { manifestState, missing, orphaned, changed } = applied.result;
      return { pillar, manifestPath, status: "written", manifestState, missing, orphaned, changed };
    }
  }
}

async function syncPillar(root: string, snapshot: PillarSnapshot, check: boolean): Promise<SyncOutcome | undefined> {
  const pillar = snapshot.pillar.path;
  if (!snapshot.pillar.has.reference) return undefined;
  if (!snapshot.reference) {
    const manifestPath = toVaultPath(root, join(snapshot.pillar.absolutePath, REFERENCE_DIR));
    return { pillar, manifestPath, status: "error", message: snapshot.errors.join("; ") };
  }
  return syncReference(root, pillar, snapshot.reference, check);
}

/** Checks or regenerates every manifest in the vault, one outcome per reference folder. */
export async function syncManifests(options: {
  root: string;
  check?: boolean;
  scan?: ScanOptions;
}): Promise<SyncResult> {
  const snapshot = await scanVault(options.root, options.scan);
  const outcomes: SyncOutcome[] = [];
  const warnings = snapshot.pillars.flatMap((p) => p.warnings);

  for (const pillar of snapshot.pillars) {
    const outcome = await syncPillar(options.root, pillar, options.check ?? false);
    if (outcome) outcomes.push(outcome);
  }

  logWarnings(warnings);
  return { outcomes, warnings };
}

/**
 * Regenerates only the manifest of the reference folder containing
 * `filePath`. Returns undefined when the file is not under a Knowledge folder.
 */
export async function syncManifestFor(
  filePath: string,
  options: { root: string; scan?: ScanOptions },
): Promise<SyncResult | undefined> {
  const referenceDir = findReferenceFolder(filePath);
  if (!referenceDir) return undefined;

  const pillarDir = dirname(referenceDir);
  const snapshot = await scanPillar(
    options.root,
    {
      path: toVaultPath(options.root, pillarDir),
      absolutePath: pillarDir,
      has: { capture: false, active: false, reference: true },
    },
    options.scan,
  );

  const outcome = await syncPillar(options.root, snapshot, false);
  logWarnings(snapshot.warnings);
  return { outcomes: outcome ? [outcome] : [], warnings: snapshot.warnings };
}
