import type { ScanWarning } from "./vault.ts";

export type ManifestState = "absent" | "unparsed" | "parsed";

export interface PillarErrorFinding {
  kind: "pillar_error";
  pillar: string;
  message: string;
}

export interface ManifestDriftFinding {
  kind: "manifest_drift";
  pillar: string;
  manifestPath: string;
  manifestState: ManifestState;
  missing: string[];
  orphaned: string[];
  changed: string[];
}

export interface ManifestConflictFinding {
  kind: "manifest_conflict";
  pillar: string;
  manifestPath: string;
  reason: string;
}

export interface StaleItemFinding {
  kind: "stale_project" | "stale_capture";
  pillar: string;
  path: string;
  ageDays: number;
}

export type Finding =
  | PillarErrorFinding
  | ManifestDriftFinding
  | ManifestConflictFinding
  | StaleItemFinding;

export type FindingKind = Finding["kind"];

export interface Thresholds {
  captureDays: number;
  activeDays: number;
}

export interface Report {
  generatedAt: Date;
  root: string;
  thresholds: Thresholds;
  pillars: string[];
  findings: Finding[];
  warnings: ScanWarning[];
}
