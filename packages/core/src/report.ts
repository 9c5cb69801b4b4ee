import type { ScanWarning } from "./types/vault.ts";
import type { Finding, FindingKind, Report, Thresholds } from "./types/report.ts";

const KIND_ORDER: readonly FindingKind[] = [
  "pillar_error",
  "manifest_drift",
  "manifest_conflict",
  "stale_project",
  "stale_capture",
];

function ordinal(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function findingPath(finding: Finding): string {
  switch (finding.kind) {
    case "pillar_error":
      return finding.message;
    case "manifest_drift":
    case "manifest_conflict":
      return finding.manifestPath;
    case "stale_project":
    case "stale_capture":
      return finding.path;
  }
}

/** Pillar path, then kind, then item path. */
export function compareFindings(a: Finding, b: Finding): number {
  return (
    ordinal(a.pillar, b.pillar) ||
    KIND_ORDER.indexOf(a.kind) - KIND_ORDER.indexOf(b.kind) ||
    ordinal(findingPath(a), findingPath(b))
  );
}

export function buildReport(input: {
  root: string;
  generatedAt: Date;
  thresholds: Thresholds;
  pillars: string[];
  findings: Finding[];
  warnings: ScanWarning[];
}): Report {
  return {
    ...input,
    pillars: [...input.pillars].sort(ordinal),
    findings: [...input.findings].sort(compareFindings),
    warnings: [...input.warnings].sort(
      (a, b) => ordinal(a.pillar, b.pillar) || ordinal(a.path, b.path) || ordinal(a.message, b.message),
    ),
  };
}

export function hasFindings(report: Report): boolean {
  return report.findings.length > 0;
}

export function toReportJson(report: Report) {
  return {
    generatedAt: report.generatedAt.toISOString(),
    root: report.root,
    thresholds: report.thresholds,
    pillars: report.pillars,
    hasFindings: hasFindings(report),
    findings: report.findings,
    warnings: report.warnings,
  };
}

function describeFinding(finding: Finding): string[] {
  switch (finding.kind) {
    case "pillar_error":
      return [`- Error: ${finding.message}`];
    case "manifest_drift": {
      const lines = [`- Manifest out of sync: \`${finding.manifestPath}\` (${finding.manifestState})`];
      for (const name of finding.missing) lines.push(`  - Add: \`[[${name}]]\``);
      for (const name of finding.orphaned) lines.push(`  - Remove: \`[[${name}]]\``);
      for (const name of finding.changed) lines.push(`  - Update tags: \`[[${name}]]\``);
      return lines;
    }
    case "manifest_conflict":
      return [`- Manifest not updated: \`${finding.manifestPath}\` (${finding.reason})`];
    case "stale_project":
      return [`- Stale project: \`${finding.path}\` (${finding.ageDays} days)`];
    case "stale_capture":
      return [`- Unprocessed inbox item: \`${finding.path}\` (${finding.ageDays} days)`];
  }
}

/** Issue body for the notification workflow. */
export function renderReportMarkdown(report: Report): string {
  const lines = [
    "# Vault Cleaning Tasks",
    "",
    `Generated ${report.generatedAt.toISOString()}. Inbox threshold: ${report.thresholds.captureDays} days. Project threshold: ${report.thresholds.activeDays} days.`,
    "",
  ];

  if (!hasFindings(report)) {
    lines.push("No cleaning tasks found.", "");
    return lines.join("\n");
  }

  let pillar: string | undefined;
  for (const finding of report.findings) {
    if (finding.pillar !== pillar) {
      if (pillar !== undefined) lines.push("");
      pillar = finding.pillar;
      lines.push(`## ${pillar}`, "");
    }
    lines.push(...describeFinding(finding));
  }

  lines.push(
    "",
    "---",
    "",
    "Regenerate manifests with `vk sync`. Move inbox items to `Knowledge/` or `Projects/`, or delete them.",
    "Archive stale projects as a summary in `Knowledge/`.",
    "",
  );
  return lines.join("\n");
}
