import type { Finding, Report } from "../types/report.ts";
import type { SyncOutcome } from "../run.ts";

const RESET = "\x1b[0m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const CYAN = "\x1b[36m";
const GREEN = "\x1b[32m";
const YELLOW = "\x1b[33m";

export function formatSuccess(message: string): string {
  return `${GREEN}✓${RESET} ${message}`;
}

export function formatError(message: string): string {
  return `\x1b[31m✗${RESET} ${message}`;
}

export function formatWarning(message: string): string {
  return `${YELLOW}⚠${RESET} ${message}`;
}

function counts(parts: { missing: string[]; orphaned: string[]; changed: string[] }): string {
  return `${DIM}+${parts.missing.length} -${parts.orphaned.length} ~${parts.changed.length}${RESET}`;
}

function formatFinding(finding: Finding): string {
  switch (finding.kind) {
    case "pillar_error":
      return formatError(finding.message);
    case "manifest_drift":
      return formatWarning(`${CYAN}${finding.manifestPath}${RESET} out of sync ${counts(finding)}`);
    case "manifest_conflict":
      return formatWarning(`${CYAN}${finding.manifestPath}${RESET} skipped: ${finding.reason}`);
    case "stale_project":
      return formatWarning(`Stale project ${CYAN}${finding.path}${RESET} ${DIM}(${finding.ageDays} days)${RESET}`);
    case "stale_capture":
      return formatWarning(`Inbox item ${CYAN}${finding.path}${RESET} ${DIM}(${finding.ageDays} days)${RESET}`);
  }
}

export function formatReport(report: Report): string {
  const lines = [
    `${BOLD}Vault:${RESET}   ${DIM}${report.root}${RESET}`,
    `${BOLD}Pillars:${RESET} ${report.pillars.length}`,
    "",
  ];

  if (report.findings.length === 0) {
    lines.push(formatSuccess("No cleaning tasks found. Vault is tidy!"));
    return lines.join("\n");
  }

  let pillar: string | undefined;
  for (const finding of report.findings) {
    if (finding.pillar !== pillar) {
      pillar = finding.pillar;
      lines.push(`${BOLD}${pillar}${RESET}`);
    }
    lines.push(`  ${formatFinding(finding)}`);
  }
  return lines.join("\n");
}

export function formatSyncOutcome(outcome: SyncOutcome): string {
  switch (outcome.status) {
    case "in_sync":
      return formatSuccess(`${outcome.manifestPath} is in sync`);
    case "written":
      return formatSuccess(`${outcome.manifestPath} updated ${counts(outcome)}`);
    case "out_of_sync":
      return formatError(`${outcome.manifestPath} is out of sync ${counts(outcome)}`);
    case "conflict":
      return formatWarning(`${outcome.manifestPath} skipped: ${outcome.reason}`);
    case "error":
      return formatError(`${outcome.pillar}: ${outcome.message}`);
  }
}
