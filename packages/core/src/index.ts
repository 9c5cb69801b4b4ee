// Orchestration
export { runVaultCheck, syncManifests, syncManifestFor } from "./run.ts";
export type { CheckOptions, SyncOutcome, SyncResult } from "./run.ts";
export { handleHookPayload, parseHookPayload } from "./hook.ts";
export type { HookPayload } from "./hook.ts";

// Components
export { discoverPillars, scanVault, scanPillar } from "./vault/scanner.ts";
export type { ScanOptions } from "./vault/scanner.ts";
export { compareManifest } from "./manifest/reconciler.ts";
export type { ReconcileInput, ReconcileResult, ManifestDrift } from "./manifest/reconciler.ts";
export { parseManifest, renderManifest, compareTitles } from "./manifest/format.ts";
export type { ManifestRow, ParsedManifest } from "./manifest/format.ts";
export { applyManifest, findReferenceFolder, readManifestSource } from "./manifest/manifest-file.ts";
export type { ApplyOutcome } from "./manifest/manifest-file.ts";
export { ageInDays, detectStale, findStaleItems } from "./staleness.ts";
export { buildReport, compareFindings, hasFindings, renderReportMarkdown, toReportJson } from "./report.ts";

// Integrations
export * as vaultFs from "./integrations/vault-fs.ts";
export { gitCommitDates, parseCommitTimestamp } from "./integrations/git.ts";
export type { CommitDateLookup } from "./integrations/git.ts";

// Config & errors
export { loadConfig, getConfigDir, getConfigPath, getVaultPath, parseDays, toThresholds } from "./config.ts";
export { VaultAccessError, ConfigError, errorMessage } from "./errors.ts";

// Types
export type { Config, VaultConfig, ThresholdsConfig, TimestampsConfig, ManifestConfig } from "./types/config.ts";
export { DEFAULT_CONFIG } from "./types/config.ts";
export type {
  NoteFrontmatter,
  NoteMetadata,
  NoteRecord,
  PillarLocation,
  PillarSnapshot,
  ReferenceSnapshot,
  ManifestSource,
  ScanWarning,
  TimedItem,
  TimestampSource,
  VaultSnapshot,
} from "./types/vault.ts";
export { CAPTURE_DIR, ACTIVE_DIR, REFERENCE_DIR, NOTE_EXTENSION } from "./types/vault.ts";
export type {
  Finding,
  FindingKind,
  ManifestState,
  Report,
  Thresholds,
} from "./types/report.ts";

// Utils
export { setVerbose, debug, info, error, warn } from "./utils/logger.ts";
export {
  formatReport,
  formatSyncOutcome,
  formatSuccess,
  formatError,
  formatWarning,
} from "./utils/formatter.ts";
export {
  parseFrontmatter,
  extractMetadata,
  extractWikilinks,
  extractTags,
} from "./utils/markdown.ts";
