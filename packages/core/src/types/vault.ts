export const CAPTURE_DIR = "Inbox";
export const ACTIVE_DIR = "Projects";
export const REFERENCE_DIR = "Knowledge";
export const NOTE_EXTENSION = ".md";

export interface NoteFrontmatter {
  tags?: string[] | string;
  created?: string | Date;
  date?: string | Date;
  [key: string]: unknown;
}

export type NoteMetadata =
  | { status: "parsed"; tags: string[]; links: string[]; date?: Date }
  | { status: "unparsed"; reason: string };

export interface PillarLocation {
  /** Vault-relative path with forward slashes; "." is the vault root itself. */
  path: string;
  absolutePath: string;
  has: { capture: boolean; active: boolean; reference: boolean };
}

export interface NoteRecord {
  path: string;
  title: string;
  modifiedAt: Date;
  tags: string[];
  links: string[];
}

export type TimestampSource = "frontmatter" | "git" | "filesystem";

export interface TimedItem {
  path: string;
  title: string;
  timestamp: Date;
  timestampSource: TimestampSource;
}

export interface ScanWarning {
  pillar: string;
  path: string;
  message: string;
}

export type ManifestSource =
  | { kind: "absent" }
  | { kind: "present"; content: string }
  | { kind: "unreadable"; reason: string };

export interface ReferenceSnapshot {
  /** Absolute path of the reference folder. */
  dir: string;
  manifestPath: string;
  records: NoteRecord[];
  /** Titles of notes present on disk but excluded from `records`. */
  skipped: string[];
  manifest: ManifestSource;
}

export interface PillarSnapshot {
  pillar: PillarLocation;
  reference?: ReferenceSnapshot;
  capture: TimedItem[];
  active: TimedItem[];
  warnings: ScanWarning[];
  errors: string[];
}

export interface VaultSnapshot {
  root: string;
  pillars: PillarSnapshot[];
}
