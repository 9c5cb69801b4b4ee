import type { TimestampSource } from "./vault.ts";

export interface VaultConfig {
  path: string;
}

export interface ThresholdsConfig {
  capture_days: number;
  active_days: number;
}

export interface TimestampsConfig {
  source: Exclude<TimestampSource, "frontmatter">;
}

export interface ManifestConfig {
  file_name: string;
}

export interface Config {
  vault: VaultConfig;
  thresholds: ThresholdsConfig;
  timestamps: TimestampsConfig;
  manifest: ManifestConfig;
}

export const DEFAULT_CONFIG: Config = {
  vault: {
    path: "",
  },
  thresholds: {
    capture_days: 3,
    active_days: 30,
  },
  timestamps: {
    source: "filesystem",
  },
  manifest: {
    file_name: "MANIFEST.md",
  },
};
