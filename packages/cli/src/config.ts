import { resolve } from "path";
import type { Config, ScanOptions } from "@vault-keeper/core";

/** Explicit argument, then configured vault, then the working directory. */
export function resolveVaultRoot(vaultPath: string | undefined, config: Config): string {
  return resolve(vaultPath ?? (config.vault.path || process.cwd()));
}

export function scanOptions(config: Config): ScanOptions {
  return {
    manifestFileName: config.manifest.file_name,
    timestampSource: config.timestamps.source,
  };
}
