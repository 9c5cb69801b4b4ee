/** The vault root cannot be used at all; no report is produced. */
export class VaultAccessError extends Error {
  readonly root: string;

  constructor(root: string, reason: string) {
    super(`Cannot read vault at ${root}: ${reason}`);
    this.name = "VaultAccessError";
    this.root = root;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
