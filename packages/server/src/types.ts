import type { Config, ScanOptions } from "@vault-keeper/core";

export interface ServerContext {
  config: Config;
  root: string;
  scan: ScanOptions;
  clock: () => Date;
}
