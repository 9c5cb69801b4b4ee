import { ConfigError, loadConfig } from "@vault-keeper/core";
import { resolveVaultRoot } from "../config.ts";

function parsePort(raw: string): number {
  const port = Number(raw);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new ConfigError(`--port must be a TCP port number, got "${raw}"`);
  }
  return port;
}

export async function serveCommand(
  vaultPath: string | undefined,
  options: { port?: string },
): Promise<void> {
  const config = await loadConfig();
  const { startServer } = await import("@vault-keeper/server");
  await startServer(config, {
    root: resolveVaultRoot(vaultPath, config),
    port: options.port ? parsePort(options.port) : undefined,
  });
}
