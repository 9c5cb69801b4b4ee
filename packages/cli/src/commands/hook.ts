import { error, errorMessage, formatSyncOutcome, handleHookPayload, info, loadConfig } from "@vault-keeper/core";
import { resolveVaultRoot, scanOptions } from "../config.ts";

export async function readStdin(stream: NodeJS.ReadableStream = process.stdin): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString("utf-8");
}

/** Never fails the calling tool: always exits 0. */
export async function hookCommand(raw: string, options: { root?: string }): Promise<number> {
  try {
    const config = await loadConfig();
    const root = resolveVaultRoot(options.root, config);
    const outcomes = await handleHookPayload(raw, { root, scan: scanOptions(config) });
    for (const outcome of outcomes) {
      info(formatSyncOutcome(outcome));
    }
  } catch (e) {
    error("Manifest hook failed:", errorMessage(e));
  }
  return 0;
}
