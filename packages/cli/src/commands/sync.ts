import { formatSyncOutcome, info, loadConfig, syncManifests } from "@vault-keeper/core";
import { resolveVaultRoot, scanOptions } from "../config.ts";

export async function syncCommand(
  vaultPath: string | undefined,
  options: { check: boolean },
): Promise<number> {
  const config = await loadConfig();
  const root = resolveVaultRoot(vaultPath, config);
  const { outcomes } = await syncManifests({ root, check: options.check, scan: scanOptions(config) });

  if (outcomes.length === 0) {
    console.log("No pillars found (folders with Knowledge/ subdirectory)");
    return 0;
  }

  for (const outcome of outcomes) {
    console.log(formatSyncOutcome(outcome));
  }

  const settled = outcomes.every((o) => o.status === "in_sync" || o.status === "written");
  if (!settled && options.check) {
    info("\nManifests are out of sync. Run without --check to update.");
  }
  return settled ? 0 : 1;
}
