import { isAbsolute, join } from "path";
import { z } from "zod";
import { REFERENCE_DIR } from "./types/vault.ts";
import type { ScanOptions } from "./vault/scanner.ts";
import { syncManifestFor, syncManifests, type SyncOutcome } from "./run.ts";
import { debug } from "./utils/logger.ts";

/** Payload an editor or agent sends after it writes to the vault. */
const hookPayloadSchema = z.object({
  tool_name: z.string(),
  tool_input: z
    .object({
      file_path: z.string().optional(),
      command: z.string().optional(),
    })
    .passthrough()
    .optional(),
});

export type HookPayload = z.infer<typeof hookPayloadSchema>;

const FILE_TOOLS = new Set(["Write", "Edit", "MultiEdit"]);

export function parseHookPayload(raw: string): HookPayload | undefined {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return undefined;
  }
  const parsed = hookPayloadSchema.safeParse(json);
  return parsed.success ? parsed.data : undefined;
}

/**
 * File writes refresh the manifest of the folder they landed in; a shell
 * command that mentions Knowledge refreshes every manifest. Everything else
 * is ignored.
 */
export async function handleHookPayload(
  raw: string,
  options: { root: string; scan?: ScanOptions },
): Promise<SyncOutcome[]> {
  const payload = parseHookPayload(raw);
  if (!payload) {
    debug("Ignoring hook payload that is not valid JSON of the expected shape");
    return [];
  }

  const input = payload.tool_input;
  if (FILE_TOOLS.has(payload.tool_name) && input?.file_path) {
    const filePath = isAbsolute(input.file_path) ? input.file_path : join(options.root, input.file_path);
    const result = await syncManifestFor(filePath, options);
    return result?.outcomes ?? [];
  }

  if (payload.tool_name === "Bash" && input?.command?.includes(REFERENCE_DIR)) {
    const result = await syncManifests({ root: options.root, scan: options.scan });
    return result.outcomes;
  }

  debug(`Ignoring ${payload.tool_name} hook payload`);
  return [];
}
