import { Command } from "commander";
import { ConfigError, VaultAccessError, error, setVerbose } from "@vault-keeper/core";
import { checkCommand } from "./commands/check.ts";
import { syncCommand } from "./commands/sync.ts";
import { hookCommand, readStdin } from "./commands/hook.ts";
import { serveCommand } from "./commands/serve.ts";

export const EXIT_FATAL = 2;

/** Runs a command and records its exit code; fatal errors map to EXIT_FATAL. */
async function run(action: () => Promise<number | void>): Promise<void> {
  try {
    const code = await action();
    if (typeof code === "number") process.exitCode = code;
  } catch (e) {
    if (e instanceof VaultAccessError || e instanceof ConfigError) {
      error(e.message);
      process.exitCode = EXIT_FATAL;
      return;
    }
    throw e;
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("vk")
    .description("Keep pillar manifests in sync and flag stale inbox and project notes")
    .version("0.1.0")
    .option("-v, --verbose", "Enable verbose logging")
    .hook("preAction", (thisCommand) => {
      if (thisCommand.opts().verbose) {
        setVerbose(true);
      }
    });

  program
    .command("check")
    .description("Report manifest drift and stale items across all pillars")
    .argument("[vault-path]", "Vault root (defaults to VK_VAULT, config, or the current directory)")
    .option("--capture-days <days>", "Inbox age threshold in days")
    .option("--active-days <days>", "Projects age threshold in days")
    .option("--json", "Output as JSON", false)
    .option("-o, --output <file>", "Write a markdown issue body when there are findings")
    .option("--github-output", "Append has_tasks to $GITHUB_OUTPUT", false)
    .action(
      async (
        vaultPath: string | undefined,
        options: {
          captureDays?: string;
          activeDays?: string;
          json: boolean;
          output?: string;
          githubOutput: boolean;
        },
      ) => {
        await run(() => checkCommand(vaultPath, options));
      },
    );

  program
    .command("sync")
    .description("Regenerate every Knowledge/MANIFEST.md from the notes present")
    .argument("[vault-path]", "Vault root")
    .option("--check", "Only report; exit 1 if any manifest is out of sync", false)
    .action(async (vaultPath: string | undefined, options: { check: boolean }) => {
      await run(() => syncCommand(vaultPath, options));
    });

  program
    .command("hook")
    .description("Update manifests from a post-write tool payload on stdin")
    .option("--root <dir>", "Vault root")
    .action(async (options: { root?: string }) => {
      await run(async () => hookCommand(await readStdin(), options));
    });

  program
    .command("serve")
    .description("Start the local HTTP server")
    .argument("[vault-path]", "Vault root")
    .option("-p, --port <number>", "Port to listen on (default: 3118)")
    .action(async (vaultPath: string | undefined, options: { port?: string }) => {
      await run(() => serveCommand(vaultPath, options));
    });

  return program;
}
