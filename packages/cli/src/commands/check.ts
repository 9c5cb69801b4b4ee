import { appendFile, writeFile } from "fs/promises";
import {
  formatReport,
  formatSuccess,
  hasFindings,
  info,
  loadConfig,
  parseDays,
  renderReportMarkdown,
  runVaultCheck,
  toReportJson,
  toThresholds,
} from "@vault-keeper/core";
import { resolveVaultRoot, scanOptions } from "../config.ts";

export interface CheckCommandOptions {
  captureDays?: string;
  activeDays?: string;
  json: boolean;
  output?: string;
  githubOutput: boolean;
  now?: Date;
}

async function setGithubOutput(name: string, value: string): Promise<void> {
  const githubOutput = process.env.GITHUB_OUTPUT;
  if (githubOutput) {
    await appendFile(githubOutput, `${name}=${value}\n`);
  } else {
    info(`Output: ${name}=${value}`);
  }
}

/** Exit code 0 when the vault is clean, 1 when there are findings. */
export async function checkCommand(
  vaultPath: string | undefined,
  options: CheckCommandOptions,
): Promise<number> {
  const config = await loadConfig();
  const root = resolveVaultRoot(vaultPath, config);
  const defaults = toThresholds(config);

  const report = await runVaultCheck({
    root,
    now: options.now,
    thresholds: {
      captureDays: options.captureDays ? parseDays(options.captureDays, "--capture-days") : defaults.captureDays,
      activeDays: options.activeDays ? parseDays(options.activeDays, "--active-days") : defaults.activeDays,
    },
    scan: scanOptions(config),
  });

  if (options.json) {
    console.log(JSON.stringify(toReportJson(report), null, 2));
  } else {
    console.log(formatReport(report));
  }

  const found = hasFindings(report);
  if (options.output && found) {
    await writeFile(options.output, renderReportMarkdown(report), "utf-8");
    info(formatSuccess(`Issue body written to: ${options.output}`));
  }
  if (options.githubOutput) {
    await setGithubOutput("has_tasks", String(found));
  }

  return found ? 1 : 0;
}
