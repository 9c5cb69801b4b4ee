import { homedir } from "os";
import { join, resolve } from "path";
import { existsSync } from "fs";
import { readFile } from "fs/promises";
import { z } from "zod";
import type { Config, TimestampsConfig } from "./types/config.ts";
import { DEFAULT_CONFIG } from "./types/config.ts";
import type { Thresholds } from "./types/report.ts";
import { ConfigError } from "./errors.ts";

const days = z.number().int().nonnegative();

const configFileSchema = z
  .object({
    vault: z.object({ path: z.string() }).partial(),
    thresholds: z.object({ capture_days: days, active_days: days }).partial(),
    timestamps: z.object({ source: z.enum(["filesystem", "git"]) }).partial(),
    manifest: z.object({ file_name: z.string().min(1) }).partial(),
  })
  .partial();

type Env = Record<string, string | undefined>;

export function getConfigDir(env: Env = process.env): string {
  return env.VK_HOME ? resolve(env.VK_HOME) : join(homedir(), ".vault-keeper");
}

export function getConfigPath(env: Env = process.env): string {
  return env.VK_CONFIG ? resolve(env.VK_CONFIG) : join(getConfigDir(env), "config.json");
}

export function getVaultPath(env: Env = process.env): string | undefined {
  const envVault = env.VK_VAULT;
  if (envVault) return resolve(envVault);
  return undefined;
}

function envDays(env: Env, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw === "") return undefined;
  return parseDays(raw, key);
}

/** Parses a non-negative whole number of days from a flag or env value. */
export function parseDays(raw: string, name: string): number {
  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigError(`${name} must be a non-negative whole number of days, got "${raw}"`);
  }
  return parseInt(raw, 10);
}

async function readConfigFile(path: string): Promise<z.infer<typeof configFileSchema>> {
  if (!existsSync(path)) return {};

  let json: unknown;
  try {
    json = JSON.parse(await readFile(path, "utf-8"));
  } catch (e) {
    throw new ConfigError(`Invalid JSON in ${path}: ${e instanceof Error ? e.message : String(e)}`);
  }

  const parsed = configFileSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue ? issue.path.join(".") : "config";
    throw new ConfigError(`Invalid ${field} in ${path}: ${issue?.message ?? "unknown error"}`);
  }
  return parsed.data;
}

function isTimestampSource(value: string): value is TimestampsConfig["source"] {
  return value === "filesystem" || value === "git";
}

/** Defaults, overlaid by the config file, overlaid by VK_* environment variables. */
export async function loadConfig(env: Env = process.env): Promise<Config> {
  const file = await readConfigFile(getConfigPath(env));
  const source = env.VK_TIMESTAMPS || undefined;
  if (source !== undefined && !isTimestampSource(source)) {
    throw new ConfigError(`VK_TIMESTAMPS must be "filesystem" or "git", got "${source}"`);
  }

  return {
    vault: {
      path: getVaultPath(env) ?? file.vault?.path ?? DEFAULT_CONFIG.vault.path,
    },
    thresholds: {
      capture_days:
        envDays(env, "VK_CAPTURE_DAYS") ??
        file.thresholds?.capture_days ??
        DEFAULT_CONFIG.thresholds.capture_days,
      active_days:
        envDays(env, "VK_ACTIVE_DAYS") ??
        file.thresholds?.active_days ??
        DEFAULT_CONFIG.thresholds.active_days,
    },
    timestamps: {
      source: source ?? file.timestamps?.source ?? DEFAULT_CONFIG.timestamps.source,
    },
    manifest: {
      file_name: file.manifest?.file_name ?? DEFAULT_CONFIG.manifest.file_name,
    },
  };
}

export function toThresholds(config: Config): Thresholds {
  return {
    captureDays: config.thresholds.capture_days,
    activeDays: config.thresholds.active_days,
  };
}
