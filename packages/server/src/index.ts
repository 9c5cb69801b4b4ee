import { Hono } from "hono";
import { cors } from "hono/cors";
import { serve } from "@hono/node-server";
import { mkdir, writeFile } from "fs/promises";
import { join, resolve } from "path";
import { randomUUID } from "crypto";
import { VaultAccessError, error, getConfigDir, info, type Config } from "@vault-keeper/core";
import { healthRoute } from "./routes/health.ts";
import { reportRoute } from "./routes/report.ts";
import { manifestsRoute } from "./routes/manifests.ts";
import { authMiddleware } from "./middleware/auth.ts";
import type { ServerContext } from "./types.ts";

export type { ServerContext } from "./types.ts";

export function createApp(
  config: Config,
  options: { root: string; token: string; clock?: () => Date },
): Hono {
  const app = new Hono();
  const ctx: ServerContext = {
    config,
    root: options.root,
    scan: {
      manifestFileName: config.manifest.file_name,
      timestampSource: config.timestamps.source,
    },
    clock: options.clock ?? (() => new Date()),
  };

  app.use("*", cors({ origin: ["app://obsidian.md", "http://localhost"] }));
  app.use("*", authMiddleware(options.token));

  healthRoute(app, ctx);
  reportRoute(app, ctx);
  manifestsRoute(app, ctx);

  app.onError((e, c) => {
    if (e instanceof VaultAccessError) {
      return c.json({ error: e.message }, 500);
    }
    error("Request failed:", e.message);
    return c.json({ error: "Internal server error" }, 500);
  });

  return app;
}

export async function startServer(
  config: Config,
  options: { port?: number; root?: string } = {},
) {
  const port = options.port ?? 3118;
  const root = resolve(options.root ?? (config.vault.path || process.cwd()));
  const token = randomUUID();

  // Write server info for clients to discover
  const configDir = getConfigDir();
  await mkdir(configDir, { recursive: true });
  await writeFile(
    join(configDir, "server.json"),
    JSON.stringify({ port, token, pid: process.pid }, null, 2),
  );

  const app = createApp(config, { root, token });

  info(`Vault keeper server running on http://localhost:${port}`);
  info(`Auth token: ${token}`);

  return serve({ fetch: app.fetch, port });
}
