import type { Hono } from "hono";
import { syncManifests } from "@vault-keeper/core";
import type { ServerContext } from "../types.ts";

export function manifestsRoute(app: Hono, ctx: ServerContext) {
  app.get("/manifests", async (c) => {
    const { outcomes, warnings } = await syncManifests({ root: ctx.root, check: true, scan: ctx.scan });
    return c.json({ outcomes, warnings });
  });

  app.post("/manifests/sync", async (c) => {
    const { outcomes, warnings } = await syncManifests({ root: ctx.root, scan: ctx.scan });
    return c.json({ outcomes, warnings });
  });
}
