import type { Hono } from "hono";
import {
  ConfigError,
  parseDays,
  runVaultCheck,
  toReportJson,
  toThresholds,
  type Thresholds,
} from "@vault-keeper/core";
import type { ServerContext } from "../types.ts";

export function reportRoute(app: Hono, ctx: ServerContext) {
  app.get("/report", async (c) => {
    const defaults = toThresholds(ctx.config);
    const captureDays = c.req.query("capture_days");
    const activeDays = c.req.query("active_days");

    let thresholds: Thresholds;
    try {
      thresholds = {
        captureDays: captureDays === undefined ? defaults.captureDays : parseDays(captureDays, "capture_days"),
        activeDays: activeDays === undefined ? defaults.activeDays : parseDays(activeDays, "active_days"),
      };
    } catch (e) {
      if (e instanceof ConfigError) return c.json({ error: e.message }, 400);
      throw e;
    }

    const report = await runVaultCheck({
      root: ctx.root,
      now: ctx.clock(),
      thresholds,
      scan: ctx.scan,
    });
    return c.json(toReportJson(report));
  });
}
