import type { Hono } from "hono";
import type { ServerContext } from "../types.ts";

export function healthRoute(app: Hono, ctx: ServerContext) {
  app.get("/health", (c) => {
    return c.json({
      status: "ok",
      vault: ctx.root,
      pid: process.pid,
    });
  });
}
