import type { Context, Next } from "hono";

const PUBLIC_PATHS = new Set(["/health"]);

export function authMiddleware(validToken: string) {
  return async (c: Context, next: Next) => {
    if (PUBLIC_PATHS.has(c.req.path)) return next();
    const token = c.req.header("Authorization")?.replace("Bearer ", "");
    if (token !== validToken) {
      return c.json({ error: "Unauthorized" }, 401);
    }
    return next();
  };
}
