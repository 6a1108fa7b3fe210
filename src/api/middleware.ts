import { createMiddleware } from "hono/factory";
import type { SearchSession } from "../backend/session";

export type Variables = {
  session: SearchSession;
};

/**
 * Makes the shared search session available to handlers as
 * `c.get("session")`.
 */
export function sessionProvider(session: SearchSession) {
  return createMiddleware<{ Variables: Variables }>(async (c, next) => {
    c.set("session", session);
    await next();
  });
}
