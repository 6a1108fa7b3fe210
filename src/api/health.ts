import { Hono } from "hono";
import type { Variables } from "./middleware";

const app = new Hono<{ Variables: Variables }>();

app.get("/", async (c) => {
  const available = await c.get("session").clusterAvailable();
  return c.json({ available }, available ? 200 : 503);
});

export default app;
