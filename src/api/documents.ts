import { zValidator } from "@hono/zod-validator";
import { getLogger } from "@logtape/logtape";
import { Hono } from "hono";
import { z } from "zod";
import { documentSchema, getDocumentId } from "../entities/document";
import type { Variables } from "./middleware";
import { invalidRequest } from "./validation";

const logger = getLogger(["papersearch", "api", "documents"]);

const app = new Hono<{ Variables: Variables }>();

app.get("/:id", async (c) => {
  const document = await c.get("session").getDocument(c.req.param("id"));
  return c.json(document);
});

app.post(
  "/",
  zValidator("json", documentSchema, (result, c) => {
    if (!result.success) return invalidRequest(c, result.error.issues);
  }),
  async (c) => {
    const document = c.req.valid("json");
    await c.get("session").addDocument(document);
    const id = getDocumentId(document);
    logger.info("Indexed document {id}", { id });
    return c.json({ id }, 201);
  },
);

app.post(
  "/bulk",
  zValidator(
    "json",
    z.object({
      documents: z.array(documentSchema),
      chunk_size: z.number().int().positive().optional(),
    }),
    (result, c) => {
      if (!result.success) return invalidRequest(c, result.error.issues);
    },
  ),
  async (c) => {
    const { documents, chunk_size } = c.req.valid("json");
    await c.get("session").bulkAddDocuments(documents, chunk_size);
    logger.info("Indexed {count} documents", { count: documents.length });
    return c.json({ count: documents.length }, 201);
  },
);

export default app;
