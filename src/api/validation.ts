import type { Context } from "hono";
import { z } from "zod";

interface Issue {
  readonly message: string;
  readonly path: readonly PropertyKey[];
}

/**
 * Responds to a request that failed validation.
 */
export function invalidRequest(c: Context, issues: readonly Issue[]) {
  const message = issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.map(String).join(".")}: ${issue.message}`
        : issue.message,
    )
    .join("; ");
  return c.json({ error: "invalid_request", message }, 400);
}

export const pageParam = z
  .string()
  .regex(/^\d+$/)
  .default("1")
  .transform((v) => Number.parseInt(v, 10));

export const orderParam = z
  .enum(["submitted_date", "-submitted_date"])
  .optional()
  .transform((v) => v ?? null);
