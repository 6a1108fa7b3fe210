import { zValidator } from "@hono/zod-validator";
import { Temporal } from "@js-temporal/polyfill";
import { getLogger } from "@logtape/logtape";
import { Hono } from "hono";
import { z } from "zod";
import {
  type AdvancedQuery,
  parseFieldedQuery,
  SEARCH_FIELDS,
  type SimpleQuery,
} from "../search";
import {
  advancedFormSchema,
  formToQuery,
  parseClassification,
  parsePlainDate,
  startOfDay,
} from "./forms";
import type { Variables } from "./middleware";
import { invalidRequest, orderParam, pageParam } from "./validation";

const logger = getLogger(["papersearch", "api", "search"]);

const app = new Hono<{ Variables: Variables }>();

const dateParam = z.string().transform((value, ctx) => {
  const date = parsePlainDate(value);
  if (date == null) {
    ctx.addIssue({ code: "custom", message: `Not a valid date: ${value}` });
    return z.NEVER;
  }
  return startOfDay(date);
});

const classificationParam = z.string().transform((value, ctx) => {
  const classification = parseClassification(value);
  if (classification == null) {
    ctx.addIssue({
      code: "custom",
      message: `Not a valid classification: ${value}`,
    });
    return z.NEVER;
  }
  return classification;
});

const advancedParams = z
  .object({
    q: z.string().default(""),
    date_from: dateParam.optional(),
    date_to: dateParam.optional(),
    classification: z
      .union([classificationParam, z.array(classificationParam)])
      .optional(),
    page: pageParam,
    size: z
      .enum(["25", "50", "100"])
      .default("25")
      .transform((v) => Number.parseInt(v, 10)),
    order: orderParam,
  })
  .superRefine(({ date_from: from, date_to: to }, ctx) => {
    if (
      from != null &&
      to != null &&
      Temporal.PlainDateTime.compare(from, to) >= 0
    ) {
      ctx.addIssue({
        code: "custom",
        message: "End date must be later than start date",
        path: ["date_to"],
      });
    }
  });

app.get(
  "/search",
  zValidator(
    "query",
    z.object({
      q: z.string().trim().min(1),
      field: z.enum(SEARCH_FIELDS).default("all"),
      page: pageParam,
      size: z
        .enum(["25", "50", "100", "200"])
        .default("50")
        .transform((v) => Number.parseInt(v, 10)),
      order: orderParam,
    }),
    (result, c) => {
      if (!result.success) return invalidRequest(c, result.error.issues);
    },
  ),
  async (c) => {
    const params = c.req.valid("query");
    const query: SimpleQuery = {
      type: "simple",
      field: params.field,
      term: params.q,
      order: params.order,
      page: params.page,
      pageSize: params.size,
    };
    logger.debug("Simple search on {field}: {term}", {
      field: query.field,
      term: query.term,
    });
    const results = await c
      .get("session")
      .search(query, { signal: c.req.raw.signal });
    return c.json(results);
  },
);

app.get(
  "/advanced",
  zValidator(
    "query",
    advancedParams,
    (result, c) => {
      if (!result.success) return invalidRequest(c, result.error.issues);
    },
  ),
  async (c) => {
    const params = c.req.valid("query");
    const classifications =
      params.classification == null
        ? []
        : Array.isArray(params.classification)
          ? params.classification
          : [params.classification];
    const query: AdvancedQuery = {
      type: "advanced",
      terms: parseFieldedQuery(params.q),
      dateRange:
        params.date_from == null && params.date_to == null
          ? undefined
          : { startDate: params.date_from, endDate: params.date_to },
      primaryClassification: classifications,
      order: params.order,
      page: params.page,
      pageSize: params.size,
    };
    logger.debug("Advanced search: {q}", { q: params.q });
    const results = await c
      .get("session")
      .search(query, { signal: c.req.raw.signal });
    return c.json(results);
  },
);

app.post(
  "/advanced",
  zValidator("json", advancedFormSchema, (result, c) => {
    if (!result.success) return invalidRequest(c, result.error.issues);
  }),
  async (c) => {
    const query = formToQuery(c.req.valid("json"));
    logger.debug("Advanced search with {count} terms", {
      count: query.terms.length,
    });
    const results = await c
      .get("session")
      .search(query, { signal: c.req.raw.signal });
    return c.json(results);
  },
);

export default app;
