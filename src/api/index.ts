import { getLogger } from "@logtape/logtape";
import { type Context, Hono } from "hono";
import { compress } from "hono/compress";
import { cors } from "hono/cors";
import { HTTPException } from "hono/http-exception";
import type { SearchSession } from "../backend/session";
import {
  DocumentNotFound,
  IndexConnectionError,
  IndexingError,
  MappingError,
  OutsideAllowedRange,
  QueryError,
} from "../errors";
import documents from "./documents";
import health from "./health";
import { sessionProvider, type Variables } from "./middleware";
import search from "./search";

const logger = getLogger(["papersearch", "api"]);

type ErrorStatus = 400 | 404 | 500 | 503;

const ERROR_RESPONSES: readonly [
  new (...args: never[]) => Error,
  string,
  ErrorStatus,
][] = [
  [QueryError, "query_error", 400],
  [OutsideAllowedRange, "outside_allowed_range", 400],
  [DocumentNotFound, "document_not_found", 404],
  [IndexConnectionError, "index_connection_error", 503],
  [IndexingError, "indexing_error", 500],
  [MappingError, "mapping_error", 500],
];

export function handleError(error: Error, c: Context): Response {
  if (error instanceof HTTPException) return error.getResponse();
  for (const [type, code, status] of ERROR_RESPONSES) {
    if (!(error instanceof type)) continue;
    if (status >= 500) {
      logger.error("{method} {path} failed: {error}", {
        method: c.req.method,
        path: c.req.path,
        error,
      });
    }
    return c.json({ error: code, message: error.message }, status);
  }
  logger.error("Unexpected error on {method} {path}: {error}", {
    method: c.req.method,
    path: c.req.path,
    error,
  });
  return c.json(
    { error: "internal_error", message: "Internal server error" },
    500,
  );
}

/**
 * Create the HTTP API over a search session.
 *
 * @example
 * ```typescript
 * const session = new SearchSession(transport, { mapping });
 * serve({ fetch: createApi(session).fetch, port: 3000 });
 * ```
 */
export function createApi(session: SearchSession) {
  const app = new Hono<{ Variables: Variables }>();

  // Enable gzip/deflate compression for all API responses
  app.use("*", compress());

  app.use(
    cors({
      origin: "*",
      allowMethods: ["GET", "HEAD", "POST"],
    }),
  );
  app.use(sessionProvider(session));

  app.route("/", search);
  app.route("/documents", documents);
  app.route("/health", health);

  app.onError(handleError);
  return app;
}
