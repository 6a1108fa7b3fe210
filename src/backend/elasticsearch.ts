import { Client, errors } from "@elastic/elasticsearch";
import { getLogger } from "@logtape/logtape";
import { chunk } from "es-toolkit";
import { z } from "zod";
import type { ElasticsearchConfig } from "../config";
import type { SearchRequestDocument } from "../search/render";
import type { RawSearchResponse } from "../search/results";
import {
  failure,
  type IndexAction,
  type IndexDefinition,
  type RequestOptions,
  type SearchTransport,
  success,
  type TransportFault,
  type TransportResult,
} from "./transport";

const logger = getLogger(["papersearch", "backend", "elasticsearch"]);

const faultBodySchema = z.object({
  error: z
    .union([
      z.string(),
      z.object({ type: z.string(), reason: z.string().nullish() }),
    ])
    .optional(),
  found: z.boolean().optional(),
});

const ERROR_TYPE_FAULTS: Record<string, TransportFault["kind"]> = {
  index_not_found_exception: "index_not_found",
  resource_already_exists_exception: "already_exists",
  mapper_parsing_exception: "mapping",
  parsing_exception: "parse",
  x_content_parse_exception: "parse",
};

/**
 * Classify an error thrown by the Elasticsearch client.
 */
export function classifyError(error: unknown): TransportFault {
  if (error instanceof errors.ResponseError) {
    const parsed = faultBodySchema.safeParse(error.body);
    const body = parsed.success ? parsed.data : {};
    const type =
      typeof body.error === "string" ? body.error : body.error?.type;
    const reason =
      typeof body.error === "object" ? body.error.reason : undefined;
    const message = reason ?? type ?? error.message;
    if (type != null && Object.hasOwn(ERROR_TYPE_FAULTS, type)) {
      return { kind: ERROR_TYPE_FAULTS[type], message, cause: error };
    }
    if (error.statusCode === 404) {
      return { kind: "not_found", message: "No such document", cause: error };
    }
    return { kind: "response", message, cause: error };
  }
  if (error instanceof errors.RequestAbortedError) {
    return { kind: "aborted", message: error.message, cause: error };
  }
  if (
    error instanceof errors.ConnectionError ||
    error instanceof errors.NoLivingConnectionsError ||
    error instanceof errors.TimeoutError
  ) {
    return { kind: "connection", message: error.message, cause: error };
  }
  if (
    error instanceof errors.SerializationError ||
    error instanceof errors.DeserializationError
  ) {
    return { kind: "serialization", message: error.message, cause: error };
  }
  return {
    kind: "unknown",
    message: error instanceof Error ? error.message : String(error),
    cause: error,
  };
}

async function attempt<T>(
  operation: () => Promise<T>,
): Promise<TransportResult<T>> {
  try {
    return success(await operation());
  } catch (error) {
    const fault = classifyError(error);
    logger.debug("Elasticsearch request failed ({kind}): {message}", {
      kind: fault.kind,
      message: fault.message,
    });
    return { ok: false, fault };
  }
}

/**
 * Create the client shared by every request of the process.  Retries are
 * left to callers.
 */
export function createElasticsearchClient(config: ElasticsearchConfig): Client {
  logger.debug(
    "Connecting to {scheme}://{host}:{port} (index {index}, verify={verify})",
    {
      scheme: config.scheme,
      host: config.host,
      port: config.port,
      index: config.index,
      verify: config.verify,
    },
  );
  return new Client({
    node: `${config.scheme}://${config.host}:${config.port}`,
    auth:
      config.user == null
        ? undefined
        : { username: config.user, password: config.password ?? "" },
    tls:
      config.scheme === "https"
        ? { rejectUnauthorized: config.verify }
        : undefined,
    requestTimeout: config.timeout,
    maxRetries: 0,
  });
}

/**
 * Executes search and indexing requests against an Elasticsearch index.
 */
export class ElasticsearchTransport implements SearchTransport {
  readonly #client: Client;
  readonly indexName: string;

  constructor(client: Client, indexName: string) {
    this.#client = client;
    this.indexName = indexName;
  }

  search(
    request: SearchRequestDocument,
    options: RequestOptions = {},
  ): Promise<TransportResult<RawSearchResponse>> {
    return attempt(async () => {
      const response = await this.#client.search<unknown>(
        { index: this.indexName, track_total_hits: true, ...request },
        { signal: options.signal },
      );
      const total = response.hits.total;
      return {
        total: typeof total === "number" ? total : (total?.value ?? 0),
        hits: response.hits.hits.map((hit) => ({
          id: hit._id ?? "",
          score: hit._score ?? null,
          type:
            "_type" in hit && typeof hit._type === "string"
              ? hit._type
              : undefined,
          source: hit._source,
          highlight: hit.highlight,
        })),
      };
    });
  }

  get(id: string): Promise<TransportResult<unknown>> {
    return attempt(async () => {
      const response = await this.#client.get<unknown>({
        index: this.indexName,
        id,
      });
      return response._source;
    });
  }

  index(action: IndexAction): Promise<TransportResult<void>> {
    return attempt(async () => {
      await this.#client.index({
        index: this.indexName,
        id: action.id,
        document: action.source,
      });
    });
  }

  async bulk(
    actions: IndexAction[],
    chunkSize: number,
  ): Promise<TransportResult<void>> {
    for (const batch of chunk(actions, chunkSize)) {
      const result = await attempt(() =>
        this.#client.bulk({
          operations: batch.flatMap((action) => [
            { index: { _index: this.indexName, _id: action.id } },
            action.source,
          ]),
        }),
      );
      if (!result.ok) return result;
      if (result.value.errors) {
        const failed = result.value.items
          .flatMap((item) => Object.values(item))
          .find((item) => item?.error != null);
        return failure(
          "bulk",
          `Bulk indexing failed for ${failed?._id ?? "a document"}: ${
            failed?.error?.reason ?? failed?.error?.type ?? "unknown error"
          }`,
        );
      }
    }
    return success(undefined);
  }

  indexExists(): Promise<TransportResult<boolean>> {
    return attempt(() =>
      this.#client.indices.exists({ index: this.indexName }),
    );
  }

  createIndex(definition: IndexDefinition): Promise<TransportResult<void>> {
    return attempt(async () => {
      await this.#client.transport.request({
        method: "PUT",
        path: `/${encodeURIComponent(this.indexName)}`,
        body: definition,
      });
    });
  }

  async health(timeoutMs: number): Promise<TransportResult<void>> {
    const result = await attempt(() =>
      this.#client.cluster.health(
        { wait_for_status: "yellow", timeout: `${timeoutMs}ms` },
        { requestTimeout: timeoutMs },
      ),
    );
    if (!result.ok) return result;
    if (result.value.timed_out) {
      return failure(
        "connection",
        `Cluster status is ${result.value.status}`,
      );
    }
    return success(undefined);
  }
}
