import { readFile } from "node:fs/promises";
import { getLogger } from "@logtape/logtape";
import {
  type Document,
  type DocumentSet,
  documentSchema,
  getDocumentId,
} from "../entities/document";
import {
  DocumentNotFound,
  IndexConnectionError,
  IndexingError,
  MappingError,
  QueryError,
} from "../errors";
import { compileQuery } from "../search/compiler";
import { paginate } from "../search/pagination";
import { renderSearchRequest } from "../search/render";
import { toDocumentSet } from "../search/results";
import type { Query } from "../search/types";
import type {
  IndexAction,
  IndexDefinition,
  RequestOptions,
  SearchTransport,
  TransportFault,
  TransportResult,
} from "./transport";

const logger = getLogger(["papersearch", "backend", "session"]);

export const DEFAULT_DOCS_PER_CHUNK = 500;

export interface SearchSessionOptions {
  /** Path to the JSON index definition; required to create the index. */
  mapping?: string;
  /** How long the health probe waits for the cluster, in milliseconds. */
  healthTimeout?: number;
}

/**
 * A session with the search index.
 *
 * A session is constructed once per process and shared by every request;
 * it keeps no per-request state.
 */
export class SearchSession {
  readonly transport: SearchTransport;
  readonly mapping?: string;
  readonly healthTimeout: number;

  constructor(transport: SearchTransport, options: SearchSessionOptions = {}) {
    this.transport = transport;
    this.mapping = options.mapping;
    this.healthTimeout = options.healthTimeout ?? 1000;
  }

  /**
   * Perform a search.
   *
   * Pagination bounds are checked and the query is compiled before the
   * backend is contacted, so a malformed query never reaches it.
   *
   * @param query The query to execute.
   * @param options Use `signal` to cancel the request.
   * @returns The page of results and the total match count.
   * @throws {QueryError} When the query is malformed or rejected by the
   *         backend.
   * @throws {OutsideAllowedRange} When the page is too deep.
   * @throws {IndexConnectionError} When the backend cannot be reached.
   */
  async search(
    query: Query,
    options: RequestOptions = {},
  ): Promise<DocumentSet> {
    const bounds = paginate(query.page, query.pageSize);
    const compiled = compileQuery(query);
    const request = renderSearchRequest(compiled, bounds, query.order);
    logger.debug("Searching {index}: {request}", {
      index: this.transport.indexName,
      request,
    });
    const response = await this.unwrap(
      await this.transport.search(request, options),
    );
    return toDocumentSet(response, bounds);
  }

  /**
   * Retrieve a document by its identifier.
   *
   * @throws {DocumentNotFound} When no document has the identifier.
   */
  async getDocument(id: string): Promise<Document> {
    const source = await this.unwrap(await this.transport.get(id));
    if (source == null) {
      logger.error("No such document: {id}", { id });
      throw new DocumentNotFound(`No such document: ${id}`);
    }
    const parsed = documentSchema.safeParse(source);
    if (!parsed.success) {
      throw new MappingError(
        `Document ${id} does not match the document schema`,
        { cause: parsed.error },
      );
    }
    return parsed.data;
  }

  /**
   * Add a document to the index, creating the index first if needed.
   * An already indexed document with the same identifier is overwritten.
   */
  async addDocument(document: Document): Promise<void> {
    await this.ensureIndex();
    const action = toIndexAction(document);
    logger.debug("{id}: index document", { id: action.id });
    await this.unwrap(await this.transport.index(action));
  }

  /**
   * Add documents to the index in chunks through the bulk API.
   */
  async bulkAddDocuments(
    documents: Document[],
    docsPerChunk = DEFAULT_DOCS_PER_CHUNK,
  ): Promise<void> {
    if (!Number.isInteger(docsPerChunk) || docsPerChunk < 1) {
      throw new IndexingError(`Invalid chunk size: ${docsPerChunk}`);
    }
    await this.ensureIndex();
    await this.unwrap(
      await this.transport.bulk(documents.map(toIndexAction), docsPerChunk),
    );
    logger.debug("Added {count} documents to index", {
      count: documents.length,
    });
  }

  /**
   * Determine whether the cluster is available.  Never throws.
   */
  async clusterAvailable(): Promise<boolean> {
    const result = await this.transport.health(this.healthTimeout);
    if (!result.ok) {
      logger.debug("Health check failed: {message}", {
        message: result.fault.message,
      });
    }
    return result.ok;
  }

  /**
   * Create the index from the configured mapping.  An index that already
   * exists is left as is.
   *
   * @throws {IndexingError} When no mapping is configured or readable.
   * @throws {MappingError} When the backend rejects the mapping.
   */
  async createIndex(): Promise<void> {
    logger.debug("Creating index {index}", {
      index: this.transport.indexName,
    });
    const definition = await this.loadMapping();
    const result = await this.transport.createIndex(definition);
    if (!result.ok && result.fault.kind === "already_exists") {
      logger.debug("Index already exists; move along");
      return;
    }
    await this.unwrap(result);
  }

  private async ensureIndex(): Promise<void> {
    const exists = await this.unwrap(await this.transport.indexExists());
    if (!exists) {
      logger.debug("Index {index} does not exist", {
        index: this.transport.indexName,
      });
      await this.createIndex();
    }
  }

  private async loadMapping(): Promise<IndexDefinition> {
    if (this.mapping == null) throw new IndexingError("Mapping not set");
    let content: unknown;
    try {
      content = JSON.parse(await readFile(this.mapping, "utf-8"));
    } catch (error) {
      throw new IndexingError(`Could not read mapping ${this.mapping}`, {
        cause: error,
      });
    }
    if (typeof content !== "object" || content == null) {
      throw new MappingError(`Mapping ${this.mapping} is not an object`);
    }
    return Object.fromEntries(Object.entries(content));
  }

  /**
   * Return the value of a transport result, or raise its fault.
   */
  private async unwrap<T>(result: TransportResult<T>): Promise<T> {
    if (result.ok) return result.value;
    return await this.raise(result.fault);
  }

  private async raise(fault: TransportFault): Promise<never> {
    const options = { cause: fault.cause };
    switch (fault.kind) {
      case "not_found":
        throw new DocumentNotFound(fault.message, options);
      case "parse":
        throw new QueryError(fault.message, options);
      case "mapping":
        logger.error("Invalid document mapping: {message}", {
          message: fault.message,
        });
        throw new MappingError(`Invalid mapping: ${fault.message}`, options);
      case "serialization":
      case "bulk":
        logger.error("Problem indexing documents: {message}", {
          message: fault.message,
        });
        throw new IndexingError(
          `Problem indexing documents: ${fault.message}`,
          options,
        );
      case "index_not_found":
        logger.warn("Index {index} not found; creating it", {
          index: this.transport.indexName,
        });
        await this.createIndex();
        break;
      case "already_exists":
      case "connection":
      case "aborted":
      case "response":
        break;
      case "unknown":
        logger.error("Unhandled backend error: {message}", {
          message: fault.message,
          error: fault.cause,
        });
        throw fault.cause ?? new IndexConnectionError(fault.message);
    }
    logger.error("Problem communicating with the index: {message}", {
      message: fault.message,
    });
    throw new IndexConnectionError(
      `Problem communicating with the index: ${fault.message}`,
      options,
    );
  }
}

function toIndexAction(document: Document): IndexAction {
  return { id: getDocumentId(document), source: { ...document } };
}
