import {
  failure,
  type IndexAction,
  type IndexDefinition,
  type RequestOptions,
  type SearchTransport,
  success,
  type TransportResult,
} from "../../src/backend/transport";
import type { SearchRequestDocument } from "../../src/search/render";
import type { RawSearchResponse } from "../../src/search/results";

/**
 * An in-memory transport that records every call and answers with canned
 * results.
 */
export class FakeTransport implements SearchTransport {
  readonly indexName = "test-papers";

  /** Names of the methods called, in order. */
  readonly calls: string[] = [];
  readonly searches: SearchRequestDocument[] = [];
  readonly signals: (AbortSignal | undefined)[] = [];
  readonly indexed: IndexAction[] = [];
  readonly batches: { actions: IndexAction[]; chunkSize: number }[] = [];
  readonly definitions: IndexDefinition[] = [];

  searchResult: TransportResult<RawSearchResponse> = success({
    total: 0,
    hits: [],
  });
  getResult: TransportResult<unknown> = failure(
    "not_found",
    "No such document",
  );
  indexResult: TransportResult<void> = success(undefined);
  bulkResult: TransportResult<void> = success(undefined);
  existsResult: TransportResult<boolean> = success(true);
  createIndexResult: TransportResult<void> = success(undefined);
  healthResult: TransportResult<void> = success(undefined);

  async search(
    request: SearchRequestDocument,
    options: RequestOptions = {},
  ): Promise<TransportResult<RawSearchResponse>> {
    this.calls.push("search");
    this.searches.push(request);
    this.signals.push(options.signal);
    return this.searchResult;
  }

  async get(_id: string): Promise<TransportResult<unknown>> {
    this.calls.push("get");
    return this.getResult;
  }

  async index(action: IndexAction): Promise<TransportResult<void>> {
    this.calls.push("index");
    this.indexed.push(action);
    return this.indexResult;
  }

  async bulk(
    actions: IndexAction[],
    chunkSize: number,
  ): Promise<TransportResult<void>> {
    this.calls.push("bulk");
    this.batches.push({ actions, chunkSize });
    return this.bulkResult;
  }

  async indexExists(): Promise<TransportResult<boolean>> {
    this.calls.push("indexExists");
    return this.existsResult;
  }

  async createIndex(
    definition: IndexDefinition,
  ): Promise<TransportResult<void>> {
    this.calls.push("createIndex");
    this.definitions.push(definition);
    return this.createIndexResult;
  }

  async health(_timeoutMs: number): Promise<TransportResult<void>> {
    this.calls.push("health");
    return this.healthResult;
  }
}
