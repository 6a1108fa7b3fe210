/**
 * The boundary between the search session and the backend client.
 *
 * Transports never throw for backend faults; they report them as values so
 * the session decides how each fault surfaces.
 */

import type { SearchRequestDocument } from "../search/render";
import type { RawSearchResponse } from "../search/results";

export type FaultKind =
  | "connection"
  | "aborted"
  | "not_found"
  | "index_not_found"
  | "already_exists"
  | "parse"
  | "mapping"
  | "serialization"
  | "bulk"
  | "response"
  | "unknown";

export interface TransportFault {
  kind: FaultKind;
  message: string;
  cause?: unknown;
}

export type TransportResult<T> =
  | { ok: true; value: T }
  | { ok: false; fault: TransportFault };

export interface RequestOptions {
  signal?: AbortSignal;
}

/**
 * A document to index under the given identifier.
 */
export interface IndexAction {
  id: string;
  source: Record<string, unknown>;
}

/**
 * An opaque index definition (settings and mappings).
 */
export type IndexDefinition = Record<string, unknown>;

export interface SearchTransport {
  /** The name of the index all operations target. */
  readonly indexName: string;
  search(
    request: SearchRequestDocument,
    options?: RequestOptions,
  ): Promise<TransportResult<RawSearchResponse>>;
  /** Fetches a document's stored source. */
  get(id: string): Promise<TransportResult<unknown>>;
  index(action: IndexAction): Promise<TransportResult<void>>;
  bulk(
    actions: IndexAction[],
    chunkSize: number,
  ): Promise<TransportResult<void>>;
  indexExists(): Promise<TransportResult<boolean>>;
  createIndex(definition: IndexDefinition): Promise<TransportResult<void>>;
  /** Succeeds once the cluster reports at least a yellow status. */
  health(timeoutMs: number): Promise<TransportResult<void>>;
}

export function success<T>(value: T): TransportResult<T> {
  return { ok: true, value };
}

export function failure<T>(
  kind: FaultKind,
  message: string,
  cause?: unknown,
): TransportResult<T> {
  return { ok: false, fault: { kind, message, cause } };
}
