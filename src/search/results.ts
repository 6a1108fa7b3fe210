import {
  type DocumentSet,
  documentSchema,
  type SearchResult,
} from "../entities/document";
import { MappingError } from "../errors";
import type { PageBounds } from "./types";

/**
 * A single hit as reported by the backend.
 */
export interface RawHit {
  id: string;
  /** `null` when the backend did not score the hit, e.g. on sorted pages. */
  score: number | null;
  /** Backend type tag; absent on backends without mapping types. */
  type?: string;
  source: unknown;
  highlight?: Record<string, string[]>;
}

export interface RawSearchResponse {
  /** Total number of matches, not the number of hits returned. */
  total: number;
  hits: RawHit[];
}

export const DEFAULT_TYPE_TAG = "_doc";

/**
 * Transform a raw hit into a search result.
 *
 * @throws {MappingError} When the stored source is not a valid document.
 */
export function toSearchResult(hit: RawHit): SearchResult {
  const parsed = documentSchema.safeParse(hit.source);
  if (!parsed.success) {
    const message = `Document ${hit.id} does not match the document schema`;
    throw new MappingError(`${message}: ${parsed.error.message}`, {
      cause: parsed.error,
    });
  }
  const result: SearchResult = {
    ...parsed.data,
    score: hit.score ?? 0,
    type: hit.type ?? DEFAULT_TYPE_TAG,
  };
  if (hit.highlight != null) result.highlight = hit.highlight;
  return result;
}

/**
 * Transform a raw search response into a document set, preserving the
 * backend's rank order.  A response without hits is an empty set.
 */
export function toDocumentSet(
  response: RawSearchResponse,
  bounds: PageBounds,
): DocumentSet {
  return {
    count: response.total,
    results: response.hits.map(toSearchResult),
    metadata: {
      pageStart: bounds.pageStart,
      pageEnd: bounds.pageEnd,
      pageSize: bounds.pageSize,
      maxPages: bounds.maxPages,
    },
  };
}
