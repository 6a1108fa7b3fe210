/**
 * Advanced search query compilation module.
 *
 * This module compiles fielded search queries, with their date range and
 * classification filters, into a single boolean query tree and renders it
 * into an Elasticsearch search request.
 *
 * @example
 * ```typescript
 * import {
 *   type AdvancedQuery,
 *   compileQuery,
 *   paginate,
 *   parseFieldedQuery,
 *   renderSearchRequest,
 * } from "./search";
 *
 * const query: AdvancedQuery = {
 *   type: "advanced",
 *   terms: parseFieldedQuery("title:muon OR title:gluon"),
 *   primaryClassification: [{ group: "cs" }],
 *   order: null,
 *   page: 1,
 *   pageSize: 25,
 * };
 * const bounds = paginate(query.page, query.pageSize);
 * const compiled = compileQuery(query);
 * const request = renderSearchRequest(compiled, bounds, query.order);
 * ```
 *
 * ## Operator precedence
 *
 * - `NOT` binds tightest: `a NOT b` keeps `a` and excludes `b`
 * - then `AND`, then `OR`
 * - operators of the same precedence associate to the left
 *
 * @module
 */

export { buildClause, buildExpression } from "./builder";
export { compileQuery } from "./compiler";
export {
  ALL_SEARCH_FIELDS,
  DEFAULT_SEARCH_FIELDS,
  FIELD_REPRESENTATIONS,
  type IndexedField,
  isSearchField,
  SEARCH_FIELDS,
  type SearchField,
} from "./fields";
export { buildClassificationFilter, buildDateRangeFilter } from "./filters";
export { groupTerms } from "./grouper";
export { MAX_RESULTS, paginate } from "./pagination";
export { parseFieldedQuery } from "./parser";
export {
  renderQuery,
  renderSearchRequest,
  type SearchRequestDocument,
} from "./render";
export {
  type RawHit,
  type RawSearchResponse,
  toDocumentSet,
} from "./results";
export type {
  AdvancedQuery,
  BooleanOperator,
  Classification,
  ClassificationList,
  CompiledQuery,
  DateBound,
  DateRange,
  FieldedSearchList,
  FieldedSearchTerm,
  GroupedExpression,
  PageBounds,
  Query,
  SimpleQuery,
  SortOrder,
} from "./types";
