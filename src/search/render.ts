/**
 * Renders compiled queries into the Elasticsearch query DSL.
 */

import type { estypes } from "@elastic/elasticsearch";
import { SUBMITTED_DATE_FIELD } from "./fields";
import type { CompiledQuery, PageBounds, SortOrder } from "./types";

/**
 * The body of a search request, as sent to the backend.
 */
export interface SearchRequestDocument {
  query: estypes.QueryDslQueryContainer;
  from: number;
  size: number;
  sort?: estypes.SortCombinations[];
  highlight?: estypes.SearchHighlight;
}

/**
 * Render a compiled query as a query DSL container.
 *
 * @param query The compiled query, or `null` to match every document.
 */
export function renderQuery(
  query: CompiledQuery | null,
): estypes.QueryDslQueryContainer {
  if (query == null) return { match_all: {} };
  switch (query.type) {
    case "match":
      return { match: { [query.field]: query.value } };
    case "range": {
      const range: { gte?: string; lt?: string } = {};
      if (query.gte != null) range.gte = query.gte;
      if (query.lt != null) range.lt = query.lt;
      return { range: { [query.field]: range } };
    }
    case "nested":
      return {
        nested: { path: query.path, query: renderQuery(query.query) },
      };
    case "and":
      return { bool: { must: query.children.map(renderQuery) } };
    case "or":
      return {
        bool: {
          should: query.children.map(renderQuery),
          minimum_should_match: 1,
        },
      };
    case "not":
      return {
        bool: {
          must: [renderQuery(query.include)],
          must_not: [renderQuery(query.exclude)],
        },
      };
  }
}

/**
 * Lists the fields targeted by text matches, in first-seen order.
 * Matches inside nested scopes are facet filters and are skipped.
 */
export function collectMatchFields(query: CompiledQuery | null): string[] {
  const fields: string[] = [];
  const visit = (node: CompiledQuery): void => {
    switch (node.type) {
      case "match":
        if (!fields.includes(node.field)) fields.push(node.field);
        return;
      case "range":
      case "nested":
        return;
      case "and":
      case "or":
        node.children.forEach(visit);
        return;
      case "not":
        visit(node.include);
        visit(node.exclude);
        return;
    }
  };
  if (query != null) visit(query);
  return fields;
}

function renderSort(order: SortOrder): estypes.SortCombinations[] | undefined {
  switch (order) {
    case null:
      return undefined;
    case "submitted_date":
      return [{ [SUBMITTED_DATE_FIELD]: { order: "asc" } }];
    case "-submitted_date":
      return [{ [SUBMITTED_DATE_FIELD]: { order: "desc" } }];
  }
}

/**
 * Render the complete search request for one page of results.
 *
 * The highlight section lists exactly the fields the query matches on.
 */
export function renderSearchRequest(
  query: CompiledQuery | null,
  bounds: PageBounds,
  order: SortOrder,
): SearchRequestDocument {
  const request: SearchRequestDocument = {
    query: renderQuery(query),
    from: bounds.pageStart,
    size: bounds.pageEnd - bounds.pageStart,
  };
  const sort = renderSort(order);
  if (sort != null) request.sort = sort;
  const fields = collectMatchFields(query);
  if (fields.length > 0) {
    request.highlight = {
      fields: Object.fromEntries(fields.map((field) => [field, {}])),
    };
  }
  return request;
}
