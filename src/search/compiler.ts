import { buildClause, buildExpression } from "./builder";
import { buildClassificationFilter, buildDateRangeFilter } from "./filters";
import { groupTerms } from "./grouper";
import type { AdvancedQuery, CompiledQuery, Query, SimpleQuery } from "./types";

/**
 * Compile a query into a single boolean expression tree.
 *
 * @param query The query to compile.
 * @returns The compiled tree, or `null` when the query has no term tree and
 *          no filters, i.e. matches everything.
 * @throws {QueryError} When the query is malformed.
 */
export function compileQuery(query: Query): CompiledQuery | null {
  switch (query.type) {
    case "simple":
      return compileSimpleQuery(query);
    case "advanced":
      return compileAdvancedQuery(query);
  }
}

function compileSimpleQuery(query: SimpleQuery): CompiledQuery {
  return buildClause({
    type: "term",
    operator: null,
    field: query.field,
    term: query.term,
  });
}

function compileAdvancedQuery(query: AdvancedQuery): CompiledQuery | null {
  return combine([
    buildExpression(groupTerms(query.terms)),
    buildDateRangeFilter(query.dateRange),
    buildClassificationFilter(query.primaryClassification),
  ]);
}

/**
 * Combine the present parts conjunctively.  Absent parts are left out
 * rather than stubbed with an always-true clause.
 */
function combine(parts: (CompiledQuery | null)[]): CompiledQuery | null {
  const present = parts.filter((part): part is CompiledQuery => part != null);
  if (present.length === 0) return null;
  if (present.length === 1) return present[0];
  return { type: "and", children: present };
}
