/**
 * Search expression builder.
 *
 * Converts fielded terms and grouped expression trees into the
 * backend-agnostic {@link CompiledQuery} tree.
 */

import { QueryError } from "../errors";
import { getRepresentations } from "./fields";
import type {
  CompiledQuery,
  FieldedSearchTerm,
  GroupedExpression,
  GroupedNode,
  MatchQuery,
} from "./types";

/**
 * Build the match expression for a single fielded term.
 *
 * Fields indexed under several representations compile to a disjunction
 * with one match per representation, all using the same text.
 *
 * @throws {QueryError} When the term text is empty, since an empty clause
 *         would match everything.
 */
export function buildClause(term: FieldedSearchTerm): CompiledQuery {
  const value = term.term.trim();
  if (value.length === 0) {
    throw new QueryError(`Empty search term for field ${term.field}`);
  }
  const matches = getRepresentations(term.field).map(
    (field): MatchQuery => ({ type: "match", field, value }),
  );
  if (matches.length === 1) return matches[0];
  return { type: "or", children: matches };
}

/**
 * Build a compiled query from a grouped expression tree.
 *
 * The result mirrors the tree exactly: no operand is re-associated or
 * flattened into its parent.
 *
 * @param node The grouped expression tree.
 * @returns The compiled query, or `null` for the match-all sentinel.
 * @throws {QueryError} When a group node lacks an operand or carries an
 *         unknown operator.
 */
export function buildExpression(
  node: GroupedExpression,
): CompiledQuery | null {
  switch (node.type) {
    case "match_all":
      return null;
    case "term":
      return buildClause(node);
    case "group":
      return buildGroup(node);
  }
}

function buildGroup(node: GroupedNode): CompiledQuery {
  // Trees may be built from untyped input, so check the shape at runtime:
  if (node.left == null || node.right == null) {
    throw new QueryError(`${node.operator} requires two operands`);
  }
  const left = buildOperand(node.left);
  const right = buildOperand(node.right);
  switch (node.operator) {
    case "AND":
      return { type: "and", children: [left, right] };
    case "OR":
      return { type: "or", children: [left, right] };
    case "NOT":
      return { type: "not", include: left, exclude: right };
    default:
      throw new QueryError(`Unknown operator: ${String(node.operator)}`);
  }
}

function buildOperand(node: GroupedExpression): CompiledQuery {
  const compiled = buildExpression(node);
  if (compiled == null) {
    throw new QueryError("Match-all cannot be an operand");
  }
  return compiled;
}
