/**
 * Precedence grouping of fielded search terms.
 *
 * Resolves an ordered, operator-joined term list into a binary expression
 * tree.  `NOT` binds tightest, then `AND`, then `OR`; every level folds
 * left-associatively, so `a OR b OR c` groups as `(a OR b) OR c`.
 */

import { QueryError } from "../errors";
import type {
  BooleanOperator,
  FieldedSearchList,
  GroupedExpression,
} from "./types";

const PRECEDENCE: readonly BooleanOperator[] = ["NOT", "AND", "OR"];

/**
 * Group a term list by operator precedence.
 *
 * @param terms The ordered term list.  The first term's operator is ignored.
 * @returns A single tree covering every term, the term itself when there is
 *          only one, or a match-all sentinel for an empty list.
 * @throws {QueryError} When a term other than the first has no operator.
 *
 * @example
 * ```typescript
 * // [muon, OR gluon, NOT foo, AND boson]
 * groupTerms(terms);
 * // => (muon OR ((gluon NOT foo) AND boson))
 * ```
 */
export function groupTerms(terms: FieldedSearchList): GroupedExpression {
  if (terms.length === 0) return { type: "match_all" };

  let operands: GroupedExpression[] = [terms[0]];
  let operators: BooleanOperator[] = [];
  for (let i = 1; i < terms.length; i++) {
    const term = terms[i];
    if (term.operator == null) {
      throw new QueryError(
        `Term ${i + 1} (${term.field}:${term.term}) has no operator`,
      );
    }
    operators.push(term.operator);
    operands.push(term);
  }

  for (const level of PRECEDENCE) {
    const nextOperands: GroupedExpression[] = [operands[0]];
    const nextOperators: BooleanOperator[] = [];
    for (let i = 0; i < operators.length; i++) {
      const operator = operators[i];
      const right = operands[i + 1];
      if (operator === level) {
        // Collapse into the element on the left before moving on:
        const left = nextOperands[nextOperands.length - 1];
        nextOperands[nextOperands.length - 1] = {
          type: "group",
          left,
          operator,
          right,
        };
      } else {
        nextOperators.push(operator);
        nextOperands.push(right);
      }
    }
    operands = nextOperands;
    operators = nextOperators;
  }

  return operands[0];
}

/**
 * Lists the leaves of a grouped tree from left to right.
 */
export function collectLeaves(node: GroupedExpression): GroupedExpression[] {
  switch (node.type) {
    case "term":
    case "match_all":
      return [node];
    case "group":
      return [...collectLeaves(node.left), ...collectLeaves(node.right)];
  }
}
