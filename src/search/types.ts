/**
 * Advanced search type definitions.
 *
 * This module defines the fielded search terms a query is made of, the
 * grouped expression tree produced by precedence grouping, and the
 * backend-agnostic compiled query tree that is later rendered into the
 * search backend's query DSL.
 */

import type { Temporal } from "@js-temporal/polyfill";
import type { SearchField } from "./fields";

/**
 * Logical operator joining a term to everything on its left.
 * Precedence is `NOT` > `AND` > `OR`.
 */
export type BooleanOperator = "AND" | "OR" | "NOT";

/**
 * A single fielded search clause.
 *
 * The `operator` is `null` only for the first term of a list, since it has
 * no left operand to join.
 */
export interface FieldedSearchTerm {
  readonly type: "term";
  readonly operator: BooleanOperator | null;
  readonly field: SearchField;
  readonly term: string;
}

/**
 * Ordered list of fielded search terms.  Order defines the left-to-right
 * application of operators during grouping.
 */
export type FieldedSearchList = readonly FieldedSearchTerm[];

/**
 * A bound of a date range.  Plain date-times are index-local wall-clock
 * times; zoned date-times carry their fixed offset into the query.
 */
export type DateBound = Temporal.PlainDateTime | Temporal.ZonedDateTime;

/**
 * Filter on the submission date.  A missing bound is open-ended.
 */
export interface DateRange {
  readonly startDate?: DateBound;
  readonly endDate?: DateBound;
}

/**
 * Hierarchical classification facet.  Absent levels broaden the match.
 */
export interface Classification {
  readonly group: string;
  readonly archive?: string;
  readonly category?: string;
}

export type ClassificationList = readonly Classification[];

/**
 * Sort order: `null` sorts by relevance, a leading `-` sorts descending.
 */
export type SortOrder = "submitted_date" | "-submitted_date" | null;

interface BaseQuery {
  readonly order: SortOrder;
  /** 1-indexed page number. */
  readonly page: number;
  readonly pageSize: number;
}

/**
 * A single free-text query against one field, or against the default field
 * set when `field` is `"all"`.
 */
export interface SimpleQuery extends BaseQuery {
  readonly type: "simple";
  readonly field: SearchField;
  readonly term: string;
}

/**
 * A list of fielded terms plus facet filters.
 */
export interface AdvancedQuery extends BaseQuery {
  readonly type: "advanced";
  readonly terms: FieldedSearchList;
  readonly dateRange?: DateRange;
  readonly primaryClassification: ClassificationList;
}

export type Query = SimpleQuery | AdvancedQuery;

/**
 * An internal node of the grouped expression tree.
 */
export interface GroupedNode {
  readonly type: "group";
  readonly left: GroupedExpression;
  readonly operator: BooleanOperator;
  readonly right: GroupedExpression;
}

/**
 * Sentinel produced when grouping an empty term list.
 */
export interface MatchAll {
  readonly type: "match_all";
}

export type GroupedExpression = FieldedSearchTerm | GroupedNode | MatchAll;

/**
 * Matches the analyzed text of a single indexed field.
 */
export interface MatchQuery {
  type: "match";
  field: string;
  value: string;
}

/**
 * Range over a date field; `gte` is inclusive and `lt` exclusive.
 */
export interface RangeQuery {
  type: "range";
  field: string;
  gte?: string;
  lt?: string;
}

/**
 * Evaluates `query` within the scope of the nested objects at `path`.
 */
export interface NestedQuery {
  type: "nested";
  path: string;
  query: CompiledQuery;
}

/**
 * All children must match.
 */
export interface AndQuery {
  type: "and";
  children: CompiledQuery[];
}

/**
 * At least one child must match.
 */
export interface OrQuery {
  type: "or";
  children: CompiledQuery[];
}

/**
 * `include` must match and `exclude` must not.
 */
export interface NotQuery {
  type: "not";
  include: CompiledQuery;
  exclude: CompiledQuery;
}

export type CompiledQuery =
  | MatchQuery
  | RangeQuery
  | NestedQuery
  | AndQuery
  | OrQuery
  | NotQuery;

/**
 * Offsets of the requested page within the full result list.
 */
export interface PageBounds {
  pageStart: number;
  pageEnd: number;
  pageSize: number;
  maxPages: number;
}
