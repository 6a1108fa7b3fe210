/**
 * Facet filter builder.
 *
 * Date ranges and classifications are compiled independently of the term
 * tree and later combined with it conjunctively.
 */

import { Temporal } from "@js-temporal/polyfill";
import {
  CLASSIFICATION_FIELDS,
  CLASSIFICATION_PATH,
  SUBMITTED_DATE_FIELD,
} from "./fields";
import type {
  Classification,
  ClassificationList,
  CompiledQuery,
  DateBound,
  DateRange,
  MatchQuery,
  RangeQuery,
} from "./types";

/**
 * Render a date bound as an ISO 8601 timestamp without fractional seconds.
 * Zoned values keep their UTC offset, e.g. `1996-02-05T00:00:00-05:00`;
 * plain values have none, e.g. `2006-02-05T00:00:00`.
 */
export function formatDateBound(bound: DateBound): string {
  if (bound instanceof Temporal.ZonedDateTime) {
    return bound.toString({
      timeZoneName: "never",
      smallestUnit: "second",
    });
  }
  return bound.toString({ smallestUnit: "second" });
}

/**
 * Build a range filter on the submission date.
 *
 * @returns The range, or `null` when neither bound is present.
 */
export function buildDateRangeFilter(
  range: DateRange | undefined,
): RangeQuery | null {
  if (range == null) return null;
  if (range.startDate == null && range.endDate == null) return null;
  const query: RangeQuery = { type: "range", field: SUBMITTED_DATE_FIELD };
  if (range.startDate != null) query.gte = formatDateBound(range.startDate);
  if (range.endDate != null) query.lt = formatDateBound(range.endDate);
  return query;
}

/**
 * Build the filter for a single classification, requiring every present
 * level to match.  A lone level stays a plain match.
 */
function buildClassification(classification: Classification): CompiledQuery {
  const matches: MatchQuery[] = [
    {
      type: "match",
      field: CLASSIFICATION_FIELDS.group,
      value: classification.group,
    },
  ];
  if (classification.archive != null) {
    matches.push({
      type: "match",
      field: CLASSIFICATION_FIELDS.archive,
      value: classification.archive,
    });
  }
  if (classification.category != null) {
    matches.push({
      type: "match",
      field: CLASSIFICATION_FIELDS.category,
      value: classification.category,
    });
  }
  if (matches.length === 1) return matches[0];
  return { type: "and", children: matches };
}

/**
 * Build a nested filter matching any of the given classifications.
 *
 * @returns The nested filter, or `null` for an empty list.
 *
 * @example
 * ```typescript
 * buildClassificationFilter([{ group: "cs" }]);
 * // => { type: "nested", path: "primary_classification",
 * //      query: { type: "match", field: "primary_classification.group.id",
 * //               value: "cs" } }
 * ```
 */
export function buildClassificationFilter(
  classifications: ClassificationList,
): CompiledQuery | null {
  if (classifications.length === 0) return null;
  const queries = classifications.map(buildClassification);
  const query: CompiledQuery =
    queries.length === 1 ? queries[0] : { type: "or", children: queries };
  return { type: "nested", path: CLASSIFICATION_PATH, query };
}
