import { OutsideAllowedRange, QueryError } from "../errors";
import type { PageBounds } from "./types";

/**
 * The deepest result offset the backend is asked to serve.
 */
export const MAX_RESULTS = 10_000;

/**
 * Translate a page number and size into result offsets.
 *
 * @param page The 1-indexed page number.
 * @param pageSize The number of results per page.
 * @throws {QueryError} When either value is not a positive integer.
 * @throws {OutsideAllowedRange} When the page lies beyond
 *         `floor(MAX_RESULTS / pageSize)`.
 */
export function paginate(page: number, pageSize: number): PageBounds {
  if (!Number.isInteger(page) || page < 1) {
    throw new QueryError(`Invalid page: ${page}`);
  }
  if (!Number.isInteger(pageSize) || pageSize < 1) {
    throw new QueryError(`Invalid page size: ${pageSize}`);
  }
  const maxPages = Math.floor(MAX_RESULTS / pageSize);
  if (page > maxPages) {
    throw new OutsideAllowedRange(
      `Requested page ${page}, but max is ${maxPages}`,
    );
  }
  const pageStart = (page - 1) * pageSize;
  return { pageStart, pageEnd: pageStart + pageSize, pageSize, maxPages };
}
