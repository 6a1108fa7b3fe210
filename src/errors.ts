/**
 * Error taxonomy of the search layer.
 *
 * `QueryError` and `OutsideAllowedRange` are correctable by the user,
 * `IndexConnectionError` is transient, and `IndexingError` and
 * `MappingError` need an operator.  `DocumentNotFound` is an expected miss.
 */
export class SearchError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Malformed or empty query input.
 */
export class QueryError extends SearchError {}

/**
 * The requested page lies beyond the deepest page the backend may serve.
 */
export class OutsideAllowedRange extends SearchError {}

/**
 * The backend is unreachable or the transport failed.
 */
export class IndexConnectionError extends SearchError {}

/**
 * A document could not be serialized or bulk-indexed.
 */
export class IndexingError extends SearchError {}

/**
 * The index schema is invalid or does not match the documents.
 */
export class MappingError extends SearchError {}

export class DocumentNotFound extends SearchError {}
