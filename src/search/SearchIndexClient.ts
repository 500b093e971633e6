import type { StructuredQuery } from '../query/types.js';

export interface SearchHit {
  id?: string;
  score: number;
  fields: Record<string, unknown>;
}

export interface SearchResponse {
  /** Number of matching documents, not only the returned page */
  total: number;
  hits: SearchHit[];
  aggregations?: Record<string, unknown>;
}

/**
 * Runs a validated StructuredQuery against the stock index. Hits come back
 * best first.
 */
export interface SearchIndexClient {
  execute(query: StructuredQuery): Promise<SearchHit[]>;
  /** Hits together with the total count and aggregation results */
  search?(query: StructuredQuery): Promise<SearchResponse>;
}

/**
 * The index could not answer. `statusCode` is the HTTP status when the index
 * responded at all.
 */
export class SearchIndexError extends Error {
  public readonly statusCode?: number;
  public readonly cause?: unknown;

  constructor(message: string, statusCode?: number, cause?: unknown) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = 'SearchIndexError';
    this.statusCode = statusCode;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SearchIndexError);
    }
  }
}
