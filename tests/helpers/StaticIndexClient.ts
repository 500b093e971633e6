import type { StructuredQuery } from '../../src/query/types.js';
import type { SearchHit, SearchIndexClient, SearchResponse } from '../../src/search/SearchIndexClient.js';

/**
 * StaticIndexClient
 * Test double for SearchIndexClient: returns the same hits (and, through
 * search(), the same total and aggregations) for every query and records the
 * queries it was given.
 */
export class StaticIndexClient implements SearchIndexClient {
  readonly queries: StructuredQuery[] = [];
  private hits: SearchHit[];
  private total?: number;
  private aggregations?: Record<string, unknown>;

  constructor(hits: SearchHit[] = []) {
    this.hits = hits;
  }

  setHits(hits: SearchHit[]): void {
    this.hits = hits;
  }

  /** Total defaults to the number of hits */
  setTotal(total: number): void {
    this.total = total;
  }

  setAggregations(aggregations: Record<string, unknown>): void {
    this.aggregations = aggregations;
  }

  async execute(query: StructuredQuery): Promise<SearchHit[]> {
    this.queries.push(query);
    return this.hits.map((hit) => ({ ...hit, fields: { ...hit.fields } }));
  }

  async search(query: StructuredQuery): Promise<SearchResponse> {
    const hits = await this.execute(query);
    return {
      total: this.total ?? hits.length,
      hits,
      ...(this.aggregations !== undefined ? { aggregations: this.aggregations } : {}),
    };
  }
}
