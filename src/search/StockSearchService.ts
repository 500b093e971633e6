import type { QueryCompiler } from '../compiler/QueryCompiler.js';
import type { StructuredQuery } from '../query/types.js';
import { logger } from '../utils/logger.js';
import type { SearchHit, SearchIndexClient, SearchResponse } from './SearchIndexClient.js';

export type StockSearchOutcome =
  | { kind: 'answer'; text: string }
  | {
      kind: 'results';
      text: string;
      query: StructuredQuery;
      hits: SearchHit[];
      total: number;
      aggregations?: Record<string, unknown>;
    };

/**
 * StockSearchService
 * Text in, explanation and ranked stocks out: compiles the text and, when the
 * result is a search, runs it against the index.
 */
export class StockSearchService {
  private readonly compiler: QueryCompiler;
  private readonly index: SearchIndexClient;

  constructor(compiler: QueryCompiler, index: SearchIndexClient) {
    this.compiler = compiler;
    this.index = index;
  }

  /**
   * @throws SearchIndexError if the index cannot run the query
   */
  async search(text: string): Promise<StockSearchOutcome> {
    return logger.span<StockSearchOutcome>('stock_search.search', { inputChars: text.length }, async () => {
      const result = await this.compiler.transform(text);
      if (result.kind === 'answer') {
        return { kind: 'answer', text: result.text };
      }

      const response = await this.runQuery(result.query);
      return {
        kind: 'results',
        text: result.text,
        query: result.query,
        hits: response.hits,
        total: response.total,
        ...(response.aggregations !== undefined ? { aggregations: response.aggregations } : {}),
      };
    });
  }

  // Clients without search() report only the returned page
  private async runQuery(query: StructuredQuery): Promise<SearchResponse> {
    if (this.index.search) {
      return this.index.search(query);
    }
    const hits = await this.index.execute(query);
    return { total: hits.length, hits };
  }
}
