import { Client, errors, type estypes } from '@elastic/elasticsearch';
import type { SearchConfig } from '../config/search.js';
import type { StructuredQuery } from '../query/types.js';
import type { SchemaRegistry } from '../schema/SchemaRegistry.js';
import { debugLog, getLoggerConfig, logger } from '../utils/logger.js';
import { executeWithRetry } from '../utils/RetryStrategy.js';
import {
  SearchIndexError,
  type SearchHit,
  type SearchIndexClient,
  type SearchResponse,
} from './SearchIndexClient.js';
import { toElasticsearchRequest } from './toElasticsearchRequest.js';

const RETRYABLE_STATUS_CODES = [429, 502, 503, 504];

/** Connection failures, timeouts and overload responses; anything else is final */
export function isTransientSearchError(error: unknown): boolean {
  if (error instanceof errors.ConnectionError || error instanceof errors.TimeoutError) {
    return true;
  }
  if (error instanceof errors.ResponseError) {
    return RETRYABLE_STATUS_CODES.includes(error.statusCode ?? 0);
  }
  return false;
}

export interface ElasticsearchIndexClientOptions {
  index: string;
  defaultSize: number;
  maxRetries: number;
  /** Base delay before the first retry */
  retryDelayMs?: number;
}

/** Build an Elasticsearch client from the search settings. Retries are left to the index client. */
export function createElasticsearchClient(config: SearchConfig): Client {
  return new Client({
    node: config.url,
    ...(config.password ? { auth: { username: config.username, password: config.password } } : {}),
    tls: { rejectUnauthorized: config.verifyCerts },
    maxRetries: 0,
  });
}

/**
 * ElasticsearchIndexClient
 * Runs structured queries against the stock index, retrying transient
 * failures with exponential backoff.
 */
export class ElasticsearchIndexClient implements SearchIndexClient {
  private readonly client: Client;
  private readonly registry: SchemaRegistry;
  private readonly options: ElasticsearchIndexClientOptions;

  constructor(client: Client, registry: SchemaRegistry, options: ElasticsearchIndexClientOptions) {
    this.client = client;
    this.registry = registry;
    this.options = options;
  }

  static fromConfig(config: SearchConfig, registry: SchemaRegistry): ElasticsearchIndexClient {
    return new ElasticsearchIndexClient(createElasticsearchClient(config), registry, {
      index: config.index,
      defaultSize: config.resultSize,
      maxRetries: config.maxRetries,
    });
  }

  async execute(query: StructuredQuery): Promise<SearchHit[]> {
    const response = await this.search(query);
    return response.hits;
  }

  /**
   * Run a query and return hits together with the total count and any
   * aggregation results.
   * @throws SearchIndexError when the index fails after retries or rejects the request
   */
  async search(query: StructuredQuery): Promise<SearchResponse> {
    const request = toElasticsearchRequest(query, this.registry, {
      index: this.options.index,
      defaultSize: this.options.defaultSize,
    });

    debugLog('search', 'Sending search request', { request });

    const startTime = Date.now();
    let body: estypes.SearchResponse<Record<string, unknown>>;
    try {
      body = await executeWithRetry(() => this.client.search<Record<string, unknown>>(request), {
        maxRetries: this.options.maxRetries,
        initialDelayMs: this.options.retryDelayMs ?? 200,
        isRetryable: isTransientSearchError,
        operation: 'elasticsearch.search',
      });
    } catch (error) {
      throw toSearchIndexError(error, `search on "${this.options.index}" failed`);
    }
    const durationMs = Date.now() - startTime;

    const config = getLoggerConfig();
    if (durationMs >= config.slowSearchThresholdMs) {
      logger.warn('Slow search', { index: this.options.index, durationMs, tookMs: body.took });
    }

    const hits = body.hits.hits.map(
      (hit): SearchHit => ({
        ...(hit._id !== undefined ? { id: hit._id } : {}),
        score: hit._score ?? 0,
        fields: hit._source ?? {},
      })
    );

    const total = body.hits.total;
    const response: SearchResponse = {
      total: typeof total === 'number' ? total : total?.value ?? hits.length,
      hits,
    };
    if (body.aggregations) {
      response.aggregations = { ...body.aggregations };
    }

    debugLog('search', 'Search completed', { total: response.total, returned: hits.length, durationMs });

    return response;
  }

  /**
   * @throws SearchIndexError when the cluster cannot be reached
   */
  async ping(): Promise<boolean> {
    try {
      return await this.client.ping();
    } catch (error) {
      throw toSearchIndexError(error, 'ping failed');
    }
  }
}

function toSearchIndexError(error: unknown, context: string): SearchIndexError {
  const reason = error instanceof Error ? error.message : String(error);
  const statusCode = error instanceof errors.ResponseError ? error.statusCode : undefined;
  return new SearchIndexError(`Elasticsearch ${context}: ${reason}`, statusCode, error);
}
