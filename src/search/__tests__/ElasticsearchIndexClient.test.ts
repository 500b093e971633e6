import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import { Client, errors } from '@elastic/elasticsearch';
import Mock from '@elastic/elasticsearch-mock';
import { resolve } from 'path';
import { defaultDebugConfig } from '../../config/debug.js';
import { SchemaRegistry } from '../../schema/SchemaRegistry.js';
import { configureLogger } from '../../utils/logger.js';
import { ElasticsearchIndexClient, isTransientSearchError } from '../ElasticsearchIndexClient.js';
import { SearchIndexError } from '../SearchIndexClient.js';

const registry = SchemaRegistry.load(resolve(process.cwd(), 'schema/stock-attributes.json'));

const searchBody = {
  took: 4,
  timed_out: false,
  _shards: { total: 1, successful: 1, skipped: 0, failed: 0 },
  hits: {
    total: { value: 42, relation: 'eq' },
    max_score: 3.2,
    hits: [
      { _index: 'stocks', _id: 'NDA-FI', _score: 3.2, _source: { name: 'Nordea Bank', equity_industry: 'Banks' } },
      { _index: 'stocks', _id: 'KBC', _score: null },
    ],
  },
  aggregations: { by_sector: { buckets: [{ key: 'FINANCIAL_SERVICES', doc_count: 42 }] } },
};

describe('ElasticsearchIndexClient', () => {
  let mock: Mock;
  let client: Client;
  let consoleErrorSpy: jest.SpiedFunction<typeof console.error>;

  beforeEach(() => {
    configureLogger({ ...defaultDebugConfig(), slowSearchThresholdMs: 60_000 });
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
    mock = new Mock();
    client = new Client({ node: 'http://localhost:9200', Connection: mock.getConnection() });
    mock.add({ method: ['GET', 'POST'], path: '/stocks/_search' }, () => searchBody);
  });

  afterEach(() => {
    consoleErrorSpy.mockRestore();
  });

  const indexClient = (index = 'stocks') =>
    new ElasticsearchIndexClient(client, registry, { index, defaultSize: 10, maxRetries: 2, retryDelayMs: 1 });

  it('should map hits, the total and aggregations', async () => {
    const response = await indexClient().search({
      clause: { filter: [{ kind: 'term', field: 'equity_industry', value: 'Banks' }] },
    });

    expect(response).toEqual({
      total: 42,
      hits: [
        { id: 'NDA-FI', score: 3.2, fields: { name: 'Nordea Bank', equity_industry: 'Banks' } },
        { id: 'KBC', score: 0, fields: {} },
      ],
      aggregations: { by_sector: { buckets: [{ key: 'FINANCIAL_SERVICES', doc_count: 42 }] } },
    });
  });

  it('should return only the hits from execute', async () => {
    const hits = await indexClient().execute({ clause: {} });

    expect(hits.map((hit) => hit.id)).toEqual(['NDA-FI', 'KBC']);
  });

  it('should send the translated request', async () => {
    const searchSpy = jest.spyOn(client, 'search');

    await indexClient().execute({ clause: {}, sort: [{ field: 'currency', order: 'asc' }], limit: 3 });

    expect(searchSpy).toHaveBeenCalledWith({
      index: 'stocks',
      query: { match_all: {} },
      size: 3,
      sort: [{ 'currency.keyword': { order: 'asc' } }],
    });
  });

  it('should retry transient failures', async () => {
    const searchSpy = jest.spyOn(client, 'search').mockRejectedValueOnce(new errors.ConnectionError('socket hang up'));

    const hits = await indexClient().execute({ clause: {} });

    expect(hits).toHaveLength(2);
    expect(searchSpy).toHaveBeenCalledTimes(2);
  });

  it('should wrap a rejected request without retrying it', async () => {
    const searchSpy = jest.spyOn(client, 'search');

    const error = await indexClient('missing')
      .execute({ clause: {} })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(SearchIndexError);
    expect(error).toMatchObject({ statusCode: 404 });
    expect(error instanceof Error ? error.message : '').toMatch(/^Elasticsearch search on "missing" failed: /);
    expect(searchSpy).toHaveBeenCalledTimes(1);
  });

  it('should warn about slow searches', async () => {
    configureLogger({ ...defaultDebugConfig(), slowSearchThresholdMs: 0 });

    await indexClient().execute({ clause: {} });

    expect(consoleErrorSpy.mock.calls.some((call) => String(call[0]).includes('Slow search'))).toBe(true);
  });
});

describe('isTransientSearchError', () => {
  it('should treat connection failures and timeouts as transient', () => {
    expect(isTransientSearchError(new errors.ConnectionError('connect ECONNREFUSED'))).toBe(true);
    expect(isTransientSearchError(new errors.TimeoutError('Request timed out'))).toBe(true);
  });

  it('should treat other errors as final', () => {
    expect(isTransientSearchError(new Error('Connection timeout'))).toBe(false);
    expect(isTransientSearchError('timeout')).toBe(false);
  });
});
