import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { createStockSearch } from '../src/bootstrap.js';
import type { StockSearchService } from '../src/search/StockSearchService.js';
import { ScriptedModelProvider } from './helpers/ScriptedModelProvider.js';
import { StaticIndexClient } from './helpers/StaticIndexClient.js';
import { testAppConfig } from './helpers/testConfig.js';

const BANK_HITS = [
  {
    id: 'bank-1',
    score: 3.2,
    fields: { name: 'Example Bank A', equity_industry: 'Banks', currency: 'EUR', div_yield_ttm: 0.061 },
  },
  {
    id: 'bank-2',
    score: 2.7,
    fields: { name: 'Example Bank B', equity_industry: 'Banks', currency: 'EUR', div_yield_ttm: 0.044 },
  },
];

describe('Stock search flow', () => {
  let provider: ScriptedModelProvider;
  let index: StaticIndexClient;
  let service: StockSearchService;

  beforeEach(() => {
    provider = new ScriptedModelProvider();
    index = new StaticIndexClient(BANK_HITS);
    service = createStockSearch(testAppConfig(), { provider, index }).service;
  });

  it('should run a compiled search and return explanation with ranked hits', async () => {
    provider.queueJson({
      answer: 'Euro-listed banks yielding at least 3%.',
      query: {
        bool: {
          filter: [
            { term: { currency: 'EUR' } },
            { term: { equity_industry: 'Banks' } },
            { range: { div_yield_ttm: { gte: 0.03 } } },
          ],
        },
        sort: [{ div_yield_ttm: 'desc' }],
      },
    });

    const outcome = await service.search('European banks with high dividends');

    assert.strictEqual(outcome.kind, 'results');
    if (outcome.kind !== 'results') return;

    assert.strictEqual(outcome.text, 'Euro-listed banks yielding at least 3%.');
    assert.deepStrictEqual(
      outcome.hits.map((hit) => hit.id),
      ['bank-1', 'bank-2']
    );
    assert.strictEqual(index.queries.length, 1);
    assert.deepStrictEqual(index.queries[0], outcome.query);
    assert.deepStrictEqual(outcome.query.sort, [{ field: 'div_yield_ttm', order: 'desc' }]);
  });

  it('should return total and aggregation buckets for a distribution question', async () => {
    index.setTotal(57);
    index.setAggregations({
      by_sector: {
        buckets: [
          { key: 'FINANCIAL_SERVICES', doc_count: 31 },
          { key: 'UTILITIES', doc_count: 26 },
        ],
      },
    });
    provider.queueJson({
      answer: 'Small caps paying a dividend, grouped by sector.',
      query: {
        bool: {
          filter: [
            { term: { size_label: 'SMALL' } },
            { range: { div_yield_ttm: { gt: 0 } } },
          ],
        },
        aggs: { by_sector: { terms: { field: 'equity_sector' } } },
      },
    });

    const outcome = await service.search('How are small cap dividend payers spread across sectors?');

    assert.strictEqual(outcome.kind, 'results');
    if (outcome.kind !== 'results') return;

    assert.deepStrictEqual(outcome.query.aggregations, { by_sector: { type: 'terms', field: 'equity_sector' } });
    assert.strictEqual(outcome.total, 57);
    assert.strictEqual(outcome.hits.length, 2);
    assert.deepStrictEqual(outcome.aggregations, {
      by_sector: {
        buckets: [
          { key: 'FINANCIAL_SERVICES', doc_count: 31 },
          { key: 'UTILITIES', doc_count: 26 },
        ],
      },
    });
  });

  it('should not touch the index for an answer', async () => {
    provider.queueJson({ answer: 'A dividend yield is the annual dividend divided by the share price.' });

    const outcome = await service.search('What is a dividend yield?');

    assert.deepStrictEqual(outcome, {
      kind: 'answer',
      text: 'A dividend yield is the annual dividend divided by the share price.',
    });
    assert.strictEqual(index.queries.length, 0);
  });

  it('should answer empty input without model or index calls', async () => {
    const outcome = await service.search('   ');

    assert.deepStrictEqual(outcome, { kind: 'answer', text: 'A query is required.' });
    assert.strictEqual(provider.calls.length, 0);
    assert.strictEqual(index.queries.length, 0);
  });

  it('should still return results when the model fails', async () => {
    provider.queueFailure('request timed out');

    const outcome = await service.search('European banks');

    assert.strictEqual(outcome.kind, 'results');
    if (outcome.kind !== 'results') return;

    assert.strictEqual(outcome.text, '');
    assert.deepStrictEqual(outcome.query, { clause: {} });
    assert.strictEqual(outcome.hits.length, 2);
    assert.deepStrictEqual(index.queries, [{ clause: {} }]);
  });

  it('should handle independent concurrent searches', async () => {
    provider.queueJson({ answer: 'Growth stocks.', query: { bool: { filter: [{ term: { value_growth_label: 'GROWTH' } }] } } });
    provider.queueJson({ answer: 'Value stocks.', query: { bool: { filter: [{ term: { value_growth_label: 'VALUE' } }] } } });

    const [first, second] = await Promise.all([service.search('growth stocks'), service.search('value stocks')]);

    assert.strictEqual(first.kind, 'results');
    assert.strictEqual(second.kind, 'results');
    assert.strictEqual(provider.calls.length, 2);
    assert.strictEqual(index.queries.length, 2);
  });
});
