import { describe, it, expect } from '@jest/globals';
import { QueryParser } from '../QueryParser.js';

describe('QueryParser', () => {
  it('should read a full query into a candidate', () => {
    const result = QueryParser.parse({
      bool: {
        must: [{ match: { description: 'renewable energy' } }],
        filter: [
          { term: { equity_sector: 'UTILITIES' } },
          { range: { div_yield_ttm: { gte: 0.03, lt: null } } },
        ],
      },
      sort: [{ div_yield_ttm: 'desc' }],
      from: 10,
      size: 5,
      aggs: { by_industry: { terms: { field: 'equity_industry', size: 3 } } },
    });

    expect(result).toEqual({
      valid: true,
      value: {
        clause: {
          must: [{ kind: 'match', field: 'description', value: 'renewable energy' }],
          filter: [
            { kind: 'term', field: 'equity_sector', value: 'UTILITIES' },
            { kind: 'range', field: 'div_yield_ttm', bounds: { gte: 0.03, lt: null } },
          ],
        },
        sort: [{ field: 'div_yield_ttm', order: 'desc' }],
        offset: 10,
        limit: 5,
        aggregations: { by_industry: { type: 'terms', field: 'equity_industry', size: 3 } },
      },
    });
  });

  it('should accept the long forms of match, term and sort', () => {
    const result = QueryParser.parse({
      bool: {
        must: { match: { name: { query: '  Nokia ' } } },
        filter: [{ term: { size_label: { value: 'LARGE' } } }],
      },
      sort: [{ roe_ttm: { order: 'asc' } }, 'market_cap'],
    });

    expect(result).toEqual({
      valid: true,
      value: {
        clause: {
          must: [{ kind: 'match', field: 'name', value: 'Nokia' }],
          filter: [{ kind: 'term', field: 'size_label', value: 'LARGE' }],
        },
        sort: [
          { field: 'roe_ttm', order: 'asc' },
          { field: 'market_cap', order: 'asc' },
        ],
      },
    });
  });

  it('should keep null clauses and null options for pruning', () => {
    const result = QueryParser.parse({ bool: { should: null }, sort: null, size: null, aggs: null });

    expect(result).toEqual({
      valid: true,
      value: { clause: { should: null }, sort: null, limit: null, aggregations: null },
    });
  });

  it('should read every metric aggregation type', () => {
    const result = QueryParser.parse({
      aggregations: {
        mean_roe: { avg: { field: 'roe_ttm' } },
        lowest_pe: { min: { field: 'price_earnings_ex_extra_ttm' } },
      },
    });

    expect(result).toEqual({
      valid: true,
      value: {
        clause: {},
        aggregations: {
          mean_roe: { type: 'avg', field: 'roe_ttm' },
          lowest_pe: { type: 'min', field: 'price_earnings_ex_extra_ttm' },
        },
      },
    });
  });

  it('should reject a non-object query', () => {
    expect(QueryParser.parse('size_label:LARGE')).toEqual({ valid: false, errors: ['query: must be an object'] });
  });

  it('should collect every shape violation with its location', () => {
    const result = QueryParser.parse({
      bool: {
        must: [{ wildcard: { name: 'No*' } }, { match: { name: '' } }],
        filter: [{ term: { a: 'x', b: 'y' } }, { range: { roe_ttm: { above: 0.1 } } }],
        because: [],
      },
      sort: [{ roe_ttm: 'up' }],
      size: 2.5,
      script: {},
    });

    expect(result).toEqual({
      valid: false,
      errors: [
        'clause.must[0]: unsupported predicate "wildcard"; use one of match, term, range',
        'clause.must[1]: match value for "name" must be a non-empty string',
        'clause.filter[0]: term must name exactly one field',
        'clause.filter[1]: range on "roe_ttm" has unsupported bound "above"',
        'clause: unsupported key "because"',
        'sort[0]: order for "roe_ttm" must be "asc" or "desc"',
        'limit: must be an integer',
        'query: unsupported key "script"',
      ],
    });
  });

  it('should reject reserved aggregation names instead of dropping them', () => {
    const raw: unknown = JSON.parse(
      '{"bool": {"filter": [{"term": {"size_label": "SMALL"}}]}, "aggs": {"__proto__": {"terms": {"field": "equity_sector"}}, "constructor": {"avg": {"field": "roe_ttm"}}, "by_sector": {"terms": {"field": "equity_sector"}}}}'
    );

    const result = QueryParser.parse(raw);

    expect(result).toEqual({
      valid: false,
      errors: [
        'aggregations.__proto__: "__proto__" is a reserved name',
        'aggregations.constructor: "constructor" is a reserved name',
      ],
    });
  });

  it('should reject aggregations without a field or with an unknown type', () => {
    const result = QueryParser.parse({
      aggs: {
        a: { terms: {} },
        b: { cardinality: { field: 'isin' } },
        c: { terms: { field: 'currency', size: 'ten' } },
      },
    });

    expect(result).toEqual({
      valid: false,
      errors: [
        'aggregations.a: terms needs a "field"',
        'aggregations.b: unsupported aggregation "cardinality"',
        'aggregations.c: terms size must be an integer',
      ],
    });
  });
});
