import { describe, it, expect } from '@jest/globals';
import { resolve } from 'path';
import { QueryValidator } from '../../query/QueryValidator.js';
import { SchemaRegistry } from '../../schema/SchemaRegistry.js';
import { extractJsonObject, hasQueryContent, ResponseInterpreter } from '../ResponseInterpreter.js';

const registry = SchemaRegistry.load(resolve(process.cwd(), 'schema/stock-attributes.json'));
const interpreter = new ResponseInterpreter(registry, new QueryValidator(registry, { maxPageSize: 100 }));

describe('extractJsonObject', () => {
  it('should parse a bare JSON object', () => {
    expect(extractJsonObject(' {"answer": "hi"} ')).toEqual({ answer: 'hi' });
  });

  it('should read the first fenced block', () => {
    expect(extractJsonObject('Here you go:\n```json\n{"answer": "hi"}\n```\nAnything else?')).toEqual({
      answer: 'hi',
    });
  });

  it('should fall back to the outermost braces', () => {
    expect(extractJsonObject('Result: {"query": {"size": 3}} as requested')).toEqual({ query: { size: 3 } });
  });

  it('should return undefined for arrays, scalars and prose', () => {
    expect(extractJsonObject('[1, 2]')).toBeUndefined();
    expect(extractJsonObject('42')).toBeUndefined();
    expect(extractJsonObject('I cannot help with that.')).toBeUndefined();
  });
});

describe('hasQueryContent', () => {
  it('should ignore nulls, empty containers and an empty bool', () => {
    expect(hasQueryContent({ bool: { must: [], filter: null }, sort: [], aggs: {}, size: null })).toBe(false);
  });

  it('should count any predicate, sort or aggregation', () => {
    expect(hasQueryContent({ bool: { must: [{ match: { name: 'x' } }] } })).toBe(true);
    expect(hasQueryContent({ sort: [{ market_cap: 'desc' }] })).toBe(true);
    expect(hasQueryContent({ aggs: { by_sector: { terms: { field: 'equity_sector' } } } })).toBe(true);
    expect(hasQueryContent({ size: 5, sort: ['market_cap'] })).toBe(true);
  });

  it('should not count paging on its own', () => {
    expect(hasQueryContent({ size: 5 })).toBe(false);
    expect(hasQueryContent({ from: 20, size: 10 })).toBe(false);
  });
});

describe('ResponseInterpreter', () => {
  it('should return a search result carrying the explanation', () => {
    const result = interpreter.interpret(
      JSON.stringify({
        answer: 'Large Finnish companies.',
        query: {
          bool: {
            must: [{ match: { description: 'Finland' } }],
            filter: [{ term: { size_label: 'LARGE' } }],
            should: [],
          },
        },
      })
    );

    expect(result).toEqual({
      ok: true,
      value: {
        kind: 'search',
        text: 'Large Finnish companies.',
        query: {
          clause: {
            must: [{ kind: 'match', field: 'description', value: 'Finland' }],
            filter: [{ kind: 'term', field: 'size_label', value: 'LARGE' }],
          },
        },
      },
    });
  });

  it('should return an answer when the query is absent or empty', () => {
    expect(interpreter.interpret('{"answer": "  ROE is return on equity. ", "query": {"bool": {}}}')).toEqual({
      ok: true,
      value: { kind: 'answer', text: 'ROE is return on equity.' },
    });
    expect(interpreter.interpret('{"answer": "Hello.", "query": null}')).toEqual({
      ok: true,
      value: { kind: 'answer', text: 'Hello.' },
    });
  });

  it('should accept a bare query and a request-body wrapper', () => {
    const bare = interpreter.interpret('{"bool": {"filter": [{"term": {"currency": "EUR"}}]}}');
    const wrapped = interpreter.interpret('{"query": {"query": {"bool": {"filter": [{"term": {"currency": "EUR"}}]}}}}');

    const expected = {
      ok: true,
      value: {
        kind: 'search',
        text: '',
        query: { clause: { filter: [{ kind: 'term', field: 'currency', value: 'EUR' }] } },
      },
    };
    expect(bare).toEqual(expected);
    expect(wrapped).toEqual(expected);
  });

  it('should keep the answer when the query only pages', () => {
    expect(interpreter.interpret('{"answer": "ROE is net income over equity.", "query": {"size": 10}}')).toEqual({
      ok: true,
      value: { kind: 'answer', text: 'ROE is net income over equity.' },
    });
  });

  it('should read query keys written next to the answer', () => {
    const result = interpreter.interpret(
      '{"answer": "Euro-listed stocks.", "bool": {"filter": [{"term": {"currency": "EUR"}}]}, "sort": [{"market_cap": "desc"}], "size": 5}'
    );

    expect(result).toEqual({
      ok: true,
      value: {
        kind: 'search',
        text: 'Euro-listed stocks.',
        query: {
          clause: { filter: [{ kind: 'term', field: 'currency', value: 'EUR' }] },
          sort: [{ field: 'market_cap', order: 'desc' }],
          limit: 5,
        },
      },
    });
  });

  it('should report a reserved aggregation name as a violation', () => {
    const result = interpreter.interpret(
      '{"answer": "x", "query": {"bool": {"filter": [{"term": {"size_label": "SMALL"}}]}, "aggs": {"__proto__": {"terms": {"field": "equity_sector"}}}}}'
    );

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('schema_violation');
      expect(result.error.violations).toEqual(['aggregations.__proto__: "__proto__" is a reserved name']);
    }
  });

  it('should classify output that is not a JSON object as malformed', () => {
    const result = interpreter.interpret('Sorry, I do not know.');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('malformed');
      expect(result.error.message).toBe('model output is not a JSON object');
      expect(result.error.rawOutput).toBe('Sorry, I do not know.');
    }
  });

  it('should classify wrongly typed members as malformed', () => {
    const badAnswer = interpreter.interpret('{"answer": 3}');
    const badQuery = interpreter.interpret('{"answer": "x", "query": "size_label:LARGE"}');

    expect(badAnswer.ok ? undefined : badAnswer.error.message).toBe('"answer" must be a string');
    expect(badQuery.ok ? undefined : badQuery.error.message).toBe('"query" must be an object');
  });

  it('should report grammar violations', () => {
    const result = interpreter.interpret('{"query": {"bool": {"must": [{"prefix": {"name": "No"}}]}}}');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('schema_violation');
      expect(result.error.message).toBe('query does not follow the grammar');
      expect(result.error.violations).toEqual([
        'clause.must[0]: unsupported predicate "prefix"; use one of match, term, range',
      ]);
    }
  });

  it('should report schema violations', () => {
    const result = interpreter.interpret('{"query": {"bool": {"filter": [{"term": {"size_label": "GIANT"}}]}}}');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('schema_violation');
      expect(result.error.message).toBe('query violates the schema');
      expect(result.error.violations).toEqual([
        'clause.filter[0]: "GIANT" is not an allowed value for "size_label". Must be one of: LARGE, MID, SMALL',
      ]);
    }
  });

  it('should classify output with neither answer nor query as empty', () => {
    const result = interpreter.interpret('{"answer": "   ", "query": {"bool": {"must": []}}}');

    expect(result.ok ? undefined : result.error.kind).toBe('empty');
  });

  describe('repair', () => {
    it('should strip the exact-match suffix from known keyword fields', () => {
      const repaired = interpreter.repair({
        clause: { filter: [{ kind: 'term', field: 'equity_sector.keyword', value: 'ENERGY' }] },
        sort: [{ field: 'size_label.keyword', order: 'asc' }],
        aggregations: { by_currency: { type: 'terms', field: 'currency.keyword' } },
      });

      expect(repaired).toEqual({
        clause: { filter: [{ kind: 'term', field: 'equity_sector', value: 'ENERGY' }] },
        sort: [{ field: 'size_label', order: 'asc' }],
        aggregations: { by_currency: { type: 'terms', field: 'currency' } },
      });
    });

    it('should leave unknown suffixed fields for the validator', () => {
      const repaired = interpreter.repair({
        clause: { filter: [{ kind: 'term', field: 'country.keyword', value: 'Finland' }] },
      });

      expect(repaired.clause.filter).toEqual([{ kind: 'term', field: 'country.keyword', value: 'Finland' }]);
    });

    it('should canonicalise enumeration values that match one allowed value', () => {
      const repaired = interpreter.repair({
        clause: {
          filter: [
            { kind: 'term', field: 'equity_sector', value: 'financial services' },
            { kind: 'term', field: 'equity_industry', value: 'it-services' },
            { kind: 'term', field: 'size_label', value: 'huge' },
          ],
        },
      });

      expect(repaired.clause.filter).toEqual([
        { kind: 'term', field: 'equity_sector', value: 'FINANCIAL_SERVICES' },
        { kind: 'term', field: 'equity_industry', value: 'IT Services' },
        { kind: 'term', field: 'size_label', value: 'huge' },
      ]);
    });

    it('should turn numeric strings into numbers on numeric ranges only', () => {
      const repaired = interpreter.repair({
        clause: {
          filter: [
            { kind: 'range', field: 'roe_ttm', bounds: { gte: ' 0.1 ', lt: null } },
            { kind: 'range', field: 'latest_report_date', bounds: { gte: '2024' } },
          ],
        },
      });

      expect(repaired.clause.filter).toEqual([
        { kind: 'range', field: 'roe_ttm', bounds: { gte: 0.1, lt: null } },
        { kind: 'range', field: 'latest_report_date', bounds: { gte: '2024' } },
      ]);
    });
  });
});
