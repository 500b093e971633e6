import type { estypes } from '@elastic/elasticsearch';
import { CLAUSE_NAMES, type Aggregation, type Predicate, type SortSpec, type StructuredQuery } from '../query/types.js';
import type { SchemaRegistry } from '../schema/SchemaRegistry.js';

export interface RequestOptions {
  index: string;
  /** Page size when the query sets no limit */
  defaultSize: number;
}

/**
 * Translate a validated query into an Elasticsearch search request.
 *
 * Keyword fields are addressed with the registry's exact-match suffix here, so
 * neither the model nor the validated query ever carries it. A query with no
 * predicates matches every document.
 */
export function toElasticsearchRequest(
  query: StructuredQuery,
  registry: SchemaRegistry,
  options: RequestOptions
): estypes.SearchRequest {
  const indexField = (field: string) => {
    const descriptor = registry.resolve(field);
    return descriptor ? registry.indexField(descriptor) : field;
  };

  const request: estypes.SearchRequest = {
    index: options.index,
    query: toQuery(query, indexField),
    size: query.limit ?? options.defaultSize,
  };

  if (query.offset !== undefined) {
    request.from = query.offset;
  }

  if (query.sort) {
    request.sort = query.sort.map((spec) => toSort(spec, indexField));
  }

  if (query.aggregations) {
    request.aggregations = Object.fromEntries(
      Object.entries(query.aggregations).map(
        ([name, aggregation]): [string, estypes.AggregationsAggregationContainer] => [
          name,
          toAggregation(aggregation, indexField),
        ]
      )
    );
  }

  return request;
}

function toQuery(
  query: StructuredQuery,
  indexField: (field: string) => string
): estypes.QueryDslQueryContainer {
  const bool: estypes.QueryDslBoolQuery = {};
  let predicates = 0;

  for (const name of CLAUSE_NAMES) {
    const clause = query.clause[name];
    if (clause && clause.length > 0) {
      bool[name] = clause.map((predicate) => toPredicate(predicate, indexField));
      predicates += clause.length;
    }
  }

  return predicates === 0 ? { match_all: {} } : { bool };
}

function toPredicate(
  predicate: Predicate,
  indexField: (field: string) => string
): estypes.QueryDslQueryContainer {
  switch (predicate.kind) {
    case 'match':
      return { match: { [predicate.field]: { query: predicate.value } } };
    case 'term':
      return { term: { [indexField(predicate.field)]: { value: predicate.value } } };
    case 'range':
      return { range: { [predicate.field]: { ...predicate.bounds } } };
  }
}

function toSort(spec: SortSpec, indexField: (field: string) => string): estypes.SortCombinations {
  return { [indexField(spec.field)]: { order: spec.order } };
}

function toAggregation(
  aggregation: Aggregation,
  indexField: (field: string) => string
): estypes.AggregationsAggregationContainer {
  const field = indexField(aggregation.field);
  switch (aggregation.type) {
    case 'terms':
      return { terms: aggregation.size !== undefined ? { field, size: aggregation.size } : { field } };
    case 'avg':
      return { avg: { field } };
    case 'sum':
      return { sum: { field } };
    case 'min':
      return { min: { field } };
    case 'max':
      return { max: { field } };
  }
}
