import {
  BOUND_KEYS,
  CLAUSE_NAMES,
  type Aggregation,
  type BoolClause,
  type BoolClauseCandidate,
  type Predicate,
  type PredicateCandidate,
  type QueryCandidate,
  type RangeBounds,
  type RangeBoundsCandidate,
  type StructuredQuery,
} from './types.js';

/**
 * Drop null and empty optional members from a validated candidate.
 *
 * Empty sub-clauses, null range bounds and absent top-level options do not
 * appear in the output, so consumers can rely on absent keys instead of nulls.
 * Required members (`clause`, predicate `field`/`value`/`bounds`) are always
 * kept. Applying it to its own output returns an equal structure.
 */
export function pruneQuery(candidate: QueryCandidate): StructuredQuery {
  const query: StructuredQuery = { clause: pruneClause(candidate.clause) };

  if (candidate.sort != null && candidate.sort.length > 0) {
    query.sort = candidate.sort.map((spec) => ({ field: spec.field, order: spec.order }));
  }

  if (candidate.offset != null) {
    query.offset = candidate.offset;
  }

  if (candidate.limit != null) {
    query.limit = candidate.limit;
  }

  if (candidate.aggregations != null) {
    const entries = Object.entries(candidate.aggregations);
    if (entries.length > 0) {
      query.aggregations = Object.fromEntries(
        entries.map(([name, aggregation]): [string, Aggregation] => [name, pruneAggregation(aggregation)])
      );
    }
  }

  return query;
}

function pruneClause(clause: BoolClauseCandidate): BoolClause {
  const pruned: BoolClause = {};
  for (const name of CLAUSE_NAMES) {
    const predicates = clause[name];
    if (predicates != null && predicates.length > 0) {
      pruned[name] = predicates.map(prunePredicate);
    }
  }
  return pruned;
}

function prunePredicate(predicate: PredicateCandidate): Predicate {
  switch (predicate.kind) {
    case 'match':
    case 'term':
      return { ...predicate };
    case 'range':
      return { kind: 'range', field: predicate.field, bounds: pruneBounds(predicate.bounds) };
  }
}

function pruneBounds(bounds: RangeBoundsCandidate): RangeBounds {
  const pruned: RangeBounds = {};
  for (const key of BOUND_KEYS) {
    const value = bounds[key];
    if (value != null) {
      pruned[key] = value;
    }
  }
  return pruned;
}

function pruneAggregation(aggregation: Aggregation): Aggregation {
  if (aggregation.type === 'terms') {
    return aggregation.size != null
      ? { type: 'terms', field: aggregation.field, size: aggregation.size }
      : { type: 'terms', field: aggregation.field };
  }
  return { type: aggregation.type, field: aggregation.field };
}
