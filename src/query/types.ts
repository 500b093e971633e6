/**
 * Query Grammar types.
 *
 * `StructuredQuery` is the compiler's validated output. The `*Candidate`
 * variants are what the parser produces from model output: the same tree but
 * with nullable optional members, which pruning removes after validation.
 * Every StructuredQuery is also a valid QueryCandidate.
 */

export type ClauseName = 'must' | 'should' | 'must_not' | 'filter';

export const CLAUSE_NAMES: readonly ClauseName[] = ['must', 'should', 'must_not', 'filter'];

export type BoundKey = 'gt' | 'gte' | 'lt' | 'lte';

export const BOUND_KEYS: readonly BoundKey[] = ['gt', 'gte', 'lt', 'lte'];

/** Number for numeric/integer fields; ISO date, date math or epoch millis for dates */
export type RangeValue = number | string;

export interface MatchPredicate {
  kind: 'match';
  field: string;
  value: string;
}

export interface TermPredicate {
  kind: 'term';
  field: string;
  value: string;
}

export type RangeBounds = Partial<Record<BoundKey, RangeValue>>;

export interface RangePredicate {
  kind: 'range';
  field: string;
  bounds: RangeBounds;
}

export type Predicate = MatchPredicate | TermPredicate | RangePredicate;

export type BoolClause = Partial<Record<ClauseName, Predicate[]>>;

export type SortOrder = 'asc' | 'desc';

export interface SortSpec {
  field: string;
  order: SortOrder;
}

export type MetricAggregationType = 'avg' | 'sum' | 'min' | 'max';

export const METRIC_AGGREGATION_TYPES: readonly MetricAggregationType[] = [
  'avg',
  'sum',
  'min',
  'max',
];

export interface TermsAggregation {
  type: 'terms';
  field: string;
  size?: number;
}

export interface MetricAggregation {
  type: MetricAggregationType;
  field: string;
}

export type Aggregation = TermsAggregation | MetricAggregation;

export interface StructuredQuery {
  clause: BoolClause;
  sort?: SortSpec[];
  offset?: number;
  limit?: number;
  aggregations?: Record<string, Aggregation>;
}

export type RangeBoundsCandidate = Partial<Record<BoundKey, RangeValue | null>>;

export interface RangePredicateCandidate {
  kind: 'range';
  field: string;
  bounds: RangeBoundsCandidate;
}

export type PredicateCandidate = MatchPredicate | TermPredicate | RangePredicateCandidate;

export type BoolClauseCandidate = Partial<Record<ClauseName, PredicateCandidate[] | null>>;

export interface QueryCandidate {
  clause: BoolClauseCandidate;
  sort?: SortSpec[] | null;
  offset?: number | null;
  limit?: number | null;
  aggregations?: Record<string, Aggregation> | null;
}

/**
 * Outcome of a grammar check, in the shape the validators share: either the
 * checked value or the list of violations, each prefixed with its location.
 */
export type GrammarResult<T> = { valid: true; value: T } | { valid: false; errors: string[] };
