/**
 * Query Parser
 *
 * Reads the query object a model emitted (Elasticsearch-style keys) into a
 * typed {@link QueryCandidate}. Only the shape is checked here; whether fields
 * exist and fit their predicates is the validator's job.
 *
 * @remarks
 * **Accepted shape:**
 * ```
 * {
 *   "bool": { "must" | "should" | "must_not" | "filter": Predicate[] },
 *   "sort": [{ "<field>": "asc" | "desc" }],   // also { "<field>": { "order": ... } } or "<field>"
 *   "from": 0,
 *   "size": 10,
 *   "aggs": { "<name>": { "terms" | "avg" | "sum" | "min" | "max": { "field": "<field>" } } }
 * }
 *
 * Predicate := { "match": { "<field>": "<text>" | { "query": "<text>" } } }
 *            | { "term":  { "<field>": "<value>" | { "value": "<value>" } } }
 *            | { "range": { "<field>": { "gt" | "gte" | "lt" | "lte": number | string | null } } }
 * ```
 * A clause given as a single predicate object instead of an array is read as a
 * one-element array. `null` members are kept so validation can see them.
 */

import {
  BOUND_KEYS,
  CLAUSE_NAMES,
  METRIC_AGGREGATION_TYPES,
  type Aggregation,
  type BoolClauseCandidate,
  type BoundKey,
  type ClauseName,
  type GrammarResult,
  type PredicateCandidate,
  type QueryCandidate,
  type RangeBoundsCandidate,
  type SortSpec,
} from './types.js';

type JsonObject = Record<string, unknown>;

const QUERY_KEYS: Record<string, 'clause' | 'sort' | 'offset' | 'limit' | 'aggregations'> = {
  bool: 'clause',
  sort: 'sort',
  from: 'offset',
  size: 'limit',
  aggs: 'aggregations',
  aggregations: 'aggregations',
};

const PREDICATE_KINDS = ['match', 'term', 'range'] as const;

const RESERVED_AGGREGATION_NAMES: ReadonlySet<string> = new Set(['__proto__', 'constructor', 'prototype']);

export const isJsonObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isClauseName = (value: string): value is ClauseName =>
  (CLAUSE_NAMES as readonly string[]).includes(value);

const isBoundKey = (value: string): value is BoundKey =>
  (BOUND_KEYS as readonly string[]).includes(value);

export class QueryParser {
  /**
   * Parse a model-emitted query object.
   * @returns the candidate, or every shape violation found
   */
  static parse(raw: unknown): GrammarResult<QueryCandidate> {
    const errors: string[] = [];

    if (!isJsonObject(raw)) {
      return { valid: false, errors: ['query: must be an object'] };
    }

    const candidate: QueryCandidate = { clause: {} };

    for (const [key, value] of Object.entries(raw)) {
      const target = QUERY_KEYS[key];
      switch (target) {
        case 'clause':
          candidate.clause = parseClause(value, errors);
          break;
        case 'sort': {
          const sort = parseSort(value, errors);
          if (sort !== undefined) candidate.sort = sort;
          break;
        }
        case 'offset': {
          const offset = parseInteger('offset', value, errors);
          if (offset !== undefined) candidate.offset = offset;
          break;
        }
        case 'limit': {
          const limit = parseInteger('limit', value, errors);
          if (limit !== undefined) candidate.limit = limit;
          break;
        }
        case 'aggregations': {
          const aggregations = parseAggregations(value, errors);
          if (aggregations !== undefined) candidate.aggregations = aggregations;
          break;
        }
        default:
          errors.push(`query: unsupported key "${key}"`);
      }
    }

    return errors.length === 0 ? { valid: true, value: candidate } : { valid: false, errors };
  }
}

function parseClause(raw: unknown, errors: string[]): BoolClauseCandidate {
  const clause: BoolClauseCandidate = {};

  if (raw === undefined || raw === null) {
    return clause;
  }

  if (!isJsonObject(raw)) {
    errors.push('clause: "bool" must be an object');
    return clause;
  }

  for (const [name, value] of Object.entries(raw)) {
    if (!isClauseName(name)) {
      errors.push(`clause: unsupported key "${name}"`);
      continue;
    }

    if (value === null || value === undefined) {
      clause[name] = null;
      continue;
    }

    const entries = Array.isArray(value) ? value : isJsonObject(value) ? [value] : undefined;
    if (!entries) {
      errors.push(`clause.${name}: must be an array of predicates`);
      continue;
    }

    const predicates: PredicateCandidate[] = [];
    entries.forEach((entry, index) => {
      const predicate = parsePredicate(entry, `clause.${name}[${index}]`, errors);
      if (predicate) {
        predicates.push(predicate);
      }
    });
    clause[name] = predicates;
  }

  return clause;
}

function parsePredicate(
  raw: unknown,
  path: string,
  errors: string[]
): PredicateCandidate | undefined {
  if (!isJsonObject(raw)) {
    errors.push(`${path}: predicate must be an object`);
    return undefined;
  }

  const keys = Object.keys(raw);
  if (keys.length !== 1) {
    errors.push(`${path}: predicate must have exactly one of match, term, range`);
    return undefined;
  }

  const kind = keys[0];
  const body = raw[kind];

  if (kind !== 'match' && kind !== 'term' && kind !== 'range') {
    errors.push(`${path}: unsupported predicate "${kind}"; use one of ${PREDICATE_KINDS.join(', ')}`);
    return undefined;
  }

  if (!isJsonObject(body) || Object.keys(body).length !== 1) {
    errors.push(`${path}: ${kind} must name exactly one field`);
    return undefined;
  }

  const [field, value] = Object.entries(body)[0];

  switch (kind) {
    case 'match': {
      const text = isJsonObject(value) ? value.query : value;
      if (typeof text !== 'string' || text.trim() === '') {
        errors.push(`${path}: match value for "${field}" must be a non-empty string`);
        return undefined;
      }
      return { kind: 'match', field, value: text.trim() };
    }
    case 'term': {
      const term = isJsonObject(value) ? value.value : value;
      if (typeof term !== 'string' || term.trim() === '') {
        errors.push(`${path}: term value for "${field}" must be a non-empty string`);
        return undefined;
      }
      return { kind: 'term', field, value: term.trim() };
    }
    case 'range': {
      const bounds = parseBounds(value, field, path, errors);
      return bounds ? { kind: 'range', field, bounds } : undefined;
    }
  }
}

function parseBounds(
  raw: unknown,
  field: string,
  path: string,
  errors: string[]
): RangeBoundsCandidate | undefined {
  if (!isJsonObject(raw)) {
    errors.push(`${path}: range on "${field}" must map bound names to values`);
    return undefined;
  }

  const bounds: RangeBoundsCandidate = {};
  let ok = true;

  for (const [key, value] of Object.entries(raw)) {
    if (!isBoundKey(key)) {
      errors.push(`${path}: range on "${field}" has unsupported bound "${key}"`);
      ok = false;
      continue;
    }

    if (value === null || typeof value === 'string' || (typeof value === 'number' && Number.isFinite(value))) {
      bounds[key] = value;
    } else {
      errors.push(`${path}: bound "${key}" on "${field}" must be a number or string`);
      ok = false;
    }
  }

  return ok ? bounds : undefined;
}

function parseSort(raw: unknown, errors: string[]): SortSpec[] | null | undefined {
  if (raw === undefined) {
    return undefined;
  }
  if (raw === null) {
    return null;
  }

  const entries = Array.isArray(raw) ? raw : [raw];
  const specs: SortSpec[] = [];

  entries.forEach((entry, index) => {
    const path = `sort[${index}]`;

    if (typeof entry === 'string' && entry.trim() !== '') {
      specs.push({ field: entry.trim(), order: 'asc' });
      return;
    }

    if (!isJsonObject(entry) || Object.keys(entry).length !== 1) {
      errors.push(`${path}: must be a field name or an object with exactly one field`);
      return;
    }

    const [field, value] = Object.entries(entry)[0];
    const order = isJsonObject(value) ? value.order : value;
    if (order !== 'asc' && order !== 'desc') {
      errors.push(`${path}: order for "${field}" must be "asc" or "desc"`);
      return;
    }
    specs.push({ field, order });
  });

  return specs;
}

function parseInteger(
  name: 'offset' | 'limit',
  raw: unknown,
  errors: string[]
): number | null | undefined {
  if (raw === undefined || raw === null) {
    return raw;
  }
  if (typeof raw !== 'number' || !Number.isInteger(raw)) {
    errors.push(`${name}: must be an integer`);
    return undefined;
  }
  return raw;
}

function parseAggregations(
  raw: unknown,
  errors: string[]
): Record<string, Aggregation> | null | undefined {
  if (raw === undefined || raw === null) {
    return raw;
  }

  if (!isJsonObject(raw)) {
    errors.push('aggregations: must be an object keyed by aggregation name');
    return undefined;
  }

  const aggregations: Record<string, Aggregation> = {};

  for (const [name, body] of Object.entries(raw)) {
    const path = `aggregations.${name}`;

    if (RESERVED_AGGREGATION_NAMES.has(name)) {
      errors.push(`${path}: "${name}" is a reserved name`);
      continue;
    }

    if (!isJsonObject(body) || Object.keys(body).length !== 1) {
      errors.push(`${path}: must have exactly one of terms, ${METRIC_AGGREGATION_TYPES.join(', ')}`);
      continue;
    }

    const [type, spec] = Object.entries(body)[0];
    if (!isJsonObject(spec) || typeof spec.field !== 'string' || spec.field.trim() === '') {
      errors.push(`${path}: ${type} needs a "field"`);
      continue;
    }
    const field = spec.field.trim();

    if (type === 'terms') {
      if (spec.size === undefined || spec.size === null) {
        aggregations[name] = { type: 'terms', field };
      } else if (typeof spec.size === 'number' && Number.isInteger(spec.size)) {
        aggregations[name] = { type: 'terms', field, size: spec.size };
      } else {
        errors.push(`${path}: terms size must be an integer`);
      }
      continue;
    }

    const metric = METRIC_AGGREGATION_TYPES.find((candidate) => candidate === type);
    if (!metric) {
      errors.push(`${path}: unsupported aggregation "${type}"`);
      continue;
    }
    aggregations[name] = { type: metric, field };
  }

  return aggregations;
}
