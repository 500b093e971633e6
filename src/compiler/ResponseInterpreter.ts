import { isJsonObject, QueryParser } from '../query/QueryParser.js';
import type { QueryValidator } from '../query/QueryValidator.js';
import {
  BOUND_KEYS,
  CLAUSE_NAMES,
  type Aggregation,
  type PredicateCandidate,
  type QueryCandidate,
  type RangeBoundsCandidate,
  type SortSpec,
} from '../query/types.js';
import type { SchemaRegistry } from '../schema/SchemaRegistry.js';
import { isNumericKind } from '../schema/types.js';
import { debugLog } from '../utils/logger.js';
import { InterpretError } from './InterpretError.js';
import type { TransformResult } from './types.js';

export type InterpretResult = { ok: true; value: TransformResult } | { ok: false; error: InterpretError };

const CODE_FENCE_PATTERN = /```(?:json)?\s*\n?([\s\S]*?)\n?```/;
const NUMERIC_STRING_PATTERN = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/;

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Pull the JSON object out of a model reply: the whole text, the first fenced
 * block, or the outermost braces, in that order.
 */
export function extractJsonObject(text: string): Record<string, unknown> | undefined {
  const trimmed = text.trim();
  const attempts = [trimmed];

  const fenced = trimmed.match(CODE_FENCE_PATTERN);
  if (fenced?.[1]) {
    attempts.push(fenced[1].trim());
  }

  const first = trimmed.indexOf('{');
  const last = trimmed.lastIndexOf('}');
  if (first !== -1 && last > first) {
    attempts.push(trimmed.slice(first, last + 1));
  }

  for (const attempt of attempts) {
    const parsed = parseJson(attempt);
    if (isJsonObject(parsed)) {
      return parsed;
    }
  }
  return undefined;
}

const PAGING_KEYS: ReadonlySet<string> = new Set(['from', 'size']);

// Top-level keys that mark a query written without the {answer, query} envelope
const BARE_QUERY_KEYS = ['bool', 'sort', 'aggs', 'aggregations'] as const;

/**
 * Whether a query object asks for anything at all. Null members, empty
 * arrays, empty objects, a `bool` whose clauses are all empty and paging
 * (`from`, `size`) on its own do not count.
 */
export function hasQueryContent(query: Record<string, unknown>): boolean {
  return Object.entries(query).some(([key, value]) => {
    if (PAGING_KEYS.has(key) || value === null || value === undefined) {
      return false;
    }
    if (Array.isArray(value)) {
      return value.length > 0;
    }
    if (isJsonObject(value)) {
      if (key === 'bool') {
        return Object.values(value).some(
          (clause) => clause !== null && clause !== undefined && !(Array.isArray(clause) && clause.length === 0)
        );
      }
      return Object.keys(value).length > 0;
    }
    return true;
  });
}

const normalizeValue = (value: string) => value.toLowerCase().replace(/[^a-z0-9]/g, '');

/**
 * ResponseInterpreter
 * Turns raw model output into an answer or a validated, pruned query. Every
 * failure comes back as an InterpretError; this class never substitutes a
 * default query.
 */
export class ResponseInterpreter {
  private readonly registry: SchemaRegistry;
  private readonly validator: QueryValidator;

  constructor(registry: SchemaRegistry, validator: QueryValidator) {
    this.registry = registry;
    this.validator = validator;
  }

  interpret(rawOutput: string): InterpretResult {
    const payload = extractJsonObject(rawOutput);
    if (!payload) {
      return this.fail('malformed', 'model output is not a JSON object', rawOutput);
    }

    const answerValue = payload.answer;
    if (answerValue !== undefined && answerValue !== null && typeof answerValue !== 'string') {
      return this.fail('malformed', '"answer" must be a string', rawOutput);
    }
    const answer = typeof answerValue === 'string' ? answerValue.trim() : '';

    let rawQuery: unknown = payload.query;
    if (rawQuery === undefined && BARE_QUERY_KEYS.some((key) => key in payload)) {
      rawQuery = Object.fromEntries(Object.entries(payload).filter(([key]) => key !== 'answer'));
    }
    if (isJsonObject(rawQuery) && Object.keys(rawQuery).length === 1 && isJsonObject(rawQuery.query)) {
      // Request-body style: { "query": { "bool": ... } }
      rawQuery = rawQuery.query;
    }

    let query: Record<string, unknown> | undefined;
    if (isJsonObject(rawQuery)) {
      query = rawQuery;
    } else if (rawQuery !== undefined && rawQuery !== null) {
      return this.fail('malformed', '"query" must be an object', rawOutput);
    }

    if (query && hasQueryContent(query)) {
      const parsed = QueryParser.parse(query);
      if (!parsed.valid) {
        return this.fail('schema_violation', 'query does not follow the grammar', rawOutput, parsed.errors);
      }

      const validated = this.validator.validate(this.repair(parsed.value));
      if (!validated.valid) {
        return this.fail('schema_violation', 'query violates the schema', rawOutput, validated.errors);
      }

      return { ok: true, value: { kind: 'search', text: answer, query: validated.value } };
    }

    if (answer) {
      return { ok: true, value: { kind: 'answer', text: answer } };
    }

    return this.fail('empty', 'model output has neither an answer nor a query', rawOutput);
  }

  /**
   * Structural fixes for slips the model makes often: an exact-match suffix
   * on a field path, an enumeration value in the wrong case or punctuation,
   * and numbers sent as strings.
   */
  repair(candidate: QueryCandidate): QueryCandidate {
    const repairs: string[] = [];
    const clause: QueryCandidate['clause'] = {};

    for (const name of CLAUSE_NAMES) {
      const predicates = candidate.clause[name];
      if (predicates === undefined) {
        continue;
      }
      clause[name] = predicates === null ? null : predicates.map((predicate) => this.repairPredicate(predicate, repairs));
    }

    const repaired: QueryCandidate = { ...candidate, clause };

    if (candidate.sort) {
      repaired.sort = candidate.sort.map(
        (spec): SortSpec => ({ field: this.repairField(spec.field, repairs), order: spec.order })
      );
    }

    if (candidate.aggregations) {
      repaired.aggregations = Object.fromEntries(
        Object.entries(candidate.aggregations).map(([name, aggregation]): [string, Aggregation] => [
          name,
          { ...aggregation, field: this.repairField(aggregation.field, repairs) },
        ])
      );
    }

    if (repairs.length > 0) {
      debugLog('interpret', 'Repaired query candidate', { repairs });
    }

    return repaired;
  }

  private repairField(field: string, repairs: string[]): string {
    const suffix = this.registry.keywordSuffix;
    if (!suffix || !field.endsWith(suffix) || this.registry.resolve(field)) {
      return field;
    }

    const stripped = field.slice(0, -suffix.length);
    if (!this.registry.resolve(stripped)) {
      return field;
    }

    repairs.push(`${field} -> ${stripped}`);
    return stripped;
  }

  private repairPredicate(predicate: PredicateCandidate, repairs: string[]): PredicateCandidate {
    const field = this.repairField(predicate.field, repairs);
    const descriptor = this.registry.resolve(field);

    switch (predicate.kind) {
      case 'match':
        return { ...predicate, field };

      case 'term': {
        const values = descriptor?.kind === 'keyword' ? descriptor.values : undefined;
        if (!values || values.includes(predicate.value)) {
          return { ...predicate, field };
        }
        const wanted = normalizeValue(predicate.value);
        const matches = values.filter((value) => normalizeValue(value) === wanted);
        if (matches.length !== 1) {
          return { ...predicate, field };
        }
        repairs.push(`${field}: "${predicate.value}" -> "${matches[0]}"`);
        return { ...predicate, field, value: matches[0] };
      }

      case 'range': {
        if (!descriptor || !isNumericKind(descriptor.kind)) {
          return { ...predicate, field };
        }
        const bounds: RangeBoundsCandidate = {};
        for (const key of BOUND_KEYS) {
          const value = predicate.bounds[key];
          if (value === undefined) {
            continue;
          }
          if (typeof value === 'string' && NUMERIC_STRING_PATTERN.test(value.trim())) {
            repairs.push(`${field}.${key}: "${value}" -> number`);
            bounds[key] = Number(value.trim());
          } else {
            bounds[key] = value;
          }
        }
        return { kind: 'range', field, bounds };
      }
    }
  }

  private fail(
    kind: InterpretError['kind'],
    message: string,
    rawOutput: string,
    violations: string[] = []
  ): InterpretResult {
    debugLog('interpret', `Interpretation failed: ${message}`, { kind, violations });
    return { ok: false, error: new InterpretError(kind, message, rawOutput, violations) };
  }
}
