import type { SchemaRegistry } from '../schema/SchemaRegistry.js';
import { isNumericKind, isRangeKind, type AttributeDescriptor } from '../schema/types.js';
import { debugLog } from '../utils/logger.js';
import { pruneQuery } from './pruneQuery.js';
import {
  BOUND_KEYS,
  CLAUSE_NAMES,
  type Aggregation,
  type BoundKey,
  type GrammarResult,
  type PredicateCandidate,
  type QueryCandidate,
  type RangeBoundsCandidate,
  type RangeValue,
  type StructuredQuery,
} from './types.js';

export interface QueryValidatorOptions {
  /** Largest accepted `limit` */
  maxPageSize: number;
}

const AGGREGATION_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;
const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;
const DATE_MATH_PATTERN = /^now(?:[+-]\d+[yMwdhHms])*(?:\/[yMwdhHms])?$/;

export function isDateValue(value: RangeValue): boolean {
  if (typeof value === 'number') {
    return Number.isInteger(value);
  }
  if (DATE_MATH_PATTERN.test(value)) {
    return true;
  }
  return ISO_DATE_PATTERN.test(value) && !Number.isNaN(Date.parse(value));
}

interface NumericBound {
  key: BoundKey;
  value: number;
}

/**
 * The tighter of an exclusive and an inclusive bound on the same side; the
 * exclusive one wins a tie.
 */
function tightestBound(
  bounds: RangeBoundsCandidate,
  exclusiveKey: BoundKey,
  inclusiveKey: BoundKey,
  isTighter: (a: number, b: number) => boolean
): NumericBound | undefined {
  const exclusive = bounds[exclusiveKey];
  const inclusive = bounds[inclusiveKey];
  if (typeof exclusive === 'number' && (typeof inclusive !== 'number' || !isTighter(inclusive, exclusive))) {
    return { key: exclusiveKey, value: exclusive };
  }
  if (typeof inclusive === 'number') {
    return { key: inclusiveKey, value: inclusive };
  }
  return undefined;
}

/**
 * QueryValidator
 * Checks a parsed candidate against the Schema Registry: every field must
 * exist and fit its predicate, bounds must be well-formed and the query must
 * ask for something. A valid candidate comes back pruned.
 */
export class QueryValidator {
  private readonly registry: SchemaRegistry;
  private readonly maxPageSize: number;

  constructor(registry: SchemaRegistry, options: QueryValidatorOptions) {
    this.registry = registry;
    this.maxPageSize = options.maxPageSize;
  }

  validate(candidate: QueryCandidate): GrammarResult<StructuredQuery> {
    const errors: string[] = [];
    let predicateCount = 0;

    for (const name of CLAUSE_NAMES) {
      const predicates = candidate.clause[name];
      if (predicates == null) {
        continue;
      }
      predicates.forEach((predicate, index) => {
        predicateCount += 1;
        this.checkPredicate(predicate, `clause.${name}[${index}]`, errors);
      });
    }

    const sort = candidate.sort ?? [];
    sort.forEach((spec, index) => {
      const descriptor = this.resolveField(spec.field, `sort[${index}]`, errors);
      if (descriptor && descriptor.kind === 'text') {
        errors.push(`sort[${index}]: cannot sort on text field "${spec.field}"`);
      }
    });

    if (candidate.offset != null && (!Number.isInteger(candidate.offset) || candidate.offset < 0)) {
      errors.push('offset: must be a non-negative integer');
    }

    if (
      candidate.limit != null &&
      (!Number.isInteger(candidate.limit) || candidate.limit < 1 || candidate.limit > this.maxPageSize)
    ) {
      errors.push(`limit: must be an integer between 1 and ${this.maxPageSize}`);
    }

    const aggregations = Object.entries(candidate.aggregations ?? {});
    for (const [name, aggregation] of aggregations) {
      this.checkAggregation(name, aggregation, errors);
    }

    if (predicateCount === 0 && sort.length === 0 && aggregations.length === 0) {
      errors.push('query: empty query; add at least one predicate, sort or aggregation');
    }

    if (errors.length > 0) {
      debugLog('validation', 'Query candidate rejected', { errors });
      return { valid: false, errors };
    }

    return { valid: true, value: pruneQuery(candidate) };
  }

  private resolveField(
    field: string,
    path: string,
    errors: string[]
  ): AttributeDescriptor | undefined {
    const descriptor = this.registry.resolve(field);
    if (!descriptor) {
      errors.push(`${path}: unknown field "${field}"`);
      return undefined;
    }
    if (descriptor.kind === 'nested-object') {
      const children = (descriptor.children ?? []).map((child) => child.path).join(', ');
      errors.push(`${path}: "${field}" is an object; use one of its fields: ${children}`);
      return undefined;
    }
    return descriptor;
  }

  private checkPredicate(predicate: PredicateCandidate, path: string, errors: string[]): void {
    const descriptor = this.resolveField(predicate.field, path, errors);
    if (!descriptor) {
      return;
    }

    switch (predicate.kind) {
      case 'match':
        if (descriptor.kind !== 'text') {
          errors.push(
            `${path}: match is only allowed on text fields; "${descriptor.path}" is ${descriptor.kind}`
          );
        }
        return;

      case 'term':
        if (descriptor.kind !== 'keyword') {
          errors.push(
            `${path}: term is only allowed on keyword fields; "${descriptor.path}" is ${descriptor.kind}`
          );
          return;
        }
        if (descriptor.values && !descriptor.values.includes(predicate.value)) {
          errors.push(
            `${path}: "${predicate.value}" is not an allowed value for "${descriptor.path}". Must be one of: ${descriptor.values.join(', ')}`
          );
        }
        return;

      case 'range':
        if (!isRangeKind(descriptor.kind)) {
          errors.push(
            `${path}: range is only allowed on numeric, integer or date fields; "${descriptor.path}" is ${descriptor.kind}`
          );
          return;
        }
        this.checkBounds(descriptor, predicate.bounds, path, errors);
        return;
    }
  }

  private checkBounds(
    descriptor: AttributeDescriptor,
    bounds: RangeBoundsCandidate,
    path: string,
    errors: string[]
  ): void {
    const present = BOUND_KEYS.filter((key) => bounds[key] != null);
    if (present.length === 0) {
      errors.push(`${path}: range on "${descriptor.path}" needs at least one of ${BOUND_KEYS.join(', ')}`);
      return;
    }

    let wellTyped = true;
    for (const key of present) {
      const value = bounds[key];
      if (value == null) {
        continue;
      }
      if (isNumericKind(descriptor.kind) && typeof value !== 'number') {
        errors.push(`${path}: bound "${key}" on "${descriptor.path}" must be a number`);
        wellTyped = false;
      } else if (descriptor.kind === 'date' && !isDateValue(value)) {
        errors.push(
          `${path}: bound "${key}" on "${descriptor.path}" must be an ISO-8601 date, date math such as now-1y, or epoch milliseconds`
        );
        wellTyped = false;
      }
    }

    if (!wellTyped || !isNumericKind(descriptor.kind)) {
      return;
    }

    const lower = tightestBound(bounds, 'gt', 'gte', (a, b) => a > b);
    const upper = tightestBound(bounds, 'lt', 'lte', (a, b) => a < b);
    if (!lower || !upper) {
      return;
    }
    if (lower.value > upper.value) {
      errors.push(
        `${path}: range on "${descriptor.path}" is empty (lower bound ${lower.value} > upper bound ${upper.value})`
      );
    } else if (lower.value === upper.value && (lower.key === 'gt' || upper.key === 'lt')) {
      errors.push(
        `${path}: range on "${descriptor.path}" is empty (${lower.key} ${lower.value} and ${upper.key} ${upper.value} exclude each other)`
      );
    }
  }

  private checkAggregation(name: string, aggregation: Aggregation, errors: string[]): void {
    const path = `aggregations.${name}`;

    if (!AGGREGATION_NAME_PATTERN.test(name)) {
      errors.push(`${path}: name must match ${AGGREGATION_NAME_PATTERN.source}`);
    }

    const descriptor = this.resolveField(aggregation.field, path, errors);
    if (!descriptor) {
      return;
    }

    switch (aggregation.type) {
      case 'terms':
        if (descriptor.kind !== 'keyword') {
          errors.push(`${path}: terms is only allowed on keyword fields; "${descriptor.path}" is ${descriptor.kind}`);
        }
        if (aggregation.size !== undefined && (aggregation.size < 1 || aggregation.size > this.maxPageSize)) {
          errors.push(`${path}: terms size must be between 1 and ${this.maxPageSize}`);
        }
        return;
      case 'avg':
      case 'sum':
        if (!isNumericKind(descriptor.kind)) {
          errors.push(`${path}: ${aggregation.type} needs a numeric field; "${descriptor.path}" is ${descriptor.kind}`);
        }
        return;
      case 'min':
      case 'max':
        if (!isRangeKind(descriptor.kind)) {
          errors.push(`${path}: ${aggregation.type} needs a numeric or date field; "${descriptor.path}" is ${descriptor.kind}`);
        }
        return;
    }
  }
}
