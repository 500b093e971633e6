export type AttributeKind = 'keyword' | 'text' | 'numeric' | 'integer' | 'date' | 'nested-object';

export const ATTRIBUTE_KINDS: readonly AttributeKind[] = [
  'keyword',
  'text',
  'numeric',
  'integer',
  'date',
  'nested-object',
];

/**
 * One queryable attribute. `path` is the full dotted address used in queries
 * (`analyst_consensus_price_target.nr_analysts`), `name` its last segment.
 */
export interface AttributeDescriptor {
  readonly path: string;
  readonly name: string;
  readonly kind: AttributeKind;
  readonly description?: string;
  /** Declared enumeration; only keyword attributes carry one */
  readonly values?: readonly string[];
  /** Child attributes; only nested-object attributes carry them */
  readonly children?: readonly AttributeDescriptor[];
}

/** Raw shape of an attribute inside a schema definition file */
export interface AttributeDefinition {
  name: string;
  kind: AttributeKind;
  description?: string;
  values?: string[];
  children?: AttributeDefinition[];
}

export interface SchemaDefinition {
  version: string;
  /** Suffix appended to keyword paths for exact-match addressing, e.g. `.keyword` */
  keywordSuffix: string;
  attributes: AttributeDefinition[];
}

export function isRangeKind(kind: AttributeKind): boolean {
  return kind === 'numeric' || kind === 'integer' || kind === 'date';
}

export function isNumericKind(kind: AttributeKind): boolean {
  return kind === 'numeric' || kind === 'integer';
}
