import { readFileSync } from 'fs';
import { ATTRIBUTE_KINDS, type AttributeDescriptor, type AttributeKind } from './types.js';

/**
 * Raised when a schema definition cannot be turned into a registry. Lists every
 * problem found, not only the first.
 */
export class SchemaDefinitionError extends Error {
  public readonly problems: string[];
  public readonly source?: string;

  constructor(problems: string[], source?: string) {
    const where = source ? ` (${source})` : '';
    super(`Invalid schema definition${where}: ${problems.join('; ')}`);
    this.name = 'SchemaDefinitionError';
    this.problems = problems;
    this.source = source;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SchemaDefinitionError);
    }
  }
}

const ATTRIBUTE_NAME_PATTERN = /^[A-Za-z0-9_]+$/;
const DEFAULT_KEYWORD_SUFFIX = '.keyword';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isAttributeKind = (value: unknown): value is AttributeKind =>
  typeof value === 'string' && (ATTRIBUTE_KINDS as readonly string[]).includes(value);

/**
 * SchemaRegistry
 * The fixed, versioned set of queryable stock attributes. Built once at startup
 * and never mutated; every other component reads it.
 */
export class SchemaRegistry {
  readonly version: string;
  readonly keywordSuffix: string;
  private readonly attributes: readonly AttributeDescriptor[];
  private readonly fields: ReadonlyMap<string, AttributeDescriptor>;

  private constructor(
    version: string,
    keywordSuffix: string,
    attributes: readonly AttributeDescriptor[],
    fields: Map<string, AttributeDescriptor>
  ) {
    this.version = version;
    this.keywordSuffix = keywordSuffix;
    this.attributes = attributes;
    this.fields = fields;
  }

  /**
   * Load and validate a definition file.
   * @throws SchemaDefinitionError if the file is unreadable or the definition malformed
   */
  static load(filePath: string): SchemaRegistry {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(filePath, 'utf-8'));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new SchemaDefinitionError([`cannot read definition: ${reason}`], filePath);
    }
    return SchemaRegistry.fromDefinition(raw, filePath);
  }

  /**
   * Build a registry from an already-parsed definition.
   * @throws SchemaDefinitionError on duplicate paths, unknown kinds, empty enumerations
   *   and misplaced enumerations or children
   */
  static fromDefinition(raw: unknown, source?: string): SchemaRegistry {
    const problems: string[] = [];

    if (!isRecord(raw)) {
      throw new SchemaDefinitionError(['definition must be a JSON object'], source);
    }

    const version = typeof raw.version === 'string' ? raw.version.trim() : '';
    if (!version) {
      problems.push('"version" must be a non-empty string');
    }

    let keywordSuffix = DEFAULT_KEYWORD_SUFFIX;
    if (raw.keywordSuffix !== undefined) {
      if (typeof raw.keywordSuffix !== 'string') {
        problems.push('"keywordSuffix" must be a string');
      } else {
        keywordSuffix = raw.keywordSuffix;
      }
    }

    const fields = new Map<string, AttributeDescriptor>();
    let attributes: AttributeDescriptor[] = [];

    if (!Array.isArray(raw.attributes) || raw.attributes.length === 0) {
      problems.push('"attributes" must be a non-empty array');
    } else {
      attributes = buildAttributes(raw.attributes, undefined, fields, problems);
    }

    if (problems.length > 0) {
      throw new SchemaDefinitionError(problems, source);
    }

    return new SchemaRegistry(version, keywordSuffix, Object.freeze(attributes), fields);
  }

  /**
   * Ordered mapping of every field path (parents before their children, in
   * definition order) to its descriptor.
   */
  describe(): ReadonlyMap<string, AttributeDescriptor> {
    return this.fields;
  }

  /** Top-level attributes in definition order */
  topLevel(): readonly AttributeDescriptor[] {
    return this.attributes;
  }

  resolve(path: string): AttributeDescriptor | undefined {
    return this.fields.get(path);
  }

  /** Index-side address of an attribute: keyword paths get the exact-match suffix */
  indexField(descriptor: AttributeDescriptor): string {
    return descriptor.kind === 'keyword' ? `${descriptor.path}${this.keywordSuffix}` : descriptor.path;
  }
}

function buildAttributes(
  entries: unknown[],
  parentPath: string | undefined,
  fields: Map<string, AttributeDescriptor>,
  problems: string[]
): AttributeDescriptor[] {
  const built: AttributeDescriptor[] = [];

  entries.forEach((entry, index) => {
    const location = parentPath ? `${parentPath}.children[${index}]` : `attributes[${index}]`;

    if (!isRecord(entry)) {
      problems.push(`${location}: attribute must be an object`);
      return;
    }

    const name = typeof entry.name === 'string' ? entry.name : '';
    if (!ATTRIBUTE_NAME_PATTERN.test(name)) {
      problems.push(`${location}: "name" must match ${ATTRIBUTE_NAME_PATTERN.source}`);
      return;
    }

    const path = parentPath ? `${parentPath}.${name}` : name;

    if (!isAttributeKind(entry.kind)) {
      problems.push(`${path}: unknown kind "${String(entry.kind)}"`);
      return;
    }
    const kind = entry.kind;

    if (fields.has(path)) {
      problems.push(`${path}: duplicate field path`);
      return;
    }

    const description =
      typeof entry.description === 'string' && entry.description.trim()
        ? entry.description.trim()
        : undefined;

    let values: readonly string[] | undefined;
    if (entry.values !== undefined) {
      values = readEnumeration(path, kind, entry.values, problems);
    }

    // Reserve the slot so the parent precedes its children in describe() order
    fields.set(path, { path, name, kind });

    let children: readonly AttributeDescriptor[] | undefined;
    if (kind === 'nested-object') {
      if (!Array.isArray(entry.children) || entry.children.length === 0) {
        problems.push(`${path}: nested-object attribute needs a non-empty "children" array`);
      } else {
        children = Object.freeze(buildAttributes(entry.children, path, fields, problems));
      }
    } else if (entry.children !== undefined) {
      problems.push(`${path}: only nested-object attributes may declare children`);
    }

    const descriptor: AttributeDescriptor = Object.freeze({
      path,
      name,
      kind,
      ...(description ? { description } : {}),
      ...(values ? { values } : {}),
      ...(children ? { children } : {}),
    });
    fields.set(path, descriptor);
    built.push(descriptor);
  });

  return built;
}

function readEnumeration(
  path: string,
  kind: AttributeKind,
  raw: unknown,
  problems: string[]
): readonly string[] | undefined {
  if (kind !== 'keyword') {
    problems.push(`${path}: only keyword attributes may declare "values"`);
    return undefined;
  }

  if (!Array.isArray(raw) || raw.length === 0) {
    problems.push(`${path}: enumeration must be a non-empty array`);
    return undefined;
  }

  const values: string[] = [];
  for (const value of raw) {
    if (typeof value !== 'string' || value.trim() === '') {
      problems.push(`${path}: enumeration values must be non-empty strings`);
      return undefined;
    }
    if (values.includes(value)) {
      problems.push(`${path}: duplicate enumeration value "${value}"`);
      return undefined;
    }
    values.push(value);
  }

  return Object.freeze(values);
}
