import type { InterpretFailureKind } from './types.js';

/**
 * Model output that could not be turned into a TransformResult.
 *
 * - `malformed`: not a JSON object of the expected shape
 * - `schema_violation`: parseable, but the query breaks the grammar or the schema
 * - `empty`: neither an answer nor a query
 */
export class InterpretError extends Error {
  public readonly kind: InterpretFailureKind;
  public readonly violations: string[];
  public readonly rawOutput: string;

  constructor(kind: InterpretFailureKind, message: string, rawOutput: string, violations: string[] = []) {
    super(message);
    this.name = 'InterpretError';
    this.kind = kind;
    this.violations = violations;
    this.rawOutput = rawOutput;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InterpretError);
    }
  }
}
