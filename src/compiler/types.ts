import type { StructuredQuery } from '../query/types.js';

/** The model chose to answer instead of searching */
export interface AnswerResult {
  kind: 'answer';
  text: string;
}

/** An explanation (possibly empty) plus the query to run */
export interface SearchResult {
  kind: 'search';
  text: string;
  query: StructuredQuery;
}

export type TransformResult = AnswerResult | SearchResult;

export type InterpretFailureKind = 'malformed' | 'schema_violation' | 'empty';

export type CompilerFailureKind = 'empty_input' | 'provider_failure' | InterpretFailureKind;

export interface CompilerFailure {
  kind: CompilerFailureKind;
  message: string;
  /** Grammar violations, for `schema_violation` */
  violations?: string[];
  /** What the model returned, when it returned anything */
  rawOutput?: string;
}

/** Milliseconds spent in each phase of one transform call */
export interface TransformTimings {
  promptMs: number;
  modelMs: number;
  interpretMs: number;
  totalMs: number;
}

export interface TransformOutcome {
  result: TransformResult;
  /** Set when `result` is the empty-input answer or the match-all fallback */
  failure?: CompilerFailure;
  timings: TransformTimings;
}
