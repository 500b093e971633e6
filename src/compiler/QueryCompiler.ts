import type { CompilerConfig } from '../config/compiler.js';
import type { ModelProvider } from '../llm/ModelProvider.js';
import type { PromptManager } from '../llm/PromptManager.js';
import { QueryValidator } from '../query/QueryValidator.js';
import type { SchemaRegistry } from '../schema/SchemaRegistry.js';
import { debugLog, getLoggerConfig, logger } from '../utils/logger.js';
import { PromptCompiler } from './PromptCompiler.js';
import { ResponseInterpreter } from './ResponseInterpreter.js';
import type { CompilerFailure, SearchResult, TransformOutcome, TransformResult } from './types.js';

export const EMPTY_INPUT_ANSWER = 'A query is required.';

/** The result used whenever compilation fails: an unexplained match-everything search */
export function matchAllFallback(): SearchResult {
  return { kind: 'search', text: '', query: { clause: {} } };
}

export interface QueryCompilerDependencies {
  registry: SchemaRegistry;
  prompts: PromptManager;
  provider: ModelProvider;
  config: Pick<CompilerConfig, 'maxPageSize'>;
}

/**
 * QueryCompiler
 *
 * The one entry point for turning investment text into a TransformResult:
 * build the prompt, call the model once, interpret the reply. `transform`
 * never rejects. Empty input is answered without a model call; every other
 * failure is logged and replaced with {@link matchAllFallback}.
 *
 * Holds no per-call state, so concurrent calls are safe.
 */
export class QueryCompiler {
  private readonly provider: ModelProvider;
  private readonly promptCompiler: PromptCompiler;
  private readonly interpreter: ResponseInterpreter;

  /**
   * @throws Error if a prompt file is missing or incomplete; the prompt context
   *   is rendered here so a broken install fails at startup
   */
  constructor(dependencies: QueryCompilerDependencies) {
    const { registry, prompts, provider, config } = dependencies;
    this.provider = provider;
    this.promptCompiler = new PromptCompiler(prompts, registry, { maxPageSize: config.maxPageSize });
    this.interpreter = new ResponseInterpreter(
      registry,
      new QueryValidator(registry, { maxPageSize: config.maxPageSize })
    );
    this.promptCompiler.getContext();
  }

  async transform(nlQuery: string): Promise<TransformResult> {
    const outcome = await this.transformWithDiagnostics(nlQuery);
    return outcome.result;
  }

  /**
   * Same as {@link transform}, plus the failure that forced a fallback (if any)
   * and per-phase timings.
   */
  async transformWithDiagnostics(nlQuery: string): Promise<TransformOutcome> {
    const startTime = Date.now();
    const timings = { promptMs: 0, modelMs: 0, interpretMs: 0, totalMs: 0 };
    const text = nlQuery.trim();

    const finish = (result: TransformResult, failure?: CompilerFailure): TransformOutcome => {
      timings.totalMs = Date.now() - startTime;
      if (failure && failure.kind !== 'empty_input') {
        logger.warn('Query compilation failed, falling back to match-all search', {
          input: text,
          failure: failure.kind,
          reason: failure.message,
          violations: failure.violations,
          rawOutput: failure.rawOutput,
        });
      }
      if (getLoggerConfig().enableRequestTiming) {
        logger.metric('compiler.transform', {
          provider: this.provider.name,
          model: this.provider.model,
          outcome: result.kind,
          failure: failure?.kind,
          ...timings,
        });
      }
      return failure ? { result, failure, timings } : { result, timings };
    };

    if (!text) {
      debugLog('interpret', 'Rejected empty query text');
      return finish(
        { kind: 'answer', text: EMPTY_INPUT_ANSWER },
        { kind: 'empty_input', message: 'query text is empty' }
      );
    }

    let phaseStart = Date.now();
    const prompt = this.promptCompiler.build(text);
    timings.promptMs = Date.now() - phaseStart;

    let rawOutput: string;
    phaseStart = Date.now();
    try {
      rawOutput = await this.provider.invoke(prompt.context, prompt.instruction);
    } catch (error) {
      timings.modelMs = Date.now() - phaseStart;
      return finish(matchAllFallback(), {
        kind: 'provider_failure',
        message: error instanceof Error ? error.message : String(error),
      });
    }
    timings.modelMs = Date.now() - phaseStart;

    debugLog('provider', 'Model replied', { provider: this.provider.name, rawOutput });

    phaseStart = Date.now();
    const interpreted = this.interpreter.interpret(rawOutput);
    timings.interpretMs = Date.now() - phaseStart;

    if (!interpreted.ok) {
      const { error } = interpreted;
      return finish(matchAllFallback(), {
        kind: error.kind,
        message: error.message,
        violations: error.violations.length > 0 ? error.violations : undefined,
        rawOutput,
      });
    }

    return finish(interpreted.value);
  }
}
