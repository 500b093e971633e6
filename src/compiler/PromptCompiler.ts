import type { PromptManager } from '../llm/PromptManager.js';
import type { SchemaRegistry } from '../schema/SchemaRegistry.js';
import type { AttributeDescriptor } from '../schema/types.js';
import { debugLog } from '../utils/logger.js';

export const QUERY_COMPILER_PROMPTS = [
  'query-compiler-base',
  'query-compiler-rules',
  'query-compiler-examples',
] as const;

export interface CompiledPrompt {
  /** Schema, rules, examples and output contract; identical for every call */
  context: string;
  /** The per-call user text */
  instruction: string;
}

export interface PromptCompilerOptions {
  maxPageSize: number;
}

/**
 * Render one attribute line. Nested attributes are indented under their parent
 * and always shown with their full path.
 */
export function renderAttribute(descriptor: AttributeDescriptor): string {
  const depth = descriptor.path.split('.').length - 1;
  const indent = '  '.repeat(depth);
  const kind = descriptor.kind === 'nested-object' ? 'object' : descriptor.kind;
  const values = descriptor.values ? `; allowed values: ${descriptor.values.join(', ')}` : '';
  const description = descriptor.description ? `: ${descriptor.description}` : '';
  return `${indent}- ${descriptor.path} (${kind}${values})${description}`;
}

/**
 * PromptCompiler
 * Builds what the model is given for one query. The context depends only on
 * the prompt files, the registry and the page size, so it is rendered once.
 */
export class PromptCompiler {
  private readonly prompts: PromptManager;
  private readonly registry: SchemaRegistry;
  private readonly maxPageSize: number;
  private context?: string;

  constructor(prompts: PromptManager, registry: SchemaRegistry, options: PromptCompilerOptions) {
    this.prompts = prompts;
    this.registry = registry;
    this.maxPageSize = options.maxPageSize;
  }

  build(nlQuery: string): CompiledPrompt {
    const context = this.getContext();
    const instruction = `Investment query: ${JSON.stringify(nlQuery.trim())}`;

    debugLog('prompt', 'Prompt built', {
      schemaVersion: this.registry.version,
      contextChars: context.length,
      instruction,
    });

    return { context, instruction };
  }

  /**
   * @throws Error if a prompt file is missing or leaves a placeholder unfilled
   */
  getContext(): string {
    if (this.context === undefined) {
      const attributes = Array.from(this.registry.describe().values(), renderAttribute).join('\n');
      this.context = this.prompts.composePrompt([...QUERY_COMPILER_PROMPTS], {
        attributes,
        schema_version: this.registry.version,
        max_page_size: String(this.maxPageSize),
      });
    }
    return this.context;
  }
}
