import OpenAI from 'openai';
import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import type { ProviderConfig } from '../config/provider.js';
import { getLoggerConfig, logger, debugLog } from '../utils/logger.js';
import { ProviderError, type ModelProvider, type TokenUsage } from './ModelProvider.js';

export interface OpenAIModelProviderOptions {
  /** OpenAI-compatible endpoint; unset for api.openai.com */
  baseURL?: string;
  /** Name reported in logs and errors */
  name?: string;
}

/**
 * OpenAIModelProvider
 * Chat completions in JSON mode. The SDK's own retries are switched off: one
 * call to `invoke` is one request.
 */
export class OpenAIModelProvider implements ModelProvider {
  readonly name: string;
  readonly model: string;
  private readonly openai: OpenAI;
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(config: ProviderConfig, options: OpenAIModelProviderOptions = {}) {
    this.name = options.name ?? 'openai';
    this.model = config.model;
    this.temperature = config.temperature;
    this.maxTokens = config.maxTokens;
    this.openai = new OpenAI({
      apiKey: config.apiKey,
      timeout: config.timeoutMs,
      maxRetries: 0,
      ...(options.baseURL ? { baseURL: options.baseURL } : {}),
    });
  }

  async invoke(systemContext: string, userInstruction: string): Promise<string> {
    const params: ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      messages: [
        { role: 'system', content: systemContext },
        { role: 'user', content: userInstruction },
      ],
      response_format: { type: 'json_object' },
    };

    // gpt-5 and o-series models take max_completion_tokens and only their default temperature
    if (this.model.startsWith('gpt-5') || /^o\d/.test(this.model)) {
      params.max_completion_tokens = this.maxTokens;
    } else {
      params.max_tokens = this.maxTokens;
      params.temperature = this.temperature;
    }

    debugLog('provider', 'Sending chat completion', {
      provider: this.name,
      model: this.model,
      instructionChars: userInstruction.length,
    });

    try {
      const startTime = Date.now();
      const response = await this.openai.chat.completions.create(params);
      const latencyMs = Date.now() - startTime;

      const choice = response.choices[0];
      if (!choice) {
        throw new ProviderError(this.name, 'response contained no choices');
      }

      if (getLoggerConfig().enableTokenTracking && response.usage) {
        const usage: TokenUsage = {
          promptTokens: response.usage.prompt_tokens,
          completionTokens: response.usage.completion_tokens,
          totalTokens: response.usage.total_tokens,
        };
        logger.metric('llm.usage', {
          provider: this.name,
          model: this.model,
          latencyMs,
          finishReason: choice.finish_reason,
          ...usage,
        });
      }

      return choice.message.content ?? '';
    } catch (error) {
      if (error instanceof ProviderError) {
        throw error;
      }
      throw new ProviderError(
        this.name,
        error instanceof Error ? error.message : String(error),
        error
      );
    }
  }
}
