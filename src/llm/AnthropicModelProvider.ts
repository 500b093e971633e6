import Anthropic from '@anthropic-ai/sdk';
import type { ProviderConfig } from '../config/provider.js';
import { getLoggerConfig, logger, debugLog } from '../utils/logger.js';
import { ProviderError, type ModelProvider } from './ModelProvider.js';

/**
 * AnthropicModelProvider
 * Messages API; the text blocks of the reply are concatenated. Anthropic has no
 * JSON mode, so the output contract in the system context carries that rule.
 */
export class AnthropicModelProvider implements ModelProvider {
  readonly name = 'anthropic';
  readonly model: string;
  private readonly client: Anthropic;
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(config: ProviderConfig) {
    this.model = config.model;
    this.temperature = config.temperature;
    this.maxTokens = config.maxTokens;
    this.client = new Anthropic({
      apiKey: config.apiKey,
      timeout: config.timeoutMs,
      maxRetries: 0,
    });
  }

  async invoke(systemContext: string, userInstruction: string): Promise<string> {
    debugLog('provider', 'Sending message', {
      provider: this.name,
      model: this.model,
      instructionChars: userInstruction.length,
    });

    try {
      const startTime = Date.now();
      const response = await this.client.messages.create({
        model: this.model,
        max_tokens: this.maxTokens,
        temperature: this.temperature,
        system: systemContext,
        messages: [{ role: 'user', content: userInstruction }],
      });
      const latencyMs = Date.now() - startTime;

      if (getLoggerConfig().enableTokenTracking) {
        logger.metric('llm.usage', {
          provider: this.name,
          model: this.model,
          latencyMs,
          finishReason: response.stop_reason,
          promptTokens: response.usage.input_tokens,
          completionTokens: response.usage.output_tokens,
          totalTokens: response.usage.input_tokens + response.usage.output_tokens,
        });
      }

      return response.content
        .filter((block): block is Anthropic.TextBlock => block.type === 'text')
        .map((block) => block.text)
        .join('');
    } catch (error) {
      throw new ProviderError(
        this.name,
        error instanceof Error ? error.message : String(error),
        error
      );
    }
  }
}
