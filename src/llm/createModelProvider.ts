import type { ProviderConfig } from '../config/provider.js';
import { AnthropicModelProvider } from './AnthropicModelProvider.js';
import type { ModelProvider } from './ModelProvider.js';
import { OpenAIModelProvider } from './OpenAIModelProvider.js';

export const GOOGLE_OPENAI_COMPATIBLE_URL = 'https://generativelanguage.googleapis.com/v1beta/openai/';

/** Pick the provider implementation named by the configuration */
export function createModelProvider(config: ProviderConfig): ModelProvider {
  switch (config.provider) {
    case 'openai':
      return new OpenAIModelProvider(config);
    case 'anthropic':
      return new AnthropicModelProvider(config);
    case 'google':
      // Gemini is served through its OpenAI-compatible endpoint
      return new OpenAIModelProvider(config, {
        baseURL: GOOGLE_OPENAI_COMPATIBLE_URL,
        name: 'google',
      });
  }
}
