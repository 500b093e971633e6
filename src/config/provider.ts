import { toNumber } from './debug.js';

export type ProviderName = 'openai' | 'anthropic' | 'google';

export interface ProviderConfig {
  provider: ProviderName;
  model: string;
  apiKey: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}

export const PROVIDER_NAMES: readonly ProviderName[] = ['openai', 'anthropic', 'google'];

export const DEFAULT_MODELS: Record<ProviderName, string> = {
  openai: 'gpt-4o-mini',
  anthropic: 'claude-3-haiku-20240307',
  google: 'gemini-2.5-flash-lite',
};

export const API_KEY_VARIABLES: Record<ProviderName, string> = {
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  google: 'GOOGLE_API_KEY',
};

export function isProviderName(value: string): value is ProviderName {
  return (PROVIDER_NAMES as readonly string[]).includes(value);
}

export function loadProviderConfig(env: NodeJS.ProcessEnv = process.env): ProviderConfig {
  const requested = env.LLM_PROVIDER?.trim().toLowerCase() || 'openai';
  if (!isProviderName(requested)) {
    throw new Error(
      `Unsupported LLM_PROVIDER "${requested}". Must be one of: ${PROVIDER_NAMES.join(', ')}`
    );
  }
  const provider = requested;

  const keyVariable = API_KEY_VARIABLES[provider];
  const apiKey = env[keyVariable]?.trim();
  if (!apiKey) {
    throw new Error(
      `API key not found for provider "${provider}". Set the ${keyVariable} environment variable.`
    );
  }

  const model = env[`${provider.toUpperCase()}_MODEL`]?.trim() || DEFAULT_MODELS[provider];
  const temperature = Math.max(0, Math.min(1, toNumber(env.LLM_TEMPERATURE, 0)));
  const maxTokens = Math.max(1, Math.floor(toNumber(env.LLM_MAX_TOKENS, 1024)));
  const timeoutMs = Math.max(1, Math.floor(toNumber(env.LLM_TIMEOUT_MS, 30_000)));

  return {
    provider,
    model,
    apiKey,
    temperature,
    maxTokens,
    timeoutMs,
  };
}
