/**
 * A language-model backend. The compiler only ever sees this capability:
 * system context and user instruction in, raw text out.
 */
export interface ModelProvider {
  readonly name: string;
  readonly model: string;
  /**
   * @throws ProviderError on transport, authentication, quota or timeout failures
   */
  invoke(systemContext: string, userInstruction: string): Promise<string>;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/**
 * Failure talking to a model provider. Provider-specific codes stay in `cause`;
 * callers treat every ProviderError the same way.
 */
export class ProviderError extends Error {
  public readonly provider: string;
  public readonly cause?: unknown;

  constructor(provider: string, message: string, cause?: unknown) {
    super(`${provider} request failed: ${message}`, cause !== undefined ? { cause } : undefined);
    this.name = 'ProviderError';
    this.provider = provider;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ProviderError);
    }
  }
}
