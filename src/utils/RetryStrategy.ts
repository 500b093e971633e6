import { logger } from './logger.js';

export interface RetryOptions {
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  /** Decides whether a failure is transient; defaults to matching common network error messages */
  isRetryable?: (error: unknown) => boolean;
  /** Name used in the warning logged before each retry */
  operation?: string;
}

const RETRYABLE_SNIPPETS = [
  'timeout',
  'econnrefused',
  'etimedout',
  'econnreset',
  'rate limit',
  '429',
  '502',
  '503',
  '504',
  'service unavailable',
];

export function isRetryableMessage(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  const message = error.message.toLowerCase();
  return RETRYABLE_SNIPPETS.some((snippet) => message.includes(snippet));
}

export async function executeWithRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const maxRetries = options.maxRetries ?? 3;
  const initialDelayMs = options.initialDelayMs ?? 100;
  const maxDelayMs = options.maxDelayMs ?? 5000;
  const backoffMultiplier = options.backoffMultiplier ?? 2;
  const isRetryable = options.isRetryable ?? isRetryableMessage;

  let delay = initialDelayMs;
  let attempt = 0;

  while (true) {
    try {
      return await fn();
    } catch (error) {
      attempt += 1;
      if (attempt > maxRetries || !isRetryable(error)) {
        throw error instanceof Error ? error : new Error(String(error));
      }

      logger.warn(`${options.operation ?? 'operation'} failed, retrying`, {
        attempt,
        maxRetries,
        delayMs: delay,
        error: error instanceof Error ? error.message : String(error),
      });
      await new Promise((resolve) => setTimeout(resolve, delay));
      delay = Math.min(delay * backoffMultiplier, maxDelayMs);
    }
  }
}
