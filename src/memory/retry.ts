import { ProviderUnavailableError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import type { RetryConfig } from '../config/index.js';

export const DEFAULT_RETRY: RetryConfig = {
  attempts: 3,
  baseDelayMs: 50,
  maxDelayMs: 1000,
};

/**
 * Run `fn`, retrying ProviderUnavailableError with exponential backoff.
 * Any other error is rethrown immediately.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: Partial<RetryConfig> = {},
  logger?: Logger
): Promise<T> {
  const { attempts, baseDelayMs, maxDelayMs } = { ...DEFAULT_RETRY, ...options };

  let attempt = 0;
  while (true) {
    try {
      return await fn();
    } catch (error) {
      attempt++;
      if (!(error instanceof ProviderUnavailableError) || attempt >= attempts) {
        throw error;
      }
      const delay = Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
      logger?.debug('provider unavailable, retrying', {
        attempt,
        delayMs: delay,
        error: error.message,
      });
      await sleep(delay);
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
