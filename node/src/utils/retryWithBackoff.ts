// Retry with exponential backoff and jitter
import { logger } from '@/services/logger';

export interface RetryOptions {
  maxRetries?: number;
  initialDelay?: number;
  maxDelay?: number;
  jitter?: boolean;
  exponentialBase?: number;
  /** Errors failing this are rethrown immediately. */
  shouldRetry?: (error: unknown) => boolean;
  label?: string;
}

/**
 * Retry function with exponential backoff and jitter
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxRetries = 3,
    initialDelay = 100,
    maxDelay = 5000,
    jitter = true,
    exponentialBase = 2,
    shouldRetry = () => true,
    label = 'operation',
  } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= maxRetries || !shouldRetry(error)) {
        throw error;
      }

      // Calculate delay with exponential backoff
      const exponentialDelay = initialDelay * Math.pow(exponentialBase, attempt);

      // Add jitter (random 0-25% of delay)
      const jitterAmount = jitter ? Math.random() * 0.25 * exponentialDelay : 0;
      const delay = Math.min(exponentialDelay + jitterAmount, maxDelay);

      logger.warn('retry:attempt', {
        label,
        attempt: attempt + 1,
        maxRetries,
        delayMs: Math.round(delay),
        error: error instanceof Error ? error.message : String(error),
      });
      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }
}
