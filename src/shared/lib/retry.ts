// src/shared/lib/retry.ts
import { Logger } from '@nestjs/common';

export interface RetryOptions {
  /** Retries after the first attempt. */
  maxRetries?: number;
  initialDelay?: number;
  maxDelay?: number;
  jitter?: boolean;
  exponentialBase?: number;
  /** Return false to stop retrying on errors that will not go away. */
  shouldRetry?: (error: unknown) => boolean;
  label?: string;
}

const logger = new Logger('Retry');

/**
 * Retry function with exponential backoff and jitter
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const {
    maxRetries = 2,
    initialDelay = 500,
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

      const exponentialDelay = initialDelay * Math.pow(exponentialBase, attempt);
      const jitterAmount = jitter ? Math.random() * 0.25 * exponentialDelay : 0;
      const delay = Math.min(exponentialDelay + jitterAmount, maxDelay);

      logger.warn(`⚠️ ${label}: retry ${attempt + 1}/${maxRetries} after ${delay.toFixed(0)}ms`);
      await sleep(delay);
    }
  }
}

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}
