import type { RetryConfig } from './types';

export type RetryResult<T> =
  | { success: true; value: T; attempts: number }
  | { success: false; error: Error; attempts: number };
import { HttpError } from '../errors';

export function isRetryableError(error: Error): boolean {
  if (['ValidationError', 'NoTablesFoundError', 'CircuitOpenError'].includes(error.name)) {
    return false;
  }

  if (error instanceof HttpError) {
    // 429 and 5xx are transient, other 4xx are not
    return error.statusCode === 429 || error.statusCode >= 500;
  }

  // Network failures, timeouts and anything unrecognised get another attempt
  return true;
}

export function backoffDelay(attempt: number, config: RetryConfig): number {
  const exponential = config.initialDelayMs * Math.pow(config.backoffMultiplier, attempt - 1);
  return Math.min(exponential, config.maxDelayMs);
}

export async function retryWithBackoff<T>(fn: () => Promise<T>, config: RetryConfig): Promise<RetryResult<T>> {
  let attempts = 0;

  for (;;) {
    attempts++;

    try {
      const value = await fn();
      return { success: true, value, attempts };
    } catch (error) {
      const lastError = error instanceof Error ? error : new Error(String(error));

      if (!isRetryableError(lastError) || attempts > config.maxRetries) {
        return { success: false, error: lastError, attempts };
      }

      await new Promise((resolve) => setTimeout(resolve, backoffDelay(attempts, config)));
    }
  }
}
