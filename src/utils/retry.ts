import { logger } from './logger';
import { RateLimitError, isArchiveError } from './errors';

export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  jitterFactor: number;  // 0-1, adds randomness to delay
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 10000,
  backoffMultiplier: 2,
  jitterFactor: 0.2,
};

export interface RetryResult<T> {
  success: boolean;
  data?: T;
  error?: Error;
  attempts: number;
  totalDelayMs: number;
}

export function calculateDelay(attempt: number, policy: RetryPolicy, error?: Error): number {
  if (error instanceof RateLimitError && error.retryAfter) {
    return Math.min(error.retryAfter, policy.maxDelayMs);
  }

  // Exponential backoff
  let delay = policy.initialDelayMs * Math.pow(policy.backoffMultiplier, attempt - 1);
  delay = Math.min(delay, policy.maxDelayMs);

  if (policy.jitterFactor > 0) {
    const jitter = delay * policy.jitterFactor * (Math.random() * 2 - 1);
    delay = Math.max(0, delay + jitter);
  }

  return Math.floor(delay);
}

function isRetryable(error: unknown): boolean {
  return isArchiveError(error) && error.isRetryable;
}

/**
 * Run `operation` until it succeeds, throws a non-retryable error, or the
 * policy's attempts are used up. Never throws; the outcome is in the result.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  operationName: string,
  customPolicy?: Partial<RetryPolicy>
): Promise<RetryResult<T>> {
  const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...customPolicy };
  const maxAttempts = Math.max(1, policy.maxAttempts);
  let lastError: Error | undefined;
  let totalDelayMs = 0;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const data = await operation(attempt);
      return {
        success: true,
        data,
        attempts: attempt,
        totalDelayMs,
      };
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      const retryable = isRetryable(error);

      if (attempt === maxAttempts || !retryable) {
        logger.debug('Retry', `${operationName} gave up after ${attempt} attempts`, {
          error: lastError.message,
          attempts: attempt,
          retryable,
        });

        return {
          success: false,
          error: lastError,
          attempts: attempt,
          totalDelayMs,
        };
      }

      const delay = calculateDelay(attempt, policy, lastError);
      totalDelayMs += delay;

      logger.warn('Retry', `${operationName} attempt ${attempt} failed, retrying in ${delay}ms`, {
        error: lastError.message,
        nextAttempt: attempt + 1,
        maxAttempts,
      });

      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }

  return {
    success: false,
    error: lastError,
    attempts: maxAttempts,
    totalDelayMs,
  };
}
