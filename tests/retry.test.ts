import { describe, it, expect, vi } from 'vitest';
import { withRetry, calculateDelay, DEFAULT_RETRY_POLICY } from '../src/utils/retry';
import { NotFoundError, RateLimitError, TransientError } from '../src/utils/errors';

describe('Retry utilities', () => {
  describe('withRetry', () => {
    it('should succeed on first try', async () => {
      const operation = vi.fn().mockResolvedValue('success');

      const result = await withRetry(operation, 'test-op');

      expect(result.success).toBe(true);
      expect(result.data).toBe('success');
      expect(result.attempts).toBe(1);
      expect(operation).toHaveBeenCalledTimes(1);
    });

    it('should retry transient failures and eventually succeed', async () => {
      const operation = vi.fn()
        .mockRejectedValueOnce(new TransientError('fail1'))
        .mockRejectedValueOnce(new TransientError('fail2'))
        .mockResolvedValue('success');

      const result = await withRetry(operation, 'test-op', {
        maxAttempts: 3,
        initialDelayMs: 10,
      });

      expect(result.success).toBe(true);
      expect(result.data).toBe('success');
      expect(result.attempts).toBe(3);
      expect(operation).toHaveBeenCalledTimes(3);
    });

    it('should pass the attempt number to the operation', async () => {
      const seen: number[] = [];
      await withRetry(
        async (attempt) => {
          seen.push(attempt);
          if (attempt < 2) throw new TransientError('not yet');
          return attempt;
        },
        'test-op',
        { initialDelayMs: 1 }
      );

      expect(seen).toEqual([1, 2]);
    });

    it('should fail after max attempts with retryable error', async () => {
      const operation = vi.fn().mockRejectedValue(new TransientError('always fails'));

      const result = await withRetry(operation, 'test-op', {
        maxAttempts: 3,
        initialDelayMs: 10,
      });

      expect(result.success).toBe(false);
      expect(result.error).toBeInstanceOf(TransientError);
      expect(result.attempts).toBe(3);
      expect(operation).toHaveBeenCalledTimes(3);
    });

    it('should not retry non-retryable errors', async () => {
      const operation = vi.fn().mockRejectedValue(new NotFoundError('missing'));

      const result = await withRetry(operation, 'test-op', {
        maxAttempts: 5,
        initialDelayMs: 10,
      });

      expect(result.success).toBe(false);
      expect(result.attempts).toBe(1);
      expect(result.totalDelayMs).toBe(0);
      expect(operation).toHaveBeenCalledTimes(1);
    });

    it('should not retry plain errors', async () => {
      const operation = vi.fn().mockRejectedValue(new Error('plain'));

      const result = await withRetry(operation, 'test-op', { maxAttempts: 3, initialDelayMs: 1 });

      expect(result.attempts).toBe(1);
    });
  });

  describe('calculateDelay', () => {
    const policy = { ...DEFAULT_RETRY_POLICY, initialDelayMs: 100, jitterFactor: 0 };

    it('should back off exponentially', () => {
      expect(calculateDelay(1, policy)).toBe(100);
      expect(calculateDelay(2, policy)).toBe(200);
      expect(calculateDelay(3, policy)).toBe(400);
    });

    it('should cap the delay', () => {
      expect(calculateDelay(10, { ...policy, maxDelayMs: 1000 })).toBe(1000);
    });

    it('should honour retry-after on rate limits', () => {
      expect(calculateDelay(1, policy, new RateLimitError(2500))).toBe(2500);
      expect(calculateDelay(1, policy, new RateLimitError(60000))).toBe(policy.maxDelayMs);
    });
  });
});
