import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { calculateDelay, withRetry } from '../../../src/utils/retry.js';
import {
  APIAuthError,
  APINetworkError,
  APIRateLimitError,
  APITimeoutError,
  PersistenceError,
} from '../../../src/errors/index.js';

describe('Retry Utility', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.useRealTimers();
  });

  describe('withRetry', () => {
    it('should return result on first success', async () => {
      const fn = vi.fn().mockResolvedValue('success');

      const result = await withRetry(fn);

      expect(result).toBe('success');
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should retry on retryable error', async () => {
      const fn = vi.fn().mockRejectedValueOnce(new APIRateLimitError('Rate limited')).mockResolvedValue('success');

      const promise = withRetry(fn, { maxRetries: 3, baseDelay: 1000 });
      await vi.runAllTimersAsync();

      expect(await promise).toBe('success');
      expect(fn).toHaveBeenCalledTimes(2);
    });

    it('should not retry on non-retryable error', async () => {
      const fn = vi.fn().mockRejectedValue(new APIAuthError('Auth failed'));

      await expect(withRetry(fn)).rejects.toThrow(APIAuthError);
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should throw after max retries exceeded', async () => {
      const fn = vi.fn().mockRejectedValue(new APINetworkError('Network error'));

      const promise = withRetry(fn, { maxRetries: 2, baseDelay: 100 });

      // Start expecting rejection before running timers to avoid unhandled rejection
      const expectation = expect(promise).rejects.toThrow(APINetworkError);
      await vi.runAllTimersAsync();
      await expectation;
      expect(fn).toHaveBeenCalledTimes(3);
    });

    it('should retry only specified error codes', async () => {
      const fn = vi
        .fn()
        .mockRejectedValueOnce(new APIRateLimitError('Rate limited'))
        .mockRejectedValueOnce(new APINetworkError('Network error'));

      const promise = withRetry(fn, { maxRetries: 3, baseDelay: 100, retryableErrors: ['API_RATE_LIMIT'] });

      const expectation = expect(promise).rejects.toThrow(APINetworkError);
      await vi.runAllTimersAsync();
      await expectation;
      expect(fn).toHaveBeenCalledTimes(2);
    });

    it('should not retry foreign errors unless listed by name', async () => {
      const fn = vi.fn().mockRejectedValue(new Error('Generic error'));

      await expect(withRetry(fn)).rejects.toThrow('Generic error');
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should retry foreign errors listed in retryableErrors', async () => {
      const fn = vi.fn().mockRejectedValueOnce(new TypeError('Type error')).mockResolvedValue('success');

      const promise = withRetry(fn, { maxRetries: 2, baseDelay: 100, retryableErrors: ['TypeError'] });
      await vi.runAllTimersAsync();

      expect(await promise).toBe('success');
    });

    it('should not retry persistence failures', async () => {
      const fn = vi.fn().mockRejectedValue(new PersistenceError('disk full'));

      await expect(withRetry(fn, { maxRetries: 3 })).rejects.toThrow(PersistenceError);
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should handle zero retries', async () => {
      const fn = vi.fn().mockRejectedValue(new APITimeoutError('Timeout'));

      await expect(withRetry(fn, { maxRetries: 0, baseDelay: 100 })).rejects.toThrow(APITimeoutError);
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should report each retry through onRetry', async () => {
      vi.spyOn(Math, 'random').mockReturnValue(0);
      const onRetry = vi.fn();
      const error = new APITimeoutError('Timeout');
      const fn = vi.fn().mockRejectedValueOnce(error).mockRejectedValueOnce(error).mockResolvedValue('ok');

      const promise = withRetry(fn, { maxRetries: 3, baseDelay: 1000, backoffFactor: 2, onRetry });
      await vi.runAllTimersAsync();
      await promise;

      expect(onRetry).toHaveBeenCalledTimes(2);
      expect(onRetry).toHaveBeenNthCalledWith(1, error, 1, 500);
      expect(onRetry).toHaveBeenNthCalledWith(2, error, 2, 1000);
    });
  });

  describe('calculateDelay', () => {
    it('should jitter between half and the full capped delay', () => {
      vi.spyOn(Math, 'random').mockReturnValue(0);
      expect(calculateDelay(0, 1000, 30000, 2)).toBe(500);
      expect(calculateDelay(3, 1000, 30000, 2)).toBe(4000);

      vi.spyOn(Math, 'random').mockReturnValue(0.999999);
      expect(calculateDelay(0, 1000, 30000, 2)).toBeCloseTo(1000, 2);
    });

    it('should cap at maxDelay', () => {
      vi.spyOn(Math, 'random').mockReturnValue(0);
      expect(calculateDelay(10, 10000, 5000, 3)).toBe(2500);
    });
  });
});
