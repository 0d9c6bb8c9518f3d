import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { rateLimiter, withRateLimit } from '../../../src/utils/rate-limiter.js';
import { APIRateLimitError } from '../../../src/errors/index.js';

describe('RateLimiter', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    rateLimiter.reset();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.useRealTimers();
  });

  describe('acquire', () => {
    it('should acquire tokens immediately when available', async () => {
      await rateLimiter.acquire('anthropic', 1);
      expect(rateLimiter.getAvailableTokens('anthropic')).toBe(49);
    });

    it('should wait for a refill when tokens are depleted', async () => {
      await rateLimiter.acquire('anthropic', 50);
      expect(rateLimiter.getAvailableTokens('anthropic')).toBe(0);

      const acquirePromise = rateLimiter.acquire('anthropic', 5);
      await vi.runAllTimersAsync();
      await acquirePromise;

      expect(rateLimiter.getAvailableTokens('anthropic')).toBe(5);
    });

    it('should throw APIRateLimitError if wait time exceeds threshold', async () => {
      rateLimiter.configure('anthropic', { maxTokens: 10, refillRate: 1, refillIntervalMs: 10000 });

      await rateLimiter.acquire('anthropic', 10);

      await expect(rateLimiter.acquire('anthropic', 10)).rejects.toThrow(APIRateLimitError);
    });

    it('should refill tokens over time and cap at maxTokens', async () => {
      await rateLimiter.acquire('openai', 60);
      await vi.advanceTimersByTimeAsync(1000);
      expect(rateLimiter.getAvailableTokens('openai')).toBe(12);

      await vi.advanceTimersByTimeAsync(60000);
      expect(rateLimiter.getAvailableTokens('openai')).toBe(60);
    });

    it('should keep one bucket per provider', async () => {
      await rateLimiter.acquire('anthropic', 10);
      expect(rateLimiter.getAvailableTokens('google')).toBe(60);
    });
  });

  describe('withRateLimit', () => {
    it('should run the function after acquiring a token', async () => {
      const fn = vi.fn().mockResolvedValue('reply');

      await expect(withRateLimit('local', fn)).resolves.toBe('reply');
      expect(fn).toHaveBeenCalledTimes(1);
      expect(rateLimiter.getAvailableTokens('local')).toBe(9999);
    });

    it('should not call the function when the limit is hit', async () => {
      rateLimiter.configure('google', { maxTokens: 1, refillRate: 1, refillIntervalMs: 60000 });
      await rateLimiter.acquire('google');
      const fn = vi.fn();

      await expect(withRateLimit('google', fn)).rejects.toThrow(APIRateLimitError);
      expect(fn).not.toHaveBeenCalled();
    });
  });
});
