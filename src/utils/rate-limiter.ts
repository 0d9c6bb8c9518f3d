/**
 * Per-provider token bucket pacing outbound agent calls
 *
 * Shared by every conversation in the process, so parallel conversations
 * against the same provider draw from one budget.
 */

import { APIRateLimitError } from '../errors/index.js';
import { RUNTIME_DEFAULTS } from '../config/runtime.js';
import type { AIProvider } from '../types/index.js';

export interface RateLimiterConfig {
  maxTokens: number;
  refillRate: number;
  refillIntervalMs: number;
}

const DEFAULT_CONFIGS: Record<AIProvider, RateLimiterConfig> = {
  anthropic: { maxTokens: 50, refillRate: 10, refillIntervalMs: 1000 },
  openai: { maxTokens: 60, refillRate: 12, refillIntervalMs: 1000 },
  google: { maxTokens: 60, refillRate: 12, refillIntervalMs: 1000 },
  local: { maxTokens: 10000, refillRate: 10000, refillIntervalMs: 1000 },
  scripted: { maxTokens: 10000, refillRate: 10000, refillIntervalMs: 1000 },
};

interface TokenBucket {
  tokens: number;
  lastRefill: number;
  config: RateLimiterConfig;
}

class RateLimiter {
  private buckets: Map<AIProvider, TokenBucket> = new Map();
  private customConfigs: Map<AIProvider, RateLimiterConfig> = new Map();

  configure(provider: AIProvider, config: Partial<RateLimiterConfig>): void {
    this.customConfigs.set(provider, { ...DEFAULT_CONFIGS[provider], ...config });
    this.buckets.delete(provider);
  }

  private getBucket(provider: AIProvider): TokenBucket {
    let bucket = this.buckets.get(provider);
    if (!bucket) {
      const config = this.customConfigs.get(provider) ?? DEFAULT_CONFIGS[provider];
      bucket = { tokens: config.maxTokens, lastRefill: Date.now(), config };
      this.buckets.set(provider, bucket);
    }
    return bucket;
  }

  private refill(bucket: TokenBucket): void {
    const now = Date.now();
    const intervals = Math.floor((now - bucket.lastRefill) / bucket.config.refillIntervalMs);
    if (intervals > 0) {
      bucket.tokens = Math.min(bucket.config.maxTokens, bucket.tokens + intervals * bucket.config.refillRate);
      bucket.lastRefill = now;
    }
  }

  /**
   * Take `tokens` from the provider's bucket, waiting for a refill when the
   * wait is short and failing with APIRateLimitError when it is not.
   */
  async acquire(provider: AIProvider, tokens: number = 1): Promise<void> {
    const bucket = this.getBucket(provider);
    this.refill(bucket);

    if (bucket.tokens >= tokens) {
      bucket.tokens -= tokens;
      return;
    }

    const intervalsNeeded = Math.ceil((tokens - bucket.tokens) / bucket.config.refillRate);
    const waitTimeMs = intervalsNeeded * bucket.config.refillIntervalMs;

    if (waitTimeMs > RUNTIME_DEFAULTS.RATE_LIMIT_WAIT_THRESHOLD_MS) {
      throw new APIRateLimitError(
        `Rate limit exceeded for ${provider}. Would need to wait ${Math.round(waitTimeMs / 1000)}s`,
        { provider }
      );
    }

    await new Promise((resolve) => setTimeout(resolve, waitTimeMs));
    this.refill(bucket);
    bucket.tokens -= tokens;
  }

  getAvailableTokens(provider: AIProvider): number {
    const bucket = this.getBucket(provider);
    this.refill(bucket);
    return bucket.tokens;
  }

  reset(provider?: AIProvider): void {
    if (provider) {
      this.buckets.delete(provider);
      this.customConfigs.delete(provider);
    } else {
      this.buckets.clear();
      this.customConfigs.clear();
    }
  }
}

export const rateLimiter = new RateLimiter();

export async function withRateLimit<T>(provider: AIProvider, fn: () => Promise<T>, tokens: number = 1): Promise<T> {
  await rateLimiter.acquire(provider, tokens);
  return fn();
}
