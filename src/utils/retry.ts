/**
 * Retry utility with exponential backoff and jitter
 */

import { ParleyError } from '../errors/index.js';
import { createLogger } from './logger.js';

const logger = createLogger('Retry');

export interface RetryOptions {
  /**
   * Maximum number of retry attempts AFTER the initial attempt.
   * Total attempts = 1 (initial) + maxRetries.
   *
   * @default 3
   */
  maxRetries: number;

  /**
   * Initial delay in milliseconds
   * @default 1000
   */
  baseDelay: number;

  /**
   * Maximum delay in milliseconds
   * @default 30000
   */
  maxDelay: number;

  /**
   * Exponential backoff factor
   * @default 2
   */
  backoffFactor: number;

  /**
   * Error codes that should trigger a retry.
   * If not provided, only ParleyError with retryable=true will be retried
   */
  retryableErrors?: string[];

  /**
   * Called before sleeping ahead of each retry
   */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxRetries: 3,
  baseDelay: 1000,
  maxDelay: 30000,
  backoffFactor: 2,
};

/**
 * Delay before retry number `attempt` (0-based).
 *
 * The capped exponential delay is jittered into [0.5 * capped, capped]:
 * - Attempt 0: [baseDelay / 2, baseDelay]
 * - Attempt N: [capped / 2, capped] where capped = min(baseDelay * backoffFactor^N, maxDelay)
 */
export function calculateDelay(
  attempt: number,
  baseDelay: number,
  maxDelay: number,
  backoffFactor: number
): number {
  const cappedDelay = Math.min(baseDelay * Math.pow(backoffFactor, attempt), maxDelay);
  const minDelay = cappedDelay * 0.5;
  return minDelay + Math.random() * (cappedDelay - minDelay);
}

function isRetryableError(error: unknown, retryableErrors?: string[]): boolean {
  const hasList = retryableErrors !== undefined && retryableErrors.length > 0;

  if (error instanceof ParleyError) {
    return hasList ? retryableErrors.includes(error.code) : error.retryable;
  }

  // Foreign errors are only retried when their name is listed explicitly
  if (hasList && error instanceof Error) {
    return retryableErrors.includes(error.name);
  }

  return false;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute a function with retry logic
 *
 * @throws The last error once retries are exhausted, or the first non-retryable error
 *
 * @example
 * ```typescript
 * // Up to 6 attempts (1 initial + 5 retries)
 * const reply = await withRetry(() => agent.reply(history), { maxRetries: 5, baseDelay: 2000 });
 * ```
 */
export async function withRetry<T>(fn: () => Promise<T>, options?: Partial<RetryOptions>): Promise<T> {
  const opts: RetryOptions = { ...DEFAULT_RETRY_OPTIONS, ...options };

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!isRetryableError(error, opts.retryableErrors) || attempt >= opts.maxRetries) {
        throw error;
      }

      const delay = calculateDelay(attempt, opts.baseDelay, opts.maxDelay, opts.backoffFactor);

      logger.debug(
        {
          attempt: attempt + 1,
          maxRetries: opts.maxRetries,
          delayMs: Math.round(delay),
          error: error instanceof Error ? error.message : String(error),
        },
        'Retry attempt'
      );
      opts.onRetry?.(error, attempt + 1, delay);

      await sleep(delay);
    }
  }
}
