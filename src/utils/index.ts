/**
 * Utility functions and helpers
 */

export { withRetry, calculateDelay, DEFAULT_RETRY_OPTIONS, type RetryOptions } from './retry.js';

export { logger, createLogger } from './logger.js';

export { withTimeout } from './timeout.js';

export { rateLimiter, withRateLimit, type RateLimiterConfig } from './rate-limiter.js';

export { SerialQueue } from './serial-queue.js';

export { mapWithConcurrency } from './concurrency.js';

export {
  getEnvWithDefault,
  getEnvOptional,
  getEnvBoolean,
  getEnvNumber,
  getEnvFloat,
} from './env.js';
