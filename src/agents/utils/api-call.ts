/**
 * Resilient agent calls
 */

import type { AgentReply, ConversationMessage } from '../../types/index.js';
import { withRateLimit } from '../../utils/rate-limiter.js';
import { withRetry, type RetryOptions } from '../../utils/retry.js';
import { withTimeout } from '../../utils/timeout.js';
import type { ConversationAgent } from '../types.js';

export interface AgentCallOptions {
  /** Bound on each attempt */
  timeoutMs: number;
  retry?: Partial<RetryOptions>;
}

/** Rate limits and timeouts are transient; auth and other API errors are not */
export const RETRYABLE_AGENT_ERRORS = ['API_RATE_LIMIT', 'API_TIMEOUT'];

/**
 * Request a reply with per-provider pacing, a per-attempt timeout and
 * exponential backoff on transient failures.
 *
 * The error of the last attempt surfaces once retries are exhausted.
 */
export async function callWithResilience(
  agent: ConversationAgent,
  history: readonly ConversationMessage[],
  options: AgentCallOptions
): Promise<AgentReply> {
  return withRetry(
    () => withRateLimit(agent.provider, () => withTimeout(() => agent.reply(history), options.timeoutMs, agent.provider)),
    { retryableErrors: RETRYABLE_AGENT_ERRORS, ...options.retry }
  );
}
