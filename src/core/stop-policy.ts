/**
 * Stop policy and failure classification
 */

import {
  APIAuthError,
  APINetworkError,
  APIProviderError,
  APIRateLimitError,
  APITimeoutError,
} from '../errors/index.js';
import type { ConvergenceAction, EndReason } from '../types/index.js';

export interface StopPolicyInput {
  score: number;
  threshold: number;
  action: ConvergenceAction;
  turnsCompleted: number;
  maxTurns: number;
}

export type ConvergenceSignal = 'convergence-warning' | 'convergence-notification';

export interface StopDecision {
  /** Event to emit for a threshold crossing that does not stop the conversation */
  signal: ConvergenceSignal | null;
  /** Set when the conversation should finalize as completed */
  endReason: Extract<EndReason, 'convergence_threshold' | 'max_turns_reached'> | null;
}

/**
 * Decide what happens after a turn.
 *
 * The convergence action applies when score ≥ threshold. Reaching maxTurns
 * ends the conversation unless the threshold already stopped it.
 */
export function evaluateStopPolicy(input: StopPolicyInput): StopDecision {
  const crossed = input.score >= input.threshold;
  const atCeiling = input.turnsCompleted >= input.maxTurns;
  const ceiling = atCeiling ? 'max_turns_reached' : null;

  if (!crossed) {
    return { signal: null, endReason: ceiling };
  }

  switch (input.action) {
    case 'stop':
      return { signal: null, endReason: 'convergence_threshold' };
    case 'warn':
      return { signal: 'convergence-warning', endReason: ceiling };
    case 'notify':
      return { signal: 'convergence-notification', endReason: ceiling };
    case 'continue':
      return { signal: null, endReason: ceiling };
    default: {
      const unreachable: never = input.action;
      throw new Error(`Unknown convergence action: ${String(unreachable)}`);
    }
  }
}

/**
 * End reason for a conversation that failed with `error`
 */
export function endReasonForError(error: unknown): Extract<EndReason, 'timeout' | 'rate_limit' | 'api_error' | 'exception'> {
  if (error instanceof APITimeoutError) {
    return 'timeout';
  }
  if (error instanceof APIRateLimitError) {
    return 'rate_limit';
  }
  if (error instanceof APIAuthError || error instanceof APIProviderError || error instanceof APINetworkError) {
    return 'api_error';
  }
  return 'exception';
}
