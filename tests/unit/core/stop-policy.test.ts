import { describe, it, expect } from 'vitest';
import { endReasonForError, evaluateStopPolicy } from '../../../src/core/stop-policy.js';
import {
  APIAuthError,
  APINetworkError,
  APIProviderError,
  APIRateLimitError,
  APITimeoutError,
  PersistenceError,
} from '../../../src/errors/index.js';

const base = { threshold: 0.85, turnsCompleted: 2, maxTurns: 10 };

describe('evaluateStopPolicy', () => {
  it('should continue below the threshold', () => {
    expect(evaluateStopPolicy({ ...base, score: 0.5, action: 'stop' })).toEqual({ signal: null, endReason: null });
  });

  it('should stop at exactly the threshold', () => {
    expect(evaluateStopPolicy({ ...base, score: 0.85, action: 'stop' })).toEqual({
      signal: null,
      endReason: 'convergence_threshold',
    });
  });

  it('should prefer the convergence stop over the turn ceiling', () => {
    expect(evaluateStopPolicy({ ...base, score: 0.9, action: 'stop', turnsCompleted: 10 }).endReason).toBe(
      'convergence_threshold'
    );
  });

  it('should end at max turns below the threshold', () => {
    expect(evaluateStopPolicy({ ...base, score: 0.1, action: 'stop', turnsCompleted: 10 })).toEqual({
      signal: null,
      endReason: 'max_turns_reached',
    });
  });

  it.each([
    ['warn', 'convergence-warning'],
    ['notify', 'convergence-notification'],
    ['continue', null],
  ] as const)('should signal %s without stopping', (action, signal) => {
    expect(evaluateStopPolicy({ ...base, score: 0.95, action })).toEqual({ signal, endReason: null });
    expect(evaluateStopPolicy({ ...base, score: 0.95, action, turnsCompleted: 10 })).toEqual({
      signal,
      endReason: 'max_turns_reached',
    });
  });
});

describe('endReasonForError', () => {
  it.each([
    [new APITimeoutError(), 'timeout'],
    [new APIRateLimitError(), 'rate_limit'],
    [new APIAuthError(), 'api_error'],
    [new APIProviderError(), 'api_error'],
    [new APINetworkError(), 'api_error'],
    [new PersistenceError('disk full'), 'exception'],
    [new TypeError('bug'), 'exception'],
  ])('%s → %s', (error, reason) => {
    expect(endReasonForError(error)).toBe(reason);
  });
});
