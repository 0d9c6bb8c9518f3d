import { describe, it, expect } from 'vitest';
import { convertSDKError } from '../../../../src/agents/utils/error-converter.js';
import {
  APIAuthError,
  APINetworkError,
  APIProviderError,
  APIRateLimitError,
  APITimeoutError,
} from '../../../../src/errors/index.js';

function namedError(name: string, message: string): Error {
  const error = new Error(message);
  error.name = name;
  return error;
}

describe('convertSDKError', () => {
  it('should pass provider errors through unchanged', () => {
    const original = new APIRateLimitError('slow down', { provider: 'openai' });

    expect(convertSDKError(original, 'openai')).toBe(original);
  });

  describe('anthropic and openai', () => {
    it('should map RateLimitError by class name', () => {
      const error = convertSDKError(namedError('RateLimitError', 'slow down'), 'anthropic');

      expect(error).toBeInstanceOf(APIRateLimitError);
      expect(error.message).toBe('slow down');
      expect(error.provider).toBe('anthropic');
    });

    it('should map a 401 status to an auth error', () => {
      const error = convertSDKError(Object.assign(new Error('no'), { status: 401 }), 'openai');

      expect(error).toBeInstanceOf(APIAuthError);
      expect(error.retryable).toBe(false);
    });

    it('should map connection timeouts before connection errors', () => {
      expect(convertSDKError(namedError('APIConnectionTimeoutError', 'Request aborted'), 'openai')).toBeInstanceOf(
        APITimeoutError
      );
      expect(convertSDKError(namedError('APIConnectionError', 'Request failed'), 'openai')).toBeInstanceOf(
        APINetworkError
      );
    });

    it('should map 5xx responses to network errors', () => {
      const error = convertSDKError(Object.assign(new Error('Service Unavailable'), { status: 503 }), 'anthropic');

      expect(error).toBeInstanceOf(APINetworkError);
      expect(error.message).toBe('Server error (503): Service Unavailable');
    });
  });

  describe('google', () => {
    it('should map RESOURCE_EXHAUSTED to a rate limit', () => {
      expect(convertSDKError(new Error('RESOURCE_EXHAUSTED: try later'), 'google')).toBeInstanceOf(
        APIRateLimitError
      );
    });

    it('should map DEADLINE_EXCEEDED to a timeout', () => {
      expect(convertSDKError(new Error('DEADLINE_EXCEEDED'), 'google')).toBeInstanceOf(APITimeoutError);
    });
  });

  describe('fallbacks', () => {
    it('should match network messages for any provider', () => {
      expect(convertSDKError(new Error('connect ECONNREFUSED 127.0.0.1:11434'), 'local')).toBeInstanceOf(
        APINetworkError
      );
    });

    it('should convert anything else to APIProviderError', () => {
      const cause = new Error('bad request body');
      const error = convertSDKError(cause, 'openai');

      expect(error).toBeInstanceOf(APIProviderError);
      expect(error.code).toBe('API_ERROR');
      expect(error.cause).toBe(cause);
    });

    it('should handle non-Error values', () => {
      const error = convertSDKError('weird', 'scripted');

      expect(error).toBeInstanceOf(APIProviderError);
      expect(error.message).toBe('weird');
      expect(error.cause).toBeUndefined();
    });
  });
});
