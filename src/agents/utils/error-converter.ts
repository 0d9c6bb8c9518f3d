/**
 * SDK error conversion
 *
 * Maps errors thrown by the provider SDKs onto the provider error taxonomy so
 * the conversation runner can decide on retries and end reasons without
 * knowing which SDK raised them.
 */

import {
  APIAuthError,
  APINetworkError,
  APIProviderError,
  APIRateLimitError,
  APITimeoutError,
  isProviderError,
  type ProviderError,
} from '../../errors/index.js';
import type { AIProvider } from '../../types/index.js';

type ErrorKind = 'rate_limit' | 'auth' | 'network' | 'timeout';

interface ErrorPattern {
  kind: ErrorKind;
  matches: (error: unknown) => boolean;
}

function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * HTTP status carried by SDK errors (`status` on Anthropic/OpenAI, `code` or `status` on Google)
 */
function getErrorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  for (const key of ['status', 'statusCode', 'code']) {
    const value: unknown = Reflect.get(error, key);
    if (typeof value === 'number') {
      return value;
    }
  }
  return undefined;
}

function getErrorName(error: unknown): string {
  if (error instanceof Error) {
    return error.name;
  }
  if (typeof error === 'object' && error !== null) {
    const name: unknown = Reflect.get(error, 'name');
    return typeof name === 'string' ? name : '';
  }
  return '';
}

const RATE_LIMIT_PATTERNS = [/rate.?limit/i, /too.?many.?requests/i, /quota.?exceeded/i, /throttl/i, /overloaded/i];
const AUTH_PATTERNS = [/unauthori[sz]ed/i, /api.?key/i, /invalid.?key/i, /forbidden/i, /permission/i, /credential/i];
const NETWORK_PATTERNS = [/network/i, /connection/i, /ECONNREFUSED/, /ENOTFOUND/, /ECONNRESET/, /socket/i, /fetch failed/i];
const TIMEOUT_PATTERNS = [/timeout/i, /timed.?out/i, /deadline/i, /ETIMEDOUT/];

const messageMatches = (patterns: RegExp[]) => (error: unknown) =>
  patterns.some((pattern) => pattern.test(getErrorMessage(error)));

const nameIs =
  (...names: string[]) =>
  (error: unknown) =>
    names.includes(getErrorName(error));

const statusIs =
  (...statuses: number[]) =>
  (error: unknown) => {
    const status = getErrorStatus(error);
    return status !== undefined && statuses.includes(status);
  };

/**
 * Anthropic and OpenAI SDKs share error class names:
 * RateLimitError (429), AuthenticationError (401), PermissionDeniedError (403),
 * APIConnectionError, APIConnectionTimeoutError / APITimeoutError.
 * Timeout classes extend the connection class, so they are checked first.
 */
const sdkClassPatterns: ErrorPattern[] = [
  { kind: 'rate_limit', matches: (e) => nameIs('RateLimitError')(e) || statusIs(429)(e) },
  { kind: 'auth', matches: (e) => nameIs('AuthenticationError', 'PermissionDeniedError')(e) || statusIs(401, 403)(e) },
  { kind: 'timeout', matches: (e) => nameIs('APIConnectionTimeoutError', 'APITimeoutError')(e) || statusIs(408)(e) },
  { kind: 'network', matches: nameIs('APIConnectionError') },
];

/**
 * The Google Gen AI SDK raises ApiError with a numeric status and otherwise
 * plain errors, so it leans on status codes and messages.
 */
const googlePatterns: ErrorPattern[] = [
  { kind: 'rate_limit', matches: (e) => statusIs(429)(e) || messageMatches([/RESOURCE_EXHAUSTED/])(e) },
  { kind: 'auth', matches: (e) => statusIs(401, 403)(e) || messageMatches([/PERMISSION_DENIED/, /API_KEY_INVALID/])(e) },
  { kind: 'timeout', matches: (e) => statusIs(408, 504)(e) || messageMatches([/DEADLINE_EXCEEDED/])(e) },
];

const providerPatterns: Record<AIProvider, ErrorPattern[]> = {
  anthropic: sdkClassPatterns,
  openai: sdkClassPatterns,
  google: googlePatterns,
  local: [],
  scripted: [],
};

/** Message-based fallbacks, checked after provider-specific patterns */
const fallbackPatterns: ErrorPattern[] = [
  { kind: 'rate_limit', matches: messageMatches(RATE_LIMIT_PATTERNS) },
  { kind: 'auth', matches: messageMatches(AUTH_PATTERNS) },
  { kind: 'timeout', matches: messageMatches(TIMEOUT_PATTERNS) },
  { kind: 'network', matches: messageMatches(NETWORK_PATTERNS) },
];

function build(kind: ErrorKind, message: string, provider: AIProvider, cause: Error | undefined): ProviderError {
  switch (kind) {
    case 'rate_limit':
      return new APIRateLimitError(message, { provider, cause });
    case 'auth':
      return new APIAuthError(message, { provider, cause });
    case 'network':
      return new APINetworkError(message, { provider, cause });
    case 'timeout':
      return new APITimeoutError(message, { provider, cause });
    default: {
      const unreachable: never = kind;
      throw new Error(`Unhandled error kind: ${String(unreachable)}`);
    }
  }
}

/**
 * Convert an SDK error to a provider error.
 *
 * Provider errors pass through unchanged. 5xx responses become retryable
 * network errors; anything unrecognised becomes APIProviderError.
 *
 * @example
 * ```typescript
 * try {
 *   await client.messages.create(...);
 * } catch (error) {
 *   throw convertSDKError(error, 'anthropic');
 * }
 * ```
 */
export function convertSDKError(error: unknown, provider: AIProvider): ProviderError {
  if (isProviderError(error)) {
    return error;
  }

  const message = getErrorMessage(error);
  const cause = error instanceof Error ? error : undefined;

  for (const pattern of [...providerPatterns[provider], ...fallbackPatterns]) {
    if (pattern.matches(error)) {
      return build(pattern.kind, message, provider, cause);
    }
  }

  const status = getErrorStatus(error);
  if (status !== undefined && status >= 500 && status < 600) {
    return new APINetworkError(`Server error (${status}): ${message}`, { provider, cause });
  }

  return new APIProviderError(message, { provider, cause });
}
