/**
 * Bound the wait on a promise-returning call
 */

import { APITimeoutError } from '../errors/index.js';

/**
 * Run `fn` and reject with APITimeoutError if it has not settled after `timeoutMs`.
 *
 * The underlying call is not cancelled; its eventual result is discarded.
 */
export async function withTimeout<T>(fn: () => Promise<T>, timeoutMs: number, provider?: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new APITimeoutError(`Call timed out after ${timeoutMs}ms`, { provider }));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
