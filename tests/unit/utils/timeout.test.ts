import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { withTimeout } from '../../../src/utils/timeout.js';
import { APITimeoutError } from '../../../src/errors/index.js';

describe('withTimeout', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should resolve with the result when the call is fast enough', async () => {
    await expect(withTimeout(async () => 'done', 1000)).resolves.toBe('done');
    expect(vi.getTimerCount()).toBe(0);
  });

  it('should reject with APITimeoutError when the call takes too long', async () => {
    const promise = withTimeout(() => new Promise<string>(() => {}), 1000, 'openai');
    const expectation = expect(promise).rejects.toMatchObject({
      name: 'APITimeoutError',
      code: 'API_TIMEOUT',
      provider: 'openai',
      retryable: true,
      message: 'Call timed out after 1000ms',
    });

    await vi.advanceTimersByTimeAsync(1000);
    await expectation;
  });

  it('should pass through errors from the call and clear the timer', async () => {
    await expect(
      withTimeout(async () => {
        throw new Error('boom');
      }, 1000)
    ).rejects.toThrow('boom');
    expect(vi.getTimerCount()).toBe(0);
  });

  it('should produce an APITimeoutError instance', async () => {
    const promise = withTimeout(() => new Promise<void>(() => {}), 50);
    const expectation = expect(promise).rejects.toBeInstanceOf(APITimeoutError);
    await vi.advanceTimersByTimeAsync(50);
    await expectation;
  });
});
