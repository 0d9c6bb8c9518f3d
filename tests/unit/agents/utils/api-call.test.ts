import { describe, it, expect, beforeEach } from 'vitest';
import { callWithResilience } from '../../../../src/agents/utils/api-call.js';
import { APIAuthError, APIRateLimitError, APITimeoutError } from '../../../../src/errors/index.js';
import { rateLimiter } from '../../../../src/utils/rate-limiter.js';
import { StubAgent, createReply } from '../../../utils/index.js';

const history = [{ speaker: 'moderator' as const, text: 'Start' }];
const fastRetry = { baseDelay: 1, maxDelay: 1 };

describe('callWithResilience', () => {
  beforeEach(() => {
    rateLimiter.reset();
  });

  it('should return the reply of a successful call', async () => {
    const agent = new StubAgent('agent_a', async () => createReply('hello'));

    const reply = await callWithResilience(agent, history, { timeoutMs: 1000, retry: fastRetry });

    expect(reply.text).toBe('hello');
    expect(agent.histories).toEqual([history]);
  });

  it('should retry rate limits and timeouts', async () => {
    const agent = new StubAgent('agent_a', async (call) => {
      if (call === 1) throw new APIRateLimitError();
      if (call === 2) throw new APITimeoutError();
      return createReply('third time');
    });

    const reply = await callWithResilience(agent, history, { timeoutMs: 1000, retry: fastRetry });

    expect(reply.text).toBe('third time');
    expect(agent.calls).toBe(3);
  });

  it('should not retry authentication failures', async () => {
    const agent = new StubAgent('agent_a', async () => {
      throw new APIAuthError('bad key');
    });

    await expect(callWithResilience(agent, history, { timeoutMs: 1000, retry: fastRetry })).rejects.toBeInstanceOf(
      APIAuthError
    );
    expect(agent.calls).toBe(1);
  });

  it('should surface the last error once retries are exhausted', async () => {
    const agent = new StubAgent('agent_a', async () => {
      throw new APIRateLimitError('still limited');
    });

    await expect(
      callWithResilience(agent, history, { timeoutMs: 1000, retry: { ...fastRetry, maxRetries: 2 } })
    ).rejects.toThrow('still limited');
    expect(agent.calls).toBe(3);
  });

  it('should time out a call that never settles', async () => {
    const agent = new StubAgent('agent_a', () => new Promise(() => {}));

    await expect(
      callWithResilience(agent, history, { timeoutMs: 20, retry: { ...fastRetry, maxRetries: 0 } })
    ).rejects.toThrow('Call timed out after 20ms');
  });
});
