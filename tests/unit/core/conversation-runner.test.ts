import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ConversationRunner } from '../../../src/core/conversation-runner.js';
import { APIAuthError, APIRateLimitError, ConversationStateError } from '../../../src/errors/index.js';
import type { Conversation, ConversationStatus } from '../../../src/types/index.js';
import { rateLimiter } from '../../../src/utils/rate-limiter.js';
import {
  FixedScoreScorer,
  MemoryEventSink,
  StubAgent,
  createConversation,
  createCountingAgent,
  createGate,
  createReply,
} from '../../utils/index.js';

const fastRetry = { baseDelay: 1, maxDelay: 1 };

function createRunner(options: {
  conversation?: Partial<Conversation>;
  agentA?: StubAgent;
  agentB?: StubAgent;
  scores?: number[];
  sink?: MemoryEventSink;
  callTimeoutMs?: number;
  maxRetries?: number;
}) {
  const agentA = options.agentA ?? createCountingAgent('agent_a', 'A');
  const agentB = options.agentB ?? createCountingAgent('agent_b', 'B');
  const sink = options.sink ?? new MemoryEventSink();
  const scorer = new FixedScoreScorer(options.scores ?? [0.1]);
  const runner = new ConversationRunner({
    conversation: createConversation(options.conversation),
    agentA,
    agentB,
    log: sink,
    engine: scorer,
    callTimeoutMs: options.callTimeoutMs ?? 5000,
    retry: { ...fastRetry, maxRetries: options.maxRetries ?? 0 },
  });
  return { runner, agentA, agentB, sink, scorer };
}

describe('ConversationRunner', () => {
  beforeEach(() => {
    rateLimiter.reset();
  });

  describe('turn loop', () => {
    it('should run until max turns when the score stays low', async () => {
      const { runner, sink } = createRunner({ scores: [0.1, 0.2, 0.3] });

      const result = await runner.run();

      expect(result.status).toBe('completed');
      expect(result.endReason).toBe('max_turns_reached');
      expect(result.turns).toHaveLength(3);
      expect(result.finalScore).toBe(0.3);
      expect(sink.types()).toEqual([
        'conversation-start',
        ...Array.from({ length: 3 }, () => ['turn-start', 'message-complete', 'message-complete', 'turn-complete']).flat(),
        'conversation-end',
      ]);
      expect(sink.events.at(-1)).toMatchObject({
        type: 'conversation-end',
        conversationId: 'conv-1',
        payload: {
          status: 'completed',
          endReason: 'max_turns_reached',
          totalTurns: 3,
          finalScore: 0.3,
          partialTurn: false,
        },
      });
    });

    it('should stop at the convergence threshold', async () => {
      const { runner } = createRunner({ conversation: { maxTurns: 10 }, scores: [0.5, 0.9] });

      const result = await runner.run();

      expect(result.status).toBe('completed');
      expect(result.endReason).toBe('convergence_threshold');
      expect(result.turns.map((turn) => turn.score)).toEqual([0.5, 0.9]);
      expect(result.turns[1]?.trend).toBeCloseTo(0.4, 10);
    });

    it('should ignore the threshold with action continue', async () => {
      const base = createConversation();
      const { runner, sink } = createRunner({
        conversation: { maxTurns: 4, convergence: { ...base.convergence, action: 'continue' } },
        scores: [0.95],
      });

      const result = await runner.run();

      expect(result.turns).toHaveLength(4);
      expect(result.endReason).toBe('max_turns_reached');
      expect(sink.types()).not.toContain('convergence-warning');
    });

    it('should pass the full history to each agent, A before B', async () => {
      const { runner, agentA, agentB } = createRunner({ conversation: { maxTurns: 2 } });

      await runner.run();

      expect(agentA.histories[0]).toEqual([{ speaker: 'moderator', text: 'Talk about rivers.' }]);
      expect(agentB.histories[0]).toEqual([
        { speaker: 'moderator', text: 'Talk about rivers.' },
        { speaker: 'agent_a', text: 'A 1' },
      ]);
      expect(agentA.histories[1]).toEqual([
        { speaker: 'moderator', text: 'Talk about rivers.' },
        { speaker: 'agent_a', text: 'A 1' },
        { speaker: 'agent_b', text: 'B 1' },
      ]);
    });

    it('should score the turn window with the previous score', async () => {
      const { runner, scorer } = createRunner({ conversation: { maxTurns: 2 }, scores: [0.1, 0.2] });

      await runner.run();

      expect(scorer.inputs[0]?.previousScore).toBeNull();
      expect(scorer.inputs[1]?.previousScore).toBe(0.1);
      expect(scorer.inputs[1]?.window).toEqual([
        { agentA: 'A 1', agentB: 'B 1' },
        { agentA: 'A 2', agentB: 'B 2' },
      ]);
    });

    it('should record both messages with usage', async () => {
      const { runner, sink } = createRunner({ conversation: { maxTurns: 1 } });

      await runner.run();

      const messages = sink.events.filter((event) => event.type === 'message-complete');
      expect(messages.map((event) => event.payload)).toEqual([
        {
          turnIndex: 0,
          speaker: 'agent_a',
          text: 'A 1',
          usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
          costUsd: 0.001,
          latencyMs: 20,
        },
        {
          turnIndex: 0,
          speaker: 'agent_b',
          text: 'B 1',
          usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
          costUsd: 0.001,
          latencyMs: 20,
        },
      ]);
    });

    it('should emit warnings and keep going with the warn action', async () => {
      const { runner, sink } = createRunner({
        conversation: {
          maxTurns: 2,
          convergence: { ...createConversation().convergence, action: 'warn' },
        },
        scores: [0.9],
      });

      const result = await runner.run();

      expect(result.endReason).toBe('max_turns_reached');
      expect(sink.events.filter((event) => event.type === 'convergence-warning').map((event) => event.payload)).toEqual([
        { turnIndex: 0, score: 0.9, threshold: 0.85 },
        { turnIndex: 1, score: 0.9, threshold: 0.85 },
      ]);
    });

    it('should score with the convergence engine by default', async () => {
      const echo = (slot: 'agent_a' | 'agent_b') => new StubAgent(slot, async () => createReply('The river bends.'));
      const runner = new ConversationRunner({
        conversation: createConversation({ maxTurns: 5 }),
        agentA: echo('agent_a'),
        agentB: echo('agent_b'),
        log: new MemoryEventSink(),
        callTimeoutMs: 5000,
      });

      const result = await runner.run();

      expect(result.endReason).toBe('convergence_threshold');
      expect(result.turns).toHaveLength(1);
      expect(result.turns[0]?.components.content).toBe(1);
    });

    it('should report status changes to onUpdate', async () => {
      const statuses: ConversationStatus[] = [];
      const runner = new ConversationRunner({
        conversation: createConversation({ maxTurns: 1 }),
        agentA: createCountingAgent('agent_a', 'A'),
        agentB: createCountingAgent('agent_b', 'B'),
        log: new MemoryEventSink(),
        engine: new FixedScoreScorer([0.1]),
        callTimeoutMs: 5000,
        onUpdate: async (conversation) => {
          statuses.push(conversation.status);
        },
      });

      await runner.run();

      expect(statuses[0]).toBe('running');
      expect(statuses.at(-1)).toBe('completed');
    });

    it('should ignore a failing onUpdate listener', async () => {
      const runner = new ConversationRunner({
        conversation: createConversation({ maxTurns: 1 }),
        agentA: createCountingAgent('agent_a', 'A'),
        agentB: createCountingAgent('agent_b', 'B'),
        log: new MemoryEventSink(),
        engine: new FixedScoreScorer([0.1]),
        callTimeoutMs: 5000,
        onUpdate: async () => {
          throw new Error('listener broke');
        },
      });

      await expect(runner.run()).resolves.toMatchObject({ status: 'completed' });
    });
  });

  describe('failures', () => {
    it('should fail with timeout when an agent call never returns', async () => {
      const agentB = new StubAgent('agent_b', () => new Promise(() => {}));
      const { runner, sink } = createRunner({ agentB, callTimeoutMs: 20 });

      const result = await runner.run();

      expect(result.status).toBe('failed');
      expect(result.endReason).toBe('timeout');
      expect(result.error).toBe('Call timed out after 20ms');
      expect(sink.events.find((event) => event.type === 'provider-error')).toMatchObject({
        payload: { turnIndex: 0, speaker: 'agent_b', code: 'API_TIMEOUT', retryable: true },
      });
      expect(sink.events.at(-1)).toMatchObject({
        type: 'conversation-end',
        payload: { status: 'failed', endReason: 'timeout', totalTurns: 0, finalScore: null, partialTurn: true },
      });
    });

    it('should fail with rate_limit once retries are exhausted', async () => {
      const agentA = new StubAgent('agent_a', async () => {
        throw new APIRateLimitError('limited');
      });
      const { runner } = createRunner({ agentA, maxRetries: 1 });

      const result = await runner.run();

      expect(result.endReason).toBe('rate_limit');
      expect(agentA.calls).toBe(2);
    });

    it('should fail with api_error on authentication failures', async () => {
      const agentA = new StubAgent('agent_a', async () => {
        throw new APIAuthError('bad key');
      });
      const { runner } = createRunner({ agentA, maxRetries: 3 });

      const result = await runner.run();

      expect(result.endReason).toBe('api_error');
      expect(agentA.calls).toBe(1);
    });

    it('should fail with exception when an event cannot be written', async () => {
      const sink = new MemoryEventSink();
      sink.failOn = 'turn-complete';
      const { runner } = createRunner({ sink });

      const result = await runner.run();

      expect(result.status).toBe('failed');
      expect(result.endReason).toBe('exception');
      expect(result.error).toBe('append failed for turn-complete');
      expect(result.turns).toHaveLength(0);
      expect(sink.events.at(-1)).toMatchObject({ type: 'conversation-end', payload: { partialTurn: true } });
    });

    it('should fail when conversation-start cannot be written', async () => {
      const sink = new MemoryEventSink();
      sink.failOn = 'conversation-start';
      const { runner, agentA } = createRunner({ sink });

      const result = await runner.run();

      expect(result.status).toBe('failed');
      expect(agentA.calls).toBe(0);
      expect(sink.types()).toEqual(['conversation-end']);
    });
  });

  describe('lifecycle control', () => {
    it('should reject a conversation that is not created', () => {
      expect(
        () =>
          new ConversationRunner({
            conversation: createConversation({ status: 'running' }),
            agentA: createCountingAgent('agent_a', 'A'),
            agentB: createCountingAgent('agent_b', 'B'),
            log: new MemoryEventSink(),
            callTimeoutMs: 5000,
          })
      ).toThrow(ConversationStateError);
    });

    it('should not interrupt a conversation before it starts', async () => {
      const { runner } = createRunner({});

      await expect(runner.interrupt()).rejects.toBeInstanceOf(ConversationStateError);
    });

    it('should not advance a conversation that is not running', async () => {
      const { runner } = createRunner({});

      await expect(runner.advanceTurn()).rejects.toThrow("Cannot advance conversation conv-1 while 'created'");
    });

    it('should let an interrupt win over a convergence stop in the same turn', async () => {
      const gate = createGate();
      const agentB = new StubAgent('agent_b', async (call) => {
        await gate.promise;
        return createReply(`B ${call}`);
      });
      const { runner, sink } = createRunner({ agentB, scores: [0.95] });

      const running = runner.run();
      await vi.waitFor(() => expect(agentB.calls).toBe(1));
      const interrupting = runner.interrupt();
      gate.release();

      const result = await running;
      await interrupting;

      expect(result.status).toBe('interrupted');
      expect(result.endReason).toBe('interrupted');
      expect(result.turns).toHaveLength(1);
      expect(sink.types().slice(-2)).toEqual(['turn-complete', 'conversation-end']);
      expect(sink.events.at(-1)).toMatchObject({
        payload: { status: 'interrupted', endReason: 'interrupted', totalTurns: 1, finalScore: 0.95, partialTurn: false },
      });
    });

    it('should not call agent B after an interrupt during agent A', async () => {
      const gate = createGate();
      const agentA = new StubAgent('agent_a', async (call) => {
        await gate.promise;
        return createReply(`A ${call}`);
      });
      const { runner, agentB, sink } = createRunner({ agentA });

      const running = runner.run();
      await vi.waitFor(() => expect(agentA.calls).toBe(1));
      const interrupting = runner.interrupt();
      gate.release();

      const result = await running;
      await interrupting;

      expect(result.status).toBe('interrupted');
      expect(agentB.calls).toBe(0);
      expect(sink.events.at(-1)).toMatchObject({ payload: { totalTurns: 0, partialTurn: true } });
    });

    it('should pause before the next agent call and resume', async () => {
      const gate = createGate();
      const agentA = new StubAgent('agent_a', async (call) => {
        await gate.promise;
        return createReply(`A ${call}`);
      });
      const { runner, agentB, sink } = createRunner({ agentA, conversation: { maxTurns: 1 } });

      const running = runner.run();
      await vi.waitFor(() => expect(agentA.calls).toBe(1));
      const pausing = runner.pause();
      gate.release();
      await pausing;

      expect(runner.status).toBe('paused');
      expect(agentB.calls).toBe(0);

      await runner.resume();
      const result = await running;

      expect(result.status).toBe('completed');
      expect(agentB.calls).toBe(1);
      expect(sink.types()).toEqual([
        'conversation-start',
        'turn-start',
        'message-complete',
        'conversation-paused',
        'conversation-resumed',
        'message-complete',
        'turn-complete',
        'conversation-end',
      ]);
    });

    it('should interrupt a paused conversation', async () => {
      const gate = createGate();
      const agentA = new StubAgent('agent_a', async (call) => {
        await gate.promise;
        return createReply(`A ${call}`);
      });
      const { runner } = createRunner({ agentA });

      const running = runner.run();
      await vi.waitFor(() => expect(agentA.calls).toBe(1));
      const pausing = runner.pause();
      gate.release();
      await pausing;

      await runner.interrupt();
      const result = await running;

      expect(result.status).toBe('interrupted');
      expect(result.endReason).toBe('interrupted');
    });
  });
});
