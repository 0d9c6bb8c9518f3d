/**
 * Conversation Runner
 *
 * Drives one conversation through its lifecycle: requests replies from both
 * agents turn by turn, scores each turn, applies the stop policy and appends
 * every step to the conversation's event log.
 *
 * Pause and interrupt are cooperative. Both are honoured before each agent
 * call and after each turn, never while a call is in flight. An interrupt
 * wins over a natural stop decided in the same turn.
 */

import type { ConversationAgent } from '../agents/types.js';
import { callWithResilience } from '../agents/utils/api-call.js';
import { ConversationStateError, isProviderError } from '../errors/index.js';
import type { EventSink } from '../storage/event-store.js';
import type {
  AgentReply,
  AgentSlot,
  Conversation,
  ConversationMessage,
  ConversationStatus,
  CumulativeOverlap,
  EndReason,
  EventDraft,
  TerminalConversationStatus,
  Turn,
} from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import type { RetryOptions } from '../utils/retry.js';
import { ConvergenceEngine, EMPTY_CUMULATIVE, type ConvergenceScorer } from './convergence-engine.js';
import { assertTransition, isTerminalStatus } from './state-machine.js';
import { endReasonForError, evaluateStopPolicy } from './stop-policy.js';

const logger = createLogger('ConversationRunner');

export interface ConversationRunnerOptions {
  /** Conversation in status `created` */
  conversation: Conversation;
  agentA: ConversationAgent;
  agentB: ConversationAgent;
  log: EventSink;
  /** Defaults to a ConvergenceEngine over the conversation's weights */
  engine?: ConvergenceScorer;
  callTimeoutMs: number;
  retry?: Partial<RetryOptions>;
  /**
   * Called after every status change and every completed turn with a
   * snapshot of the conversation. Failures are logged, never propagated.
   */
  onUpdate?: (conversation: Readonly<Conversation>) => Promise<void>;
  now?: () => Date;
}

export interface ConversationResult {
  conversationId: string;
  status: ConversationStatus;
  endReason: EndReason | undefined;
  turns: Turn[];
  finalScore: number | null;
  error?: string;
}

export class ConversationRunner {
  private readonly conversation: Conversation;
  private readonly agents: Record<AgentSlot, ConversationAgent>;
  private readonly log: EventSink;
  private readonly engine: ConvergenceScorer;
  private readonly callTimeoutMs: number;
  private readonly retry?: Partial<RetryOptions>;
  private readonly onUpdate?: (conversation: Readonly<Conversation>) => Promise<void>;
  private readonly now: () => Date;

  private readonly history: ConversationMessage[];
  private readonly turns: Turn[] = [];
  private cumulative: CumulativeOverlap = EMPTY_CUMULATIVE;
  /** Messages of the turn in progress that are already durable */
  private partialMessages = 0;

  private interruptRequested = false;
  private pauseRequested = false;
  private pausing: Promise<void> | null = null;
  private turnInFlight: Promise<void> | null = null;
  /** Woken on every status change */
  private waiters: Array<() => void> = [];

  constructor(options: ConversationRunnerOptions) {
    if (options.conversation.status !== 'created') {
      throw new ConversationStateError(
        `Conversation ${options.conversation.id} must be 'created' to run, not '${options.conversation.status}'`
      );
    }
    this.conversation = { ...options.conversation };
    this.agents = { agent_a: options.agentA, agent_b: options.agentB };
    this.log = options.log;
    this.engine =
      options.engine ??
      new ConvergenceEngine(options.conversation.convergence.weights, options.conversation.convergence.windowSize);
    this.callTimeoutMs = options.callTimeoutMs;
    this.retry = options.retry;
    this.onUpdate = options.onUpdate;
    this.now = options.now ?? (() => new Date());
    this.history = [{ speaker: 'moderator', text: options.conversation.initialPrompt }];
  }

  get id(): string {
    return this.conversation.id;
  }

  get status(): ConversationStatus {
    return this.conversation.status;
  }

  snapshot(): Readonly<Conversation> {
    return { ...this.conversation };
  }

  result(): ConversationResult {
    return {
      conversationId: this.conversation.id,
      status: this.conversation.status,
      endReason: this.conversation.endReason,
      turns: [...this.turns],
      finalScore: this.lastScore(),
      error: this.conversation.error,
    };
  }

  /**
   * created → running, emitting conversation-start
   */
  async start(): Promise<void> {
    assertTransition(this.conversation.status, 'running');
    this.setStatus('running');
    this.conversation.startedAt = this.now();

    const { agentA, agentB, convergence } = this.conversation;
    try {
      await this.emit({
        type: 'conversation-start',
        payload: {
          experimentId: this.conversation.experimentId,
          agentA: { provider: agentA.provider, model: agentA.model, temperature: agentA.temperature },
          agentB: { provider: agentB.provider, model: agentB.model, temperature: agentB.temperature },
          initialPrompt: this.conversation.initialPrompt,
          maxTurns: this.conversation.maxTurns,
          convergence: {
            profile: convergence.profile,
            weights: convergence.weights,
            threshold: convergence.threshold,
            action: convergence.action,
          },
        },
      });
    } catch (error) {
      await this.fail(error, null);
      return;
    }

    logger.info(
      { conversationId: this.id, experimentId: this.conversation.experimentId, maxTurns: this.conversation.maxTurns },
      'Conversation started'
    );
    await this.notify();
  }

  /**
   * Run one full turn: agent A then agent B, score, stop policy
   *
   * @throws ConversationStateError unless the conversation is running
   */
  async advanceTurn(): Promise<void> {
    if (this.conversation.status !== 'running') {
      throw new ConversationStateError(`Cannot advance conversation ${this.id} while '${this.conversation.status}'`);
    }
    if (this.turnInFlight) {
      throw new ConversationStateError(`A turn of conversation ${this.id} is already in progress`);
    }

    const turn = this.executeTurn();
    this.turnInFlight = turn;
    try {
      await turn;
    } finally {
      this.turnInFlight = null;
    }
  }

  /**
   * start() then advanceTurn() until terminal, waiting while paused
   */
  async run(): Promise<ConversationResult> {
    if (this.conversation.status === 'created') {
      await this.start();
    }
    while (!isTerminalStatus(this.conversation.status)) {
      if (this.conversation.status === 'paused') {
        await this.waitForStatusChange();
        continue;
      }
      await this.advanceTurn();
    }
    return this.result();
  }

  /**
   * running → paused. With a turn in flight the pause takes effect before
   * the next agent call; resolves once paused (or terminal).
   */
  async pause(): Promise<void> {
    assertTransition(this.conversation.status, 'paused');
    this.pauseRequested = true;

    if (!this.turnInFlight) {
      try {
        await this.enterPause();
      } catch (error) {
        await this.fail(error, null);
      }
      return;
    }

    while (this.conversation.status === 'running') {
      await this.waitForStatusChange();
    }
  }

  /**
   * paused → running
   */
  async resume(): Promise<void> {
    assertTransition(this.conversation.status, 'running');
    this.setStatus('running');
    try {
      await this.emit({ type: 'conversation-resumed', payload: { turnIndex: this.turns.length } });
    } catch (error) {
      await this.fail(error, null);
      return;
    }
    logger.info({ conversationId: this.id, turnIndex: this.turns.length }, 'Conversation resumed');
    await this.notify();
  }

  /**
   * Finalize as interrupted. Resolves once the conversation is terminal;
   * an agent call in flight completes first. No effect on a terminal
   * conversation.
   *
   * @throws ConversationStateError when the conversation has not started
   */
  async interrupt(): Promise<void> {
    const { status } = this.conversation;
    if (status === 'created') {
      throw new ConversationStateError(`Cannot interrupt conversation ${this.id} before it starts`);
    }
    if (isTerminalStatus(status)) {
      return;
    }

    this.interruptRequested = true;

    if (this.turnInFlight) {
      this.wakeWaiters();
      await this.turnInFlight;
    }
    await this.finalize('interrupted', 'interrupted');
  }

  // ============================================
  // Turn execution
  // ============================================

  private async executeTurn(): Promise<void> {
    const turnIndex = this.turns.length;
    let speaker: AgentSlot | null = null;

    try {
      if (!(await this.mayCallAgent())) {
        return;
      }

      this.partialMessages = 0;
      await this.emit({ type: 'turn-start', payload: { turnIndex } });

      speaker = 'agent_a';
      const replyA = await this.requestReply('agent_a', turnIndex);
      speaker = null;

      if (!(await this.mayCallAgent())) {
        return;
      }

      speaker = 'agent_b';
      const replyB = await this.requestReply('agent_b', turnIndex);
      speaker = null;

      const window = this.turns.map((t) => ({ agentA: t.agentA.text, agentB: t.agentB.text }));
      window.push({ agentA: replyA.text, agentB: replyB.text });

      const scored = this.engine.score({
        window,
        previousScore: this.lastScore(),
        cumulative: this.cumulative,
      });

      await this.emit({
        type: 'turn-complete',
        payload: {
          turnIndex,
          components: scored.components,
          score: scored.score,
          trend: scored.trend,
          cumulativeOverlap: scored.cumulative.mean,
        },
      });

      // A turn counts once its turn-complete record is durable
      this.turns.push({
        index: turnIndex,
        agentA: { speaker: 'agent_a', text: replyA.text },
        agentB: { speaker: 'agent_b', text: replyB.text },
        components: scored.components,
        score: scored.score,
        trend: scored.trend,
      });
      this.cumulative = scored.cumulative;
      this.partialMessages = 0;
      this.conversation.turnCount = this.turns.length;

      logger.debug({ conversationId: this.id, turnIndex, score: scored.score, trend: scored.trend }, 'Turn complete');

      if (this.interruptRequested) {
        await this.finalize('interrupted', 'interrupted');
        return;
      }

      const { threshold, action } = this.conversation.convergence;
      const decision = evaluateStopPolicy({
        score: scored.score,
        threshold,
        action,
        turnsCompleted: this.turns.length,
        maxTurns: this.conversation.maxTurns,
      });

      if (decision.signal) {
        await this.emit({ type: decision.signal, payload: { turnIndex, score: scored.score, threshold } });
      }

      if (decision.endReason) {
        await this.finalize('completed', decision.endReason);
        return;
      }

      await this.notify();

      if (this.pauseRequested) {
        await this.enterPause();
      }
    } catch (error) {
      await this.fail(error, speaker, turnIndex);
    }
  }

  /**
   * Boundary before an agent call: honour a pending pause, then a pending
   * interrupt. Returns false when the turn must not continue.
   */
  private async mayCallAgent(): Promise<boolean> {
    if (this.pauseRequested && !this.interruptRequested) {
      await this.enterPause();
    }
    while (this.conversation.status === 'paused' && !this.interruptRequested) {
      await this.waitForStatusChange();
    }
    if (this.interruptRequested) {
      await this.finalize('interrupted', 'interrupted');
      return false;
    }
    return this.conversation.status === 'running';
  }

  private async requestReply(slot: AgentSlot, turnIndex: number): Promise<AgentReply> {
    const reply = await callWithResilience(this.agents[slot], this.history, {
      timeoutMs: this.callTimeoutMs,
      retry: {
        ...this.retry,
        onRetry: (error, attempt, delayMs) => {
          logger.warn(
            { conversationId: this.id, turnIndex, speaker: slot, attempt, delayMs: Math.round(delayMs), err: error },
            'Retrying agent call'
          );
          this.retry?.onRetry?.(error, attempt, delayMs);
        },
      },
    });

    // The reply exists once its record is durable
    await this.emit({
      type: 'message-complete',
      payload: {
        turnIndex,
        speaker: slot,
        text: reply.text,
        usage: reply.usage,
        costUsd: reply.costUsd,
        latencyMs: reply.latencyMs,
      },
    });

    this.history.push({ speaker: slot, text: reply.text });
    this.partialMessages++;
    return reply;
  }

  /**
   * Record a requested pause. Concurrent callers share one recording.
   */
  private enterPause(): Promise<void> {
    this.pausing ??= this.recordPause().finally(() => {
      this.pausing = null;
    });
    return this.pausing;
  }

  private async recordPause(): Promise<void> {
    try {
      if (this.conversation.status !== 'running') {
        return;
      }
      // Recorded before the status change so a failed append fails from running
      await this.emit({ type: 'conversation-paused', payload: { turnIndex: this.turns.length } });
      if (this.conversation.status !== 'running') {
        return;
      }
      this.setStatus('paused');
      logger.info({ conversationId: this.id, turnIndex: this.turns.length }, 'Conversation paused');
    } finally {
      this.pauseRequested = false;
    }
    await this.notify();
  }

  // ============================================
  // Finalization
  // ============================================

  private async fail(error: unknown, speaker: AgentSlot | null, turnIndex: number = this.turns.length): Promise<void> {
    const message = error instanceof Error ? error.message : String(error);

    if (speaker && isProviderError(error)) {
      try {
        await this.emit({
          type: 'provider-error',
          payload: { turnIndex, speaker, code: error.code, message: error.message, retryable: error.retryable },
        });
      } catch (appendError) {
        logger.error({ conversationId: this.id, err: appendError }, 'Failed to record provider error');
      }
    }

    logger.error({ conversationId: this.id, turnIndex, speaker, err: error }, 'Conversation failed');

    if (this.interruptRequested) {
      await this.finalize('interrupted', 'interrupted', message);
      return;
    }
    await this.finalize('failed', endReasonForError(error), message);
  }

  private async finalize(status: TerminalConversationStatus, endReason: EndReason, error?: string): Promise<void> {
    if (isTerminalStatus(this.conversation.status)) {
      return;
    }

    assertTransition(this.conversation.status, status);
    const endedAt = this.now();
    this.conversation.endReason = endReason;
    this.conversation.endedAt = endedAt;
    this.conversation.turnCount = this.turns.length;
    if (error !== undefined) {
      this.conversation.error = error;
    }
    this.setStatus(status);

    const durationMs = endedAt.getTime() - (this.conversation.startedAt ?? endedAt).getTime();

    try {
      await this.emit({
        type: 'conversation-end',
        payload: {
          status,
          endReason,
          totalTurns: this.turns.length,
          finalScore: this.lastScore(),
          durationMs,
          partialTurn: this.partialMessages > 0,
          ...(error !== undefined ? { error } : {}),
        },
      });
    } catch (appendError) {
      // Already terminal in memory; the manifest still records the outcome
      logger.error({ conversationId: this.id, err: appendError }, 'Failed to record conversation end');
      this.conversation.error ??= appendError instanceof Error ? appendError.message : String(appendError);
    }

    logger.info(
      { conversationId: this.id, status, endReason, turns: this.turns.length, finalScore: this.lastScore() },
      'Conversation finished'
    );
    await this.notify();
  }

  // ============================================
  // Helpers
  // ============================================

  private lastScore(): number | null {
    return this.turns[this.turns.length - 1]?.score ?? null;
  }

  private emit(draft: EventDraft): Promise<void> {
    return this.log.append({
      ...draft,
      timestamp: this.now().toISOString(),
      conversationId: this.conversation.id,
    });
  }

  private setStatus(status: ConversationStatus): void {
    this.conversation.status = status;
    this.wakeWaiters();
  }

  private waitForStatusChange(): Promise<void> {
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  private wakeWaiters(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const wake of waiters) {
      wake();
    }
  }

  private async notify(): Promise<void> {
    if (!this.onUpdate) {
      return;
    }
    try {
      await this.onUpdate(this.snapshot());
    } catch (error) {
      logger.warn({ conversationId: this.id, err: error }, 'Conversation update listener failed');
    }
  }
}
