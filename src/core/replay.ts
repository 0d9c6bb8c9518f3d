/**
 * Event log replay
 *
 * Folds the events of one conversation into a snapshot of its state. Used by
 * the importer and by status queries; it never touches the log itself.
 */

import { PersistenceError } from '../errors/index.js';
import type {
  AgentSlot,
  ComponentScores,
  ConversationEvent,
  ConversationStatus,
  EndReason,
  EventAgentInfo,
  EventOf,
  TokenUsage,
} from '../types/index.js';

export interface ReplayedMessage {
  turnIndex: number;
  speaker: AgentSlot;
  text: string;
  usage: TokenUsage;
  costUsd: number;
  latencyMs: number;
  timestamp: string;
}

export interface ReplayedTurn {
  index: number;
  agentA: ReplayedMessage;
  agentB: ReplayedMessage;
  components: ComponentScores;
  score: number;
  trend: number;
  cumulativeOverlap: number;
  completedAt: string;
}

export interface ConversationSnapshot {
  conversationId: string | null;
  experimentId: string | null;
  status: ConversationStatus;
  endReason: EndReason | null;
  /** End reason as written in the log */
  endReasonRaw: string | null;
  agentA: EventAgentInfo | null;
  agentB: EventAgentInfo | null;
  startedAt: string | null;
  endedAt: string | null;
  turns: ReplayedTurn[];
  /** Replies of a turn that never completed */
  partialMessages: ReplayedMessage[];
  lastScore: number | null;
  usage: TokenUsage;
  costUsd: number;
  warnings: number;
  notifications: number;
  providerErrors: number;
  error: string | null;
}

function emptySnapshot(): ConversationSnapshot {
  return {
    conversationId: null,
    experimentId: null,
    status: 'created',
    endReason: null,
    endReasonRaw: null,
    agentA: null,
    agentB: null,
    startedAt: null,
    endedAt: null,
    turns: [],
    partialMessages: [],
    lastScore: null,
    usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
    costUsd: 0,
    warnings: 0,
    notifications: 0,
    providerErrors: 0,
    error: null,
  };
}

function inconsistent(event: ConversationEvent, detail: string): PersistenceError {
  return new PersistenceError(
    `Inconsistent event log for conversation ${event.conversationId}: ${detail}`,
    { code: 'INCONSISTENT_EVENT_LOG' }
  );
}

class Replayer {
  readonly snapshot = emptySnapshot();
  private readonly pending = new Map<number, Partial<Record<AgentSlot, ReplayedMessage>>>();

  apply(event: ConversationEvent): void {
    this.snapshot.conversationId ??= event.conversationId;

    switch (event.type) {
      case 'conversation-start':
        this.snapshot.experimentId = event.payload.experimentId;
        this.snapshot.agentA = event.payload.agentA;
        this.snapshot.agentB = event.payload.agentB;
        this.snapshot.startedAt = event.timestamp;
        this.snapshot.status = 'running';
        break;
      case 'turn-start':
        this.pending.set(event.payload.turnIndex, {});
        break;
      case 'message-complete':
        this.onMessage(event);
        break;
      case 'turn-complete':
        this.onTurnComplete(event);
        break;
      case 'convergence-warning':
        this.snapshot.warnings++;
        break;
      case 'convergence-notification':
        this.snapshot.notifications++;
        break;
      case 'conversation-paused':
        this.snapshot.status = 'paused';
        break;
      case 'conversation-resumed':
        this.snapshot.status = 'running';
        break;
      case 'provider-error':
        this.snapshot.providerErrors++;
        break;
      case 'conversation-end':
        this.snapshot.status = event.payload.status;
        this.snapshot.endReason = event.payload.endReason;
        this.snapshot.endReasonRaw = event.payload.endReasonRaw ?? event.payload.endReason;
        this.snapshot.endedAt = event.timestamp;
        this.snapshot.error = event.payload.error ?? null;
        break;
      default: {
        const unreachable: never = event;
        throw new Error(`Unhandled event: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  finish(): ConversationSnapshot {
    const partial = [...this.pending.values()].flatMap((slots) =>
      [slots.agent_a, slots.agent_b].filter((m): m is ReplayedMessage => m !== undefined)
    );
    this.snapshot.partialMessages = partial;
    return this.snapshot;
  }

  private onMessage(event: EventOf<'message-complete'>): void {
    const { turnIndex, speaker, text, usage, costUsd, latencyMs } = event.payload;
    const slots = this.pending.get(turnIndex) ?? {};
    slots[speaker] = { turnIndex, speaker, text, usage, costUsd, latencyMs, timestamp: event.timestamp };
    this.pending.set(turnIndex, slots);

    const total = this.snapshot.usage;
    total.promptTokens += usage.promptTokens;
    total.completionTokens += usage.completionTokens;
    total.totalTokens += usage.totalTokens;
    this.snapshot.costUsd += costUsd;
  }

  private onTurnComplete(event: EventOf<'turn-complete'>): void {
    const { turnIndex, components, score, trend, cumulativeOverlap } = event.payload;
    const slots = this.pending.get(turnIndex);
    if (!slots?.agent_a || !slots.agent_b) {
      throw inconsistent(event, `turn ${turnIndex} completed without both messages`);
    }
    if (turnIndex !== this.snapshot.turns.length) {
      throw inconsistent(event, `turn ${turnIndex} completed out of order`);
    }

    this.pending.delete(turnIndex);
    this.snapshot.turns.push({
      index: turnIndex,
      agentA: slots.agent_a,
      agentB: slots.agent_b,
      components,
      score,
      trend,
      cumulativeOverlap,
      completedAt: event.timestamp,
    });
    this.snapshot.lastScore = score;
  }
}

/**
 * Fold a conversation's events, in log order, into a snapshot
 *
 * @throws PersistenceError (INCONSISTENT_EVENT_LOG) when turns do not line up
 */
export function replayConversation(events: Iterable<ConversationEvent>): ConversationSnapshot {
  const replayer = new Replayer();
  for (const event of events) {
    replayer.apply(event);
  }
  return replayer.finish();
}
