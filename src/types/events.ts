/**
 * Event records written to per-conversation logs
 *
 * One record per line. Records are never rewritten; the log is the
 * authoritative history of a conversation.
 */

import type {
  AgentSlot,
  AIProvider,
  ComponentScores,
  ConvergenceAction,
  ConvergenceProfileName,
  ConvergenceWeights,
  EndReason,
  TerminalConversationStatus,
  TokenUsage,
} from './index.js';

export interface EventAgentInfo {
  provider: AIProvider;
  model: string;
  temperature?: number;
}

export interface EventPayloads {
  'conversation-start': {
    experimentId: string;
    agentA: EventAgentInfo;
    agentB: EventAgentInfo;
    initialPrompt: string;
    maxTurns: number;
    convergence: {
      profile: ConvergenceProfileName;
      weights: ConvergenceWeights;
      threshold: number;
      action: ConvergenceAction;
    };
  };
  'turn-start': {
    turnIndex: number;
  };
  'message-complete': {
    turnIndex: number;
    speaker: AgentSlot;
    text: string;
    usage: TokenUsage;
    costUsd: number;
    latencyMs: number;
  };
  'turn-complete': {
    turnIndex: number;
    components: ComponentScores;
    score: number;
    trend: number;
    cumulativeOverlap: number;
  };
  'convergence-warning': {
    turnIndex: number;
    score: number;
    threshold: number;
  };
  'convergence-notification': {
    turnIndex: number;
    score: number;
    threshold: number;
  };
  'conversation-paused': {
    turnIndex: number;
  };
  'conversation-resumed': {
    turnIndex: number;
  };
  'provider-error': {
    turnIndex: number;
    speaker: AgentSlot;
    code: string;
    message: string;
    retryable: boolean;
  };
  'conversation-end': {
    status: TerminalConversationStatus;
    endReason: EndReason;
    totalTurns: number;
    finalScore: number | null;
    durationMs: number;
    partialTurn: boolean;
    error?: string;
    /** Verbatim end reason, set by readers when an older spelling was resolved */
    endReasonRaw?: string;
  };
}

export type ConversationEventType = keyof EventPayloads;

/**
 * A single event record, discriminated on `type`
 */
export type ConversationEvent = {
  [K in ConversationEventType]: {
    type: K;
    timestamp: string;
    conversationId: string;
    payload: EventPayloads[K];
  };
}[ConversationEventType];

/**
 * Narrow an event to one type
 */
export type EventOf<K extends ConversationEventType> = Extract<ConversationEvent, { type: K }>;

/**
 * An event before the writer stamps it with timestamp and conversation id
 */
export type EventDraft = {
  [K in ConversationEventType]: { type: K; payload: EventPayloads[K] };
}[ConversationEventType];
