/**
 * Core type definitions for Parley
 */

// ============================================
// Provider Types
// ============================================

export type AIProvider = 'anthropic' | 'openai' | 'google' | 'local' | 'scripted';

// ============================================
// Agent Types
// ============================================

/**
 * Seat an agent occupies in a conversation.
 * Agent A always speaks first within a turn.
 */
export type AgentSlot = 'agent_a' | 'agent_b';

/**
 * Author of a message in the conversation history.
 * The moderator carries the initial prompt.
 */
export type Speaker = AgentSlot | 'moderator';

export interface ModelPricing {
  /** USD per million prompt tokens */
  inputPerMillion: number;
  /** USD per million completion tokens */
  outputPerMillion: number;
}

export interface AgentSpec {
  provider: AIProvider;
  model: string;
  temperature?: number;
  maxTokens?: number;
  systemPrompt?: string;
  pricing?: ModelPricing;
  /** Replies for the scripted provider */
  script?: string[];
}

export interface AgentConfig extends AgentSpec {
  slot: AgentSlot;
}

export interface ConversationMessage {
  speaker: Speaker;
  text: string;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/**
 * Result of a single agent reply
 */
export interface AgentReply {
  text: string;
  usage: TokenUsage;
  costUsd: number;
  latencyMs: number;
}

// ============================================
// Conversation Types
// ============================================

export type ConversationStatus = 'created' | 'running' | 'paused' | 'completed' | 'failed' | 'interrupted';

export type TerminalConversationStatus = Extract<ConversationStatus, 'completed' | 'failed' | 'interrupted'>;

export type EndReason =
  | 'convergence_threshold'
  | 'max_turns_reached'
  | 'timeout'
  | 'rate_limit'
  | 'api_error'
  | 'exception'
  | 'interrupted';

/**
 * End reason spellings found in older event logs.
 * Only accepted when reading; never produced.
 *
 * @deprecated resolve with `resolveEndReason` at the ingestion boundary
 */
export type LegacyEndReason = 'high_convergence' | 'max_turns' | 'error' | 'pause';

export type ConvergenceAction = 'stop' | 'warn' | 'notify' | 'continue';

export type BuiltinProfileName = 'balanced' | 'structural' | 'semantic' | 'strict';

export type ConvergenceProfileName = BuiltinProfileName | 'custom';

export type ConvergenceComponent = 'content' | 'structure' | 'sentences' | 'length' | 'punctuation';

export type ConvergenceWeights = Readonly<Record<ConvergenceComponent, number>>;

export type ComponentScores = Record<ConvergenceComponent, number>;

export interface ConvergenceSettings {
  profile: ConvergenceProfileName;
  weights: ConvergenceWeights;
  threshold: number;
  action: ConvergenceAction;
  /** Number of most recent turns the engine compares */
  windowSize: number;
}

export interface Conversation {
  id: string;
  experimentId: string;
  agentA: AgentSpec;
  agentB: AgentSpec;
  initialPrompt: string;
  maxTurns: number;
  status: ConversationStatus;
  /** Present iff status is terminal */
  endReason?: EndReason;
  turnCount: number;
  convergence: ConvergenceSettings;
  createdAt: Date;
  startedAt?: Date;
  endedAt?: Date;
  error?: string;
}

export interface Turn {
  index: number;
  agentA: ConversationMessage;
  agentB: ConversationMessage;
  components: ComponentScores;
  score: number;
  trend: number;
}

/**
 * Running mean of content overlap across all turns of a conversation
 */
export interface CumulativeOverlap {
  turns: number;
  total: number;
  mean: number;
}

// ============================================
// Experiment Types
// ============================================

export type ExperimentStatus =
  | 'created'
  | 'running'
  | 'post_processing'
  | 'completed'
  | 'completed_with_failures'
  | 'failed'
  | 'interrupted';

export interface ExperimentConfig {
  name: string;
  agentA: AgentSpec;
  agentB: AgentSpec;
  initialPrompt: string;
  maxTurns: number;
  repetitions: number;
  maxParallel: number;
  convergence: ConvergenceSettings;
  /** Per-call timeout for agent replies */
  callTimeoutMs: number;
  maxRetries: number;
}

export type TerminalExperimentStatus = Extract<
  ExperimentStatus,
  'completed' | 'completed_with_failures' | 'failed' | 'interrupted'
>;

// ============================================
// Manifest Types
// ============================================

export const MANIFEST_VERSION = 1;

export interface ManifestConversationEntry {
  id: string;
  /** Event log filename, relative to the experiment directory */
  eventLog: string;
  status: ConversationStatus;
  turnsCompleted: number;
  endReason: EndReason | null;
  finalScore: number | null;
  error: string | null;
  startedAt: string | null;
  endedAt: string | null;
}

export interface ManifestCounters {
  total: number;
  created: number;
  running: number;
  paused: number;
  completed: number;
  failed: number;
  interrupted: number;
}

export interface ManifestConfig {
  maxTurns: number;
  temperatureA: number | null;
  temperatureB: number | null;
  initialPrompt: string;
  convergence: ConvergenceSettings;
  maxParallel: number;
  repetitions: number;
  callTimeoutMs: number;
  maxRetries: number;
}

/**
 * Durable projection of an experiment, stored as manifest.json
 */
export interface ExperimentManifest {
  version: typeof MANIFEST_VERSION;
  experimentId: string;
  name: string;
  status: ExperimentStatus;
  createdAt: string;
  startedAt: string | null;
  completedAt: string | null;
  agentA: AgentSpec;
  agentB: AgentSpec;
  config: ManifestConfig;
  counters: ManifestCounters;
  conversations: Record<string, ManifestConversationEntry>;
  error: string | null;
}

export type {
  ConversationEvent,
  ConversationEventType,
  EventAgentInfo,
  EventDraft,
  EventOf,
  EventPayloads,
} from './events.js';
