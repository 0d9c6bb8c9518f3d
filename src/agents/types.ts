/**
 * Agent capability seen by the conversation runner
 */

import type { AgentReply, AgentSlot, AIProvider, ConversationMessage } from '../types/index.js';

/**
 * A conversational agent occupying one slot of a conversation.
 *
 * `reply` receives the full ordered history, including the moderator's
 * initial prompt, and either resolves with the next message or rejects with
 * a provider error (rate limit, timeout, authentication, API error).
 */
export interface ConversationAgent {
  readonly provider: AIProvider;
  readonly model: string;
  readonly slot: AgentSlot;
  reply(history: readonly ConversationMessage[]): Promise<AgentReply>;
}

/**
 * Chat role from the agent's own point of view
 */
export type ChatRole = 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

/**
 * Raw result of one provider completion call
 */
export interface ProviderCompletion {
  text: string;
  promptTokens: number;
  completionTokens: number;
}

/**
 * Base options for hosted provider agents
 */
export interface BaseAgentOptions<TClient = unknown> {
  /** API key for authentication (overrides environment variable) */
  apiKey?: string;
  /** Pre-configured client instance (for testing or custom configuration) */
  client?: TClient;
}
