/**
 * Agent adapters
 */

export { BaseAgent } from './base.js';
export type { BaseAgentOptions, ChatMessage, ChatRole, ConversationAgent, ProviderCompletion } from './types.js';
export { AnthropicAgent, type AnthropicAgentOptions } from './anthropic.js';
export { OpenAIAgent, type OpenAIAgentOptions } from './openai.js';
export { GeminiAgent, type GeminiAgentOptions } from './gemini.js';
export { LocalAgent, LOCAL_RESPONSES } from './local.js';
export { ScriptedAgent, type ScriptedAgentOptions, type ScriptStep } from './scripted.js';
export { createAgent, assertAgentsAvailable } from './factory.js';
export * from './utils/index.js';
