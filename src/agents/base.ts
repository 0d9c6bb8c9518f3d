/**
 * Base Agent - Abstract class for all conversational agents
 */

import { RUNTIME_DEFAULTS } from '../config/runtime.js';
import type { ProviderError } from '../errors/index.js';
import { createLogger } from '../utils/logger.js';
import type {
  AgentConfig,
  AgentReply,
  AgentSlot,
  AIProvider,
  ConversationMessage,
  ModelPricing,
} from '../types/index.js';
import type { ChatMessage, ConversationAgent, ProviderCompletion } from './types.js';
import { calculateCost, convertSDKError, toChatMessages } from './utils/index.js';

const logger = createLogger('BaseAgent');

/**
 * Abstract base class for agents
 *
 * To add a new provider:
 * 1. Extend this class
 * 2. Implement callProviderApi()
 * 3. Add a case to createAgent()
 */
export abstract class BaseAgent implements ConversationAgent {
  readonly provider: AIProvider;
  readonly model: string;
  readonly slot: AgentSlot;

  protected readonly systemPrompt?: string;
  protected readonly temperature: number;
  protected readonly maxTokens: number;
  protected readonly pricing?: ModelPricing;

  constructor(config: AgentConfig) {
    this.provider = config.provider;
    this.model = config.model;
    this.slot = config.slot;
    this.systemPrompt = config.systemPrompt;
    this.temperature = config.temperature ?? RUNTIME_DEFAULTS.TEMPERATURE;
    this.maxTokens = config.maxTokens ?? RUNTIME_DEFAULTS.MAX_TOKENS;
    this.pricing = config.pricing;
  }

  /**
   * Produce the next message for this agent's slot
   *
   * This is a template method that provides common logging, timing, cost and
   * error conversion. Subclasses implement callProviderApi().
   */
  async reply(history: readonly ConversationMessage[]): Promise<AgentReply> {
    const startTime = Date.now();
    const messages = toChatMessages(history, this.slot);

    logger.debug(
      { provider: this.provider, model: this.model, slot: this.slot, messageCount: messages.length },
      'Requesting agent reply'
    );

    try {
      const completion = await this.callProviderApi(messages, history);
      const latencyMs = Date.now() - startTime;
      const usage = {
        promptTokens: completion.promptTokens,
        completionTokens: completion.completionTokens,
        totalTokens: completion.promptTokens + completion.completionTokens,
      };

      logger.debug(
        { provider: this.provider, model: this.model, slot: this.slot, latencyMs, totalTokens: usage.totalTokens },
        'Agent reply received'
      );

      return {
        text: completion.text,
        usage,
        costUsd: calculateCost(this.pricing, usage.promptTokens, usage.completionTokens),
        latencyMs,
      };
    } catch (error) {
      const convertedError = this.convertError(error);
      logger.warn(
        {
          err: convertedError,
          provider: this.provider,
          model: this.model,
          slot: this.slot,
          durationMs: Date.now() - startTime,
        },
        'Agent reply failed'
      );
      throw convertedError;
    }
  }

  /**
   * Call the provider API with the role-mapped history
   *
   * `history` is the untouched conversation for agents that work from the
   * conversation itself rather than chat messages.
   */
  protected abstract callProviderApi(
    messages: ChatMessage[],
    history: readonly ConversationMessage[]
  ): Promise<ProviderCompletion>;

  /**
   * Convert SDK-specific errors to provider errors
   */
  protected convertError(error: unknown): ProviderError {
    return convertSDKError(error, this.provider);
  }

  /**
   * Get agent info for display/debugging
   */
  getInfo(): { provider: AIProvider; model: string; slot: AgentSlot; temperature: number } {
    return {
      provider: this.provider,
      model: this.model,
      slot: this.slot,
      temperature: this.temperature,
    };
  }
}
