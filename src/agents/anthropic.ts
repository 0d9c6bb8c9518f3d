/**
 * Anthropic Agent - Claude models through the Messages API
 */

import Anthropic from '@anthropic-ai/sdk';
import type { MessageParam, TextBlock } from '@anthropic-ai/sdk/resources/messages';
import type { AgentConfig } from '../types/index.js';
import { BaseAgent } from './base.js';
import type { BaseAgentOptions, ChatMessage, ProviderCompletion } from './types.js';

export type AnthropicAgentOptions = BaseAgentOptions<Anthropic>;

export class AnthropicAgent extends BaseAgent {
  private client: Anthropic;

  constructor(config: AgentConfig, options?: AnthropicAgentOptions) {
    super(config);
    this.client =
      options?.client ??
      new Anthropic({
        apiKey: options?.apiKey ?? process.env.ANTHROPIC_API_KEY,
        // Retries and timeouts are applied by the conversation runner
        maxRetries: 0,
      });
  }

  protected override async callProviderApi(messages: ChatMessage[]): Promise<ProviderCompletion> {
    const params: MessageParam[] = messages.map((message) => ({ role: message.role, content: message.content }));

    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: this.maxTokens,
      system: this.systemPrompt,
      messages: params,
      temperature: this.temperature,
    });

    const text = response.content
      .filter((block): block is TextBlock => block.type === 'text')
      .map((block) => block.text)
      .join('');

    return {
      text,
      promptTokens: response.usage.input_tokens,
      completionTokens: response.usage.output_tokens,
    };
  }
}
