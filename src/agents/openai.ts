/**
 * OpenAI Agent - chat completions
 */

import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import type { AgentConfig } from '../types/index.js';
import { BaseAgent } from './base.js';
import type { BaseAgentOptions, ChatMessage, ProviderCompletion } from './types.js';

export type OpenAIAgentOptions = BaseAgentOptions<OpenAI>;

export class OpenAIAgent extends BaseAgent {
  private client: OpenAI;

  constructor(config: AgentConfig, options?: OpenAIAgentOptions) {
    super(config);
    this.client =
      options?.client ??
      new OpenAI({
        apiKey: options?.apiKey ?? process.env.OPENAI_API_KEY,
        maxRetries: 0,
      });
  }

  protected override async callProviderApi(messages: ChatMessage[]): Promise<ProviderCompletion> {
    const params: ChatCompletionMessageParam[] = [];
    if (this.systemPrompt) {
      params.push({ role: 'system', content: this.systemPrompt });
    }
    for (const message of messages) {
      params.push({ role: message.role, content: message.content });
    }

    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: params,
      temperature: this.temperature,
      max_completion_tokens: this.maxTokens,
    });

    return {
      text: response.choices[0]?.message.content ?? '',
      promptTokens: response.usage?.prompt_tokens ?? 0,
      completionTokens: response.usage?.completion_tokens ?? 0,
    };
  }
}
