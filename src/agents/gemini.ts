/**
 * Gemini Agent - Google Gen AI generateContent
 */

import { GoogleGenAI, type Content } from '@google/genai';
import type { AgentConfig } from '../types/index.js';
import { BaseAgent } from './base.js';
import type { BaseAgentOptions, ChatMessage, ProviderCompletion } from './types.js';

export type GeminiAgentOptions = BaseAgentOptions<GoogleGenAI>;

export class GeminiAgent extends BaseAgent {
  private client: GoogleGenAI;

  constructor(config: AgentConfig, options?: GeminiAgentOptions) {
    super(config);
    this.client = options?.client ?? new GoogleGenAI({ apiKey: options?.apiKey ?? process.env.GOOGLE_API_KEY });
  }

  protected override async callProviderApi(messages: ChatMessage[]): Promise<ProviderCompletion> {
    // Gemini calls the assistant role 'model'
    const contents: Content[] = messages.map((message) => ({
      role: message.role === 'assistant' ? 'model' : 'user',
      parts: [{ text: message.content }],
    }));

    const response = await this.client.models.generateContent({
      model: this.model,
      contents,
      config: {
        systemInstruction: this.systemPrompt,
        temperature: this.temperature,
        maxOutputTokens: this.maxTokens,
      },
    });

    return {
      text: response.text ?? '',
      promptTokens: response.usageMetadata?.promptTokenCount ?? 0,
      completionTokens: response.usageMetadata?.candidatesTokenCount ?? 0,
    };
  }
}
