/**
 * Local Agent - deterministic offline model
 *
 * Replies are picked from fixed phrase sets based on the shape of the
 * conversation so far: greeting when there is nothing to answer, a question
 * response, an agreement, an elaboration, and after ten of its own turns
 * short convergent acknowledgements. No network access, no randomness.
 */

import type { AgentConfig, ConversationMessage } from '../types/index.js';
import { BaseAgent } from './base.js';
import type { ChatMessage, ProviderCompletion } from './types.js';

export const LOCAL_RESPONSES = Object.freeze({
  greetings: [
    "Hello! I'm a local model designed for offline experimentation.",
    'Greetings! I provide deterministic responses for testing.',
    'Hi there! I help exercise conversation patterns without API calls.',
  ],
  questions: [
    "That's an interesting question. Let me think about that.",
    "I see what you're asking. Here's my perspective:",
    'Good question! Based on our discussion so far:',
  ],
  agreements: ['I agree with your point.', 'Yes, that makes sense.', 'Absolutely, I see what you mean.'],
  elaborations: [
    'Building on that idea, we might consider',
    'To expand on this further,',
    'Following that line of thought,',
  ],
  convergence: ['Indeed.', 'Agreed.', 'Precisely.', 'Yes.'],
} as const);

/** Own turns after which replies collapse to acknowledgements */
const CONVERGENCE_AFTER_TURNS = 10;

const QUESTION_MARKERS = ['?', 'what', 'how', 'why', 'when', 'where'];
const AGREEMENT_MARKERS = ['yes', 'agree', 'right', 'exactly', 'correct'];

/**
 * 32-bit FNV-1a hash, used for stable phrase selection
 */
export function stableHash(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

function pick(options: readonly string[], index: number): string {
  return options[index % options.length] ?? '';
}

function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

export class LocalAgent extends BaseAgent {
  constructor(config: AgentConfig) {
    super(config);
  }

  protected override async callProviderApi(
    _messages: ChatMessage[],
    history: readonly ConversationMessage[]
  ): Promise<ProviderCompletion> {
    const text = this.compose(history);
    return {
      text,
      promptTokens: history.reduce((sum, message) => sum + countWords(message.text), 0),
      completionTokens: countWords(text),
    };
  }

  private compose(history: readonly ConversationMessage[]): string {
    const last = history[history.length - 1];
    if (!last) {
      return pick(LOCAL_RESPONSES.greetings, 0);
    }

    const ownTurns = history.filter((message) => message.speaker === this.slot).length;
    const lastText = last.text.toLowerCase();

    if (ownTurns > CONVERGENCE_AFTER_TURNS) {
      return pick(LOCAL_RESPONSES.convergence, ownTurns);
    }

    if (QUESTION_MARKERS.some((marker) => lastText.includes(marker))) {
      return this.answerQuestion(lastText);
    }

    if (AGREEMENT_MARKERS.some((marker) => lastText.includes(marker))) {
      return pick(LOCAL_RESPONSES.agreements, ownTurns);
    }

    return this.elaborate(lastText, ownTurns);
  }

  private answerQuestion(prompt: string): string {
    const base = pick(LOCAL_RESPONSES.questions, stableHash(prompt));

    if (prompt.includes('pattern')) {
      return `${base} I notice we're discussing patterns in our conversation.`;
    }
    if (prompt.includes('test')) {
      return `${base} As a local model, I provide consistent responses for experimentation.`;
    }
    if (prompt.includes('convergence')) {
      return `${base} Convergence is an interesting phenomenon where responses become shorter and more aligned.`;
    }
    return `${base} Let me share some thoughts on this topic.`;
  }

  private elaborate(lastText: string, ownTurns: number): string {
    const base = pick(LOCAL_RESPONSES.elaborations, ownTurns);
    const words = countWords(lastText);

    if (words < 10) {
      return `${base} perhaps we could explore this topic in more depth.`;
    }
    if (words > 50) {
      return `${base} I appreciate the detailed perspective you've shared.`;
    }
    return `${base} the points you've raised connect to broader themes in our discussion.`;
  }
}
