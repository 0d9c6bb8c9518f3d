/**
 * Conversation history mapping
 */

import type { AgentSlot, ConversationMessage } from '../../types/index.js';
import type { ChatMessage } from '../types.js';

/**
 * Map conversation history onto chat roles for the agent in `slot`.
 *
 * The agent's own messages become `assistant`, everything else (the other
 * agent and the moderator) becomes `user`. Consecutive messages with the
 * same role are merged with a blank line so providers that require
 * alternating roles accept the result.
 */
export function toChatMessages(history: readonly ConversationMessage[], slot: AgentSlot): ChatMessage[] {
  const messages: ChatMessage[] = [];

  for (const message of history) {
    const role = message.speaker === slot ? 'assistant' : 'user';
    const last = messages[messages.length - 1];
    if (last && last.role === role) {
      last.content = `${last.content}\n\n${message.text}`;
    } else {
      messages.push({ role, content: message.text });
    }
  }

  return messages;
}
