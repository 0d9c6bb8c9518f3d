/**
 * Conversation lifecycle
 *
 * created → running → {paused ⇄ running} → completed | failed | interrupted
 */

import { ConversationStateError } from '../errors/index.js';
import type { ConversationStatus, TerminalConversationStatus } from '../types/index.js';

const TRANSITIONS: Readonly<Record<ConversationStatus, readonly ConversationStatus[]>> = Object.freeze({
  created: ['running'],
  running: ['paused', 'completed', 'failed', 'interrupted'],
  paused: ['running', 'interrupted'],
  completed: [],
  failed: [],
  interrupted: [],
});

export function isTerminalStatus(status: ConversationStatus): status is TerminalConversationStatus {
  switch (status) {
    case 'completed':
    case 'failed':
    case 'interrupted':
      return true;
    case 'created':
    case 'running':
    case 'paused':
      return false;
    default: {
      const unreachable: never = status;
      throw new Error(`Unknown conversation status: ${String(unreachable)}`);
    }
  }
}

export function canTransition(from: ConversationStatus, to: ConversationStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * @throws ConversationStateError when `from → to` is not a legal transition
 */
export function assertTransition(from: ConversationStatus, to: ConversationStatus): void {
  if (!canTransition(from, to)) {
    throw new ConversationStateError(`Cannot transition conversation from '${from}' to '${to}'`);
  }
}
