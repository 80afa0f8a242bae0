import { StateError } from './errors';
import { ContextMessage, ConversationMessage, MessageRole } from './types';

export function createMessage(role: MessageRole, content: string, attachmentRef?: string): ConversationMessage {
  return Object.freeze({
    role,
    content,
    createdAt: new Date(),
    ...(attachmentRef ? { attachmentRef } : {}),
  });
}

/**
 * Ordered user/model history replayed to the model on every refinement.
 * Messages only ever enter in user-then-model pairs.
 */
export class ConversationLog {
  private readonly items: ConversationMessage[] = [];

  get length(): number {
    return this.items.length;
  }

  get messages(): readonly ConversationMessage[] {
    return this.items;
  }

  appendExchange(userMsg: ConversationMessage, modelMsg: ConversationMessage): void {
    if (userMsg.role !== 'user' || modelMsg.role !== 'model') {
      throw new StateError('MalformedExchange', 'Messages must be appended as a user/model pair');
    }
    this.items.push(Object.freeze({ ...userMsg }), Object.freeze({ ...modelMsg }));
  }

  toContextWindow(): ContextMessage[] {
    return this.items.map(m => ({ role: m.role, content: m.content }));
  }

  hasAnyModelMessage(): boolean {
    return this.items.some(m => m.role === 'model');
  }

  /** Rough estimate at ~4 characters per token. */
  estimateTokens(): number {
    const chars = this.items.reduce((sum, m) => sum + m.content.length, 0);
    return Math.ceil(chars / 4);
  }
}
