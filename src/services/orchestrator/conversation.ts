// Conversation
// Append-only message log for a single turn

import type { ConversationMessage } from '../../providers/types.js';

export class Conversation {
  private readonly items: ConversationMessage[] = [];

  constructor(initial: readonly ConversationMessage[] = []) {
    for (const message of initial) {
      this.append(message);
    }
  }

  append(message: ConversationMessage): void {
    this.items.push(Object.freeze({ ...message }));
  }

  get messages(): readonly ConversationMessage[] {
    return this.items;
  }

  get length(): number {
    return this.items.length;
  }
}
