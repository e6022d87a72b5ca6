// Conversation store contract
// Chats and the user/assistant messages exchanged in them

export type StoredRole = 'user' | 'assistant';

export interface ChatRecord {
  id: string;
  title: string;
  createdAt: string;
  updatedAt: string;
}

export interface StoredMessage {
  role: StoredRole;
  content: string;
  createdAt?: string;
}

export interface ConversationStore {
  createChat(title?: string): ChatRecord;
  getChat(id: string): ChatRecord | null;
  listChats(): ChatRecord[];
  updateTitle(id: string, title: string): void;
  append(sessionId: string, message: StoredMessage): void;
  load(sessionId: string): StoredMessage[];
}

export const DEFAULT_CHAT_TITLE = 'New Chat';
