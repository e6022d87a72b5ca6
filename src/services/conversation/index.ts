export { SqliteConversationStore } from './sqlite-store.js';
export { DEFAULT_CHAT_TITLE } from './types.js';
export type { ChatRecord, ConversationStore, StoredMessage, StoredRole } from './types.js';
