// SQLite conversation store (better-sqlite3)

import { randomUUID } from 'crypto';
import type { SqliteDatabase } from '../../db.js';
import { AppError } from '../../utils/errors.js';
import { DEFAULT_CHAT_TITLE } from './types.js';
import type { ChatRecord, ConversationStore, StoredMessage, StoredRole } from './types.js';

interface ChatRow {
  id: string;
  title: string;
  created_at: string;
  updated_at: string;
}

interface MessageRow {
  role: string;
  content: string;
  created_at: string;
}

function toChat(row: ChatRow): ChatRecord {
  return {
    id: row.id,
    title: row.title,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function isStoredRole(role: string): role is StoredRole {
  return role === 'user' || role === 'assistant';
}

export class SqliteConversationStore implements ConversationStore {
  constructor(private db: SqliteDatabase) {}

  createChat(title: string = DEFAULT_CHAT_TITLE): ChatRecord {
    const now = new Date().toISOString();
    const chat: ChatRecord = { id: randomUUID(), title, createdAt: now, updatedAt: now };

    this.db
      .prepare('INSERT INTO chats (id, title, created_at, updated_at) VALUES (?, ?, ?, ?)')
      .run(chat.id, chat.title, chat.createdAt, chat.updatedAt);

    return chat;
  }

  getChat(id: string): ChatRecord | null {
    const row = this.db
      .prepare<[string], ChatRow>('SELECT id, title, created_at, updated_at FROM chats WHERE id = ?')
      .get(id);
    return row ? toChat(row) : null;
  }

  listChats(): ChatRecord[] {
    return this.db
      .prepare<[], ChatRow>('SELECT id, title, created_at, updated_at FROM chats ORDER BY updated_at DESC, rowid DESC')
      .all()
      .map(toChat);
  }

  updateTitle(id: string, title: string): void {
    const result = this.db
      .prepare('UPDATE chats SET title = ?, updated_at = ? WHERE id = ?')
      .run(title, new Date().toISOString(), id);
    if (result.changes === 0) {
      throw AppError.notFound('Chat not found');
    }
  }

  append(sessionId: string, message: StoredMessage): void {
    const createdAt = message.createdAt ?? new Date().toISOString();

    const write = this.db.transaction(() => {
      const result = this.db
        .prepare('UPDATE chats SET updated_at = ? WHERE id = ?')
        .run(createdAt, sessionId);
      if (result.changes === 0) {
        throw AppError.notFound('Chat not found');
      }
      this.db
        .prepare('INSERT INTO messages (chat_id, role, content, created_at) VALUES (?, ?, ?, ?)')
        .run(sessionId, message.role, message.content, createdAt);
    });
    write();
  }

  load(sessionId: string): StoredMessage[] {
    const rows = this.db
      .prepare<[string], MessageRow>('SELECT role, content, created_at FROM messages WHERE chat_id = ? ORDER BY id')
      .all(sessionId);

    const messages: StoredMessage[] = [];
    for (const row of rows) {
      if (isStoredRole(row.role)) {
        messages.push({ role: row.role, content: row.content, createdAt: row.created_at });
      }
    }
    return messages;
  }
}
