import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { openDatabase, type SqliteDatabase } from '../../../db.js';
import { SqliteConversationStore } from '../sqlite-store.js';
import { AppError } from '../../../utils/errors.js';

describe('SqliteConversationStore', () => {
  let db: SqliteDatabase;
  let store: SqliteConversationStore;

  beforeEach(() => {
    db = openDatabase(':memory:');
    store = new SqliteConversationStore(db);
  });

  afterEach(() => {
    db.close();
  });

  it('should create chats titled New Chat by default', () => {
    const chat = store.createChat();

    expect(chat.title).toBe('New Chat');
    expect(store.getChat(chat.id)).toEqual(chat);
  });

  it('should return null for an unknown chat', () => {
    expect(store.getChat('missing')).toBeNull();
  });

  it('should append and load messages in order', () => {
    const chat = store.createChat('LSTM');
    store.append(chat.id, { role: 'user', content: 'What is LSTM?' });
    store.append(chat.id, { role: 'assistant', content: 'A recurrent network.' });

    expect(store.load(chat.id).map(m => [m.role, m.content])).toEqual([
      ['user', 'What is LSTM?'],
      ['assistant', 'A recurrent network.'],
    ]);
  });

  it('should keep histories of different chats apart', () => {
    const a = store.createChat('A');
    const b = store.createChat('B');
    store.append(a.id, { role: 'user', content: 'in a' });

    expect(store.load(b.id)).toEqual([]);
  });

  it('should refuse messages for a missing chat', () => {
    expect(() => store.append('missing', { role: 'user', content: 'x' })).toThrow(AppError);
  });

  it('should update titles', () => {
    const chat = store.createChat();
    store.updateTitle(chat.id, 'What is LSTM');

    expect(store.getChat(chat.id)?.title).toBe('What is LSTM');
    expect(() => store.updateTitle('missing', 'x')).toThrow('Chat not found');
  });

  it('should list the most recently active chat first', () => {
    const older = store.createChat('older');
    const newer = store.createChat('newer');
    store.append(older.id, { role: 'user', content: 'bump', createdAt: '2999-01-01T00:00:00.000Z' });

    expect(store.listChats().map(c => c.id)).toEqual([older.id, newer.id]);
  });
});
