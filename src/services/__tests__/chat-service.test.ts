import { describe, it, expect } from 'vitest';
import { ChatService, composeAnswer, titleFromQuestion } from '../chat-service.js';
import { DEFAULT_CHAT_TITLE } from '../conversation/types.js';
import type { ChatRecord, ConversationStore, StoredMessage } from '../conversation/types.js';
import { Orchestrator } from '../orchestrator/orchestrator.js';
import { ToolRegistry } from '../tools/registry.js';
import { performanceChartTool } from '../tools/performance-chart-tool.js';
import { ModelServiceError } from '../../utils/errors.js';
import { ScriptedModel, collect, toolCalls } from '../orchestrator/__tests__/scripted-model.js';

class MemoryStore implements ConversationStore {
  chats = new Map<string, ChatRecord>();
  messages = new Map<string, StoredMessage[]>();

  createChat(title: string = DEFAULT_CHAT_TITLE): ChatRecord {
    const chat = { id: `chat-${this.chats.size + 1}`, title, createdAt: 'now', updatedAt: 'now' };
    this.chats.set(chat.id, chat);
    this.messages.set(chat.id, []);
    return chat;
  }
  getChat(id: string): ChatRecord | null {
    return this.chats.get(id) ?? null;
  }
  listChats(): ChatRecord[] {
    return [...this.chats.values()];
  }
  updateTitle(id: string, title: string): void {
    const chat = this.chats.get(id);
    if (chat) this.chats.set(id, { ...chat, title });
  }
  append(sessionId: string, message: StoredMessage): void {
    this.messages.get(sessionId)?.push(message);
  }
  load(sessionId: string): StoredMessage[] {
    return [...(this.messages.get(sessionId) ?? [])];
  }
}

function setup(model: ScriptedModel) {
  const registry = new ToolRegistry();
  registry.register({
    name: 'search_documents',
    description: 'Search',
    parameters: [],
    execute: async () => ({ sources: ['p1.pdf'] }),
  });
  registry.register(performanceChartTool);
  const store = new MemoryStore();
  const service = new ChatService(store, new Orchestrator(model, registry));
  return { store, service };
}

describe('titleFromQuestion', () => {
  it('should keep the first four words', () => {
    expect(titleFromQuestion('What is an LSTM, really?')).toBe('What is an LSTM');
    expect(titleFromQuestion('Hi!')).toBe('Hi');
    expect(titleFromQuestion('?!')).toBe('');
  });
});

describe('composeAnswer', () => {
  it('should append the footer after a blank line', () => {
    expect(composeAnswer('Answer.', '**Sources:** a.pdf')).toBe('Answer.\n\n**Sources:** a.pdf');
    expect(composeAnswer('Answer.', '')).toBe('Answer.');
  });
});

describe('ChatService', () => {
  it('should persist the exchange and title the chat after a completed turn', async () => {
    const model = new ScriptedModel([toolCalls(['c1', 'search_documents', {}])], ['LSTM uses gates.']);
    const { store, service } = setup(model);
    const chat = store.createChat();

    const events = await collect(service.runTurn(chat.id, 'What is an LSTM cell?'));

    expect(events[events.length - 1].type).toBe('done');
    expect(store.load(chat.id)).toEqual([
      { role: 'user', content: 'What is an LSTM cell?' },
      {
        role: 'assistant',
        content: 'LSTM uses gates.\n\n**Tools used:** search_documents\n**Sources:** p1.pdf',
      },
    ]);
    expect(store.getChat(chat.id)?.title).toBe('What is an LSTM');
  });

  it('should pass stored history to the model and keep a custom title', async () => {
    const model = new ScriptedModel([]);
    const { store, service } = setup(model);
    const chat = store.createChat('Recurrent nets');
    store.append(chat.id, { role: 'user', content: 'What is LSTM?' });
    store.append(chat.id, { role: 'assistant', content: 'A recurrent network.' });

    await collect(service.runTurn(chat.id, 'And GRU?'));

    expect(model.completeCalls[0].messages.slice(1)).toEqual([
      { role: 'user', content: 'What is LSTM?' },
      { role: 'assistant', content: 'A recurrent network.' },
      { role: 'user', content: 'And GRU?' },
    ]);
    expect(store.getChat(chat.id)?.title).toBe('Recurrent nets');
    expect(store.load(chat.id)).toHaveLength(4);
  });

  it('should store charts by title so later turns do not replay the image', async () => {
    const model = new ScriptedModel(
      [
        toolCalls(['c1', 'create_performance_chart', {
          metrics_data: [
            { name: 'LSTM', metrics: { accuracy: 88 } },
            { name: 'GRU', metrics: { accuracy: 86 } },
          ],
          title: 'Accuracy',
        }]),
      ],
      ['GRU trails LSTM.'],
    );
    const { store, service } = setup(model);
    const chat = store.createChat();

    const events = await collect(service.runTurn(chat.id, 'Chart LSTM vs GRU accuracy'));
    const footer = events.flatMap(e => (e.type === 'footer' ? [e.text] : []));
    expect(footer[0]).toContain('![Accuracy](data:image/svg+xml;base64,');

    await collect(service.runTurn(chat.id, 'And why?'));

    const replayed = model.completeCalls[2].messages[2];
    expect(replayed).toEqual({
      role: 'assistant',
      content: 'GRU trails LSTM.\n\n**Tools used:** create_performance_chart\n**Chart:** Accuracy',
    });
  });

  it('should store nothing when the turn fails', async () => {
    const model = new ScriptedModel([ModelServiceError.unavailable('scripted', 'down')]);
    const { store, service } = setup(model);
    const chat = store.createChat();

    const events = await collect(service.runTurn(chat.id, 'What is LSTM?'));

    expect(events[events.length - 1]).toEqual({ type: 'error', code: 'service_unavailable', message: 'down' });
    expect(store.load(chat.id)).toEqual([]);
    expect(store.getChat(chat.id)?.title).toBe(DEFAULT_CHAT_TITLE);
  });

  it('should reject unknown chats', async () => {
    const { service } = setup(new ScriptedModel([]));

    await expect(collect(service.runTurn('missing', 'hi'))).rejects.toThrow('Chat not found');
  });
});
