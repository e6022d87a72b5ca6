// Chat Service
// Runs a turn for a stored chat and persists the exchange once the turn completes

import type { ConversationMessage } from '../providers/types.js';
import { AppError } from '../utils/errors.js';
import { moduleLogger } from '../utils/logger.js';
import { DEFAULT_CHAT_TITLE } from './conversation/types.js';
import type { ConversationStore, StoredMessage } from './conversation/types.js';
import { renderFooter } from './orchestrator/orchestrator.js';
import type { Orchestrator } from './orchestrator/orchestrator.js';
import type { HandleOptions, TurnEvent, TurnSummary } from './orchestrator/types.js';

const log = moduleLogger('chat-service');

const TITLE_WORDS = 4;

/** First few words of the question, punctuation dropped */
export function titleFromQuestion(question: string): string {
  const words = question.match(/\w+/g) || [];
  return words.slice(0, TITLE_WORDS).join(' ');
}

/** The stored answer: streamed text followed by its footer */
export function composeAnswer(answer: string, footer: string): string {
  return footer ? `${answer}\n\n${footer}` : answer;
}

/**
 * Stored answers are replayed to the model as history, so charts are kept as
 * titles rather than inline images.
 */
function storedAnswer(summary: TurnSummary): string {
  return composeAnswer(summary.answer, renderFooter(summary.toolsUsed, summary.sources, { embedCharts: false }));
}

function toConversationMessage(message: StoredMessage): ConversationMessage {
  return message.role === 'user'
    ? { role: 'user', content: message.content }
    : { role: 'assistant', content: message.content };
}

export class ChatService {
  constructor(
    private store: ConversationStore,
    private orchestrator: Orchestrator,
  ) {}

  /**
   * Run one turn in the chat. The chat must exist; the user message and the
   * answer are stored only when the turn reaches `done`.
   */
  async *runTurn(sessionId: string, userText: string, options: HandleOptions = {}): AsyncGenerator<TurnEvent, void, undefined> {
    const chat = this.store.getChat(sessionId);
    if (!chat) {
      throw AppError.notFound('Chat not found');
    }

    const history = this.store.load(sessionId).map(toConversationMessage);

    for await (const event of this.orchestrator.handle(userText, history, options)) {
      if (event.type === 'done') {
        this.store.append(sessionId, { role: 'user', content: userText });
        this.store.append(sessionId, { role: 'assistant', content: storedAnswer(event.summary) });

        const title = titleFromQuestion(userText);
        if (chat.title === DEFAULT_CHAT_TITLE && title) {
          this.store.updateTitle(sessionId, title);
        }
        log.info({ chatId: sessionId, rounds: event.summary.rounds }, 'Turn stored');
      }
      yield event;
    }
  }
}
