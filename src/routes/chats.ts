// Chat routes
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { AppError, errorMessage } from '../utils/errors.js';
import type { ConversationStore } from '../services/conversation/types.js';
import type { ChatService } from '../services/chat-service.js';

const CreateChatSchema = z.object({
  title: z.string().min(1).max(255).optional(),
});

const RunTurnSchema = z.object({
  message: z.string().trim().min(1).max(10000),
});

export interface ChatRouteOptions {
  store: ConversationStore;
  chatService: ChatService;
}

export async function chatRoutes(server: FastifyInstance, opts: ChatRouteOptions) {
  const { store, chatService } = opts;

  // GET /v1/chats - List chats, most recently active first
  server.get('/chats', async () => {
    return { chats: store.listChats() };
  });

  // POST /v1/chats - Create a new chat
  server.post('/chats', async (request, reply) => {
    const body = CreateChatSchema.parse(request.body ?? {});
    const chat = store.createChat(body.title);
    return reply.code(201).send({ chat });
  });

  // GET /v1/chats/:id - Get a chat with its messages
  server.get<{ Params: { id: string } }>('/chats/:id', async (request) => {
    const { id } = request.params;

    const chat = store.getChat(id);
    if (!chat) {
      throw AppError.notFound('Chat not found');
    }

    return { chat, messages: store.load(id) };
  });

  // POST /v1/chats/:id/run - Run a turn, streamed as server-sent events
  server.post<{ Params: { id: string } }>('/chats/:id/run', async (request, reply) => {
    const { id } = request.params;
    const { message } = RunTurnSchema.parse(request.body);

    if (!store.getChat(id)) {
      throw AppError.notFound('Chat not found');
    }

    reply.hijack();
    reply.raw.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    });

    const controller = new AbortController();
    reply.raw.on('close', () => {
      if (!reply.raw.writableEnded) {
        request.log.info({ chatId: id }, 'Client disconnected, cancelling turn');
        controller.abort();
      }
    });

    // Helper to send SSE events
    const sendEvent = (type: string, data: unknown) => {
      try {
        reply.raw.write(`event: ${type}\n`);
        reply.raw.write(`data: ${JSON.stringify(data)}\n\n`);
      } catch (e) {
        request.log.error({ err: e, type }, 'Failed to send SSE event');
      }
    };

    try {
      for await (const event of chatService.runTurn(id, message, { signal: controller.signal })) {
        sendEvent(event.type, event);
      }
    } catch (error) {
      request.log.error({ err: error, chatId: id }, 'Turn failed outside the orchestrator');
      sendEvent('error', { type: 'error', code: 'internal_error', message: errorMessage(error) });
    } finally {
      reply.raw.end();
    }
  });
}
