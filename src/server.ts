// HTTP server
// Builds the Fastify app around already constructed services so tests can inject their own

import Fastify from 'fastify';
import type { FastifyInstance, FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import { ZodError } from 'zod';
import { AppError, ErrorCode, formatErrorResponse } from './utils/errors.js';
import type { ErrorResponse } from './utils/errors.js';
import { loggerOptions } from './utils/logger.js';
import { chatRoutes } from './routes/chats.js';
import { documentRoutes } from './routes/documents.js';
import { toolRoutes } from './routes/tools.js';
import type { ConversationStore } from './services/conversation/types.js';
import type { ChatService } from './services/chat-service.js';
import type { DocumentIndex } from './services/retrieval.js';
import type { ToolRegistry } from './services/tools/registry.js';

export interface ServerDependencies {
  store: ConversationStore;
  chatService: ChatService;
  documents: DocumentIndex | null;
  registry: ToolRegistry;
}

export interface ServerOptions {
  logger?: FastifyServerOptions['logger'];
  corsOrigins?: string[];
}

const DEFAULT_CORS_ORIGINS = [
  'http://localhost:3000',
  'http://127.0.0.1:3000',
  'http://localhost:8080',
  'http://127.0.0.1:8080',
];

export async function buildServer(deps: ServerDependencies, options: ServerOptions = {}): Promise<FastifyInstance> {
  const server = Fastify({
    logger: options.logger ?? loggerOptions,
  });

  await server.register(cors, {
    origin: options.corsOrigins ?? DEFAULT_CORS_ORIGINS,
  });

  server.setErrorHandler((error, request, reply) => {
    if (error instanceof AppError) {
      return reply.code(error.statusCode).send(formatErrorResponse(error));
    }

    if (error instanceof ZodError) {
      const body: ErrorResponse = {
        error: ErrorCode.VALIDATION_ERROR,
        message: 'Invalid request body',
        statusCode: 400,
        details: error.errors,
      };
      return reply.code(400).send(body);
    }

    // Fastify's own 4xx errors (bad JSON, payload too large)
    if (error.statusCode && error.statusCode < 500) {
      const body: ErrorResponse = {
        error: ErrorCode.BAD_REQUEST,
        message: error.message,
        statusCode: error.statusCode,
      };
      return reply.code(error.statusCode).send(body);
    }

    request.log.error({ err: error }, 'Unhandled request error');
    return reply.code(500).send(formatErrorResponse(AppError.internal()));
  });

  server.get('/v1/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: '1.0.0',
    };
  });

  await server.register(chatRoutes, { prefix: '/v1', store: deps.store, chatService: deps.chatService });
  await server.register(documentRoutes, { prefix: '/v1', documents: deps.documents });
  await server.register(toolRoutes, { prefix: '/v1', registry: deps.registry });

  return server;
}
