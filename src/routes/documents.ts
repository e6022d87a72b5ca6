// Document routes
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { AppError } from '../utils/errors.js';
import type { DocumentIndex } from '../services/retrieval.js';

const AddDocumentSchema = z.object({
  name: z.string().trim().min(1).max(255),
  content: z.string().min(1),
});

export interface DocumentRouteOptions {
  documents: DocumentIndex | null;
}

export async function documentRoutes(server: FastifyInstance, opts: DocumentRouteOptions) {
  const requireIndex = (): DocumentIndex => {
    if (!opts.documents) {
      throw AppError.serviceUnavailable('Document index unavailable: OPENAI_API_KEY is required for embeddings');
    }
    return opts.documents;
  };

  // GET /v1/documents - List indexed documents
  server.get('/documents', async () => {
    return { documents: requireIndex().listDocuments() };
  });

  // POST /v1/documents - Index (or re-index) a document's text
  server.post('/documents', async (request, reply) => {
    const body = AddDocumentSchema.parse(request.body);
    const document = await requireIndex().addDocument(body.name, body.content);
    return reply.code(201).send({ document });
  });
}
