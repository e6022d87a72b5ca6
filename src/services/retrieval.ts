/**
 * Document index
 * Stores embedded chunks of indexed documents and ranks them by cosine similarity
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import type { SqliteDatabase } from '../db.js';
import { AppError } from '../utils/errors.js';
import { moduleLogger } from '../utils/logger.js';
import { chunkText } from './chunking.js';
import type { Embedder } from './embeddings.js';

const log = moduleLogger('retrieval');

export interface RetrievalResult {
  chunkId: number;
  source: string;
  text: string;
  similarity: number;
}

export interface IndexedDocument {
  id: string;
  name: string;
  chunkCount: number;
  createdAt: string;
}

export interface DocumentRetriever {
  search(query: string, topK?: number, minSimilarity?: number): Promise<RetrievalResult[]>;
}

const EmbeddingSchema = z.array(z.number());

/**
 * Calculate cosine similarity between two vectors
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error('Vectors must have the same length');
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  normA = Math.sqrt(normA);
  normB = Math.sqrt(normB);

  if (normA === 0 || normB === 0) {
    return 0;
  }

  return dotProduct / (normA * normB);
}

interface ChunkRow {
  id: number;
  text: string;
  embedding: string | null;
  name: string;
}

interface DocumentRow {
  id: string;
  name: string;
  chunk_count: number;
  created_at: string;
}

export class DocumentIndex implements DocumentRetriever {
  constructor(
    private db: SqliteDatabase,
    private embedder: Embedder,
  ) {}

  /**
   * Index a document's text. Re-indexing a name replaces its previous chunks.
   */
  async addDocument(name: string, content: string): Promise<IndexedDocument> {
    const chunks = chunkText(content);
    if (chunks.length === 0) {
      throw AppError.validationError(`Document "${name}" has no text to index`);
    }

    const vectors = await this.embedder.embed(chunks.map(c => c.text));
    if (vectors.length !== chunks.length) {
      throw AppError.internal(`Expected ${chunks.length} embeddings, received ${vectors.length}`);
    }

    const document: IndexedDocument = {
      id: randomUUID(),
      name,
      chunkCount: chunks.length,
      createdAt: new Date().toISOString(),
    };

    const insert = this.db.transaction(() => {
      this.db.prepare('DELETE FROM documents WHERE name = ?').run(name);
      this.db
        .prepare('INSERT INTO documents (id, name, chunk_count, created_at) VALUES (?, ?, ?, ?)')
        .run(document.id, document.name, document.chunkCount, document.createdAt);

      const insertChunk = this.db.prepare(
        'INSERT INTO document_chunks (document_id, position, text, embedding) VALUES (?, ?, ?, ?)',
      );
      chunks.forEach((chunk, i) => {
        insertChunk.run(document.id, chunk.position, chunk.text, JSON.stringify(vectors[i]));
      });
    });
    insert();

    log.info({ name, chunks: chunks.length }, 'Document indexed');
    return document;
  }

  listDocuments(): IndexedDocument[] {
    const rows = this.db
      .prepare<[], DocumentRow>('SELECT id, name, chunk_count, created_at FROM documents ORDER BY name')
      .all();
    return rows.map(row => ({
      id: row.id,
      name: row.name,
      chunkCount: row.chunk_count,
      createdAt: row.created_at,
    }));
  }

  async search(query: string, topK = 5, minSimilarity = 0.2): Promise<RetrievalResult[]> {
    const [queryEmbedding] = await this.embedder.embed([query]);
    if (!queryEmbedding) {
      return [];
    }

    const rows = this.db
      .prepare<[], ChunkRow>(
        `SELECT c.id, c.text, c.embedding, d.name
         FROM document_chunks c
         JOIN documents d ON d.id = c.document_id`,
      )
      .all();

    const results: RetrievalResult[] = [];

    for (const row of rows) {
      if (!row.embedding) continue;

      const parsed = EmbeddingSchema.safeParse(JSON.parse(row.embedding));
      if (!parsed.success || parsed.data.length !== queryEmbedding.length) {
        log.warn({ chunkId: row.id }, 'Skipping chunk with unusable embedding');
        continue;
      }

      const similarity = cosineSimilarity(queryEmbedding, parsed.data);
      if (similarity >= minSimilarity) {
        results.push({
          chunkId: row.id,
          source: row.name,
          text: row.text,
          similarity,
        });
      }
    }

    results.sort((a, b) => b.similarity - a.similarity);
    return results.slice(0, topK);
  }
}
