/**
 * Embedding Service
 * Generates embeddings through the OpenAI embeddings endpoint
 */

import OpenAI from 'openai';
import { env } from '../env.js';
import { moduleLogger } from '../utils/logger.js';

const log = moduleLogger('embeddings');

export interface Embedder {
  embed(texts: string[]): Promise<number[][]>;
}

export class OpenAIEmbedder implements Embedder {
  private client: OpenAI;

  constructor(
    apiKey: string,
    private model: string = env.EMBEDDING_MODEL,
    private batchSize = 100,
    baseURL?: string,
  ) {
    this.client = new OpenAI({ apiKey, baseURL: baseURL || undefined, maxRetries: env.MODEL_MAX_RETRIES });
  }

  /**
   * OpenAI accepts up to 2048 inputs per request; batches are sent sequentially
   * to stay under rate limits.
   */
  async embed(texts: string[]): Promise<number[][]> {
    const embeddings: number[][] = [];

    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      const response = await this.client.embeddings.create({
        model: this.model,
        input: batch,
        encoding_format: 'float',
      });

      const ordered = [...response.data].sort((a, b) => a.index - b.index);
      embeddings.push(...ordered.map((d) => d.embedding));
      log.debug({ batchStart: i, batchSize: batch.length }, 'Embedded batch');
    }

    return embeddings;
  }
}

/**
 * Embeddings need an OpenAI key even when chat runs on another provider
 */
export function createEmbedder(): Embedder | null {
  if (!env.OPENAI_API_KEY) {
    log.warn('OPENAI_API_KEY not set - document indexing and search are disabled');
    return null;
  }
  return new OpenAIEmbedder(env.OPENAI_API_KEY, env.EMBEDDING_MODEL, 100, env.OPENAI_BASE_URL);
}
