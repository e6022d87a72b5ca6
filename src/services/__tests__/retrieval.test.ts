import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { openDatabase, type SqliteDatabase } from '../../db.js';
import { DocumentIndex, cosineSimilarity } from '../retrieval.js';
import type { Embedder } from '../embeddings.js';
import { AppError } from '../../utils/errors.js';

const VOCABULARY = ['lstm', 'transformer', 'gru'];

// Deterministic embedding: one dimension per vocabulary word, counting occurrences
const keywordEmbedder: Embedder = {
  embed: async (texts) =>
    texts.map(text => {
      const lower = text.toLowerCase();
      return VOCABULARY.map(word => lower.split(word).length - 1);
    }),
};

describe('cosineSimilarity', () => {
  it('should score identical directions as 1 and orthogonal ones as 0', () => {
    expect(cosineSimilarity([1, 2, 3], [2, 4, 6])).toBeCloseTo(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it('should score zero vectors as 0', () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it('should reject vectors of different lengths', () => {
    expect(() => cosineSimilarity([1], [1, 2])).toThrow('Vectors must have the same length');
  });
});

describe('DocumentIndex', () => {
  let db: SqliteDatabase;
  let index: DocumentIndex;

  beforeEach(() => {
    db = openDatabase(':memory:');
    index = new DocumentIndex(db, keywordEmbedder);
  });

  afterEach(() => {
    db.close();
  });

  it('should index documents and list them by name', async () => {
    await index.addDocument('transformer.pdf', 'Transformer models use attention.');
    const lstm = await index.addDocument('lstm.pdf', 'LSTM networks use gates.');

    expect(lstm.name).toBe('lstm.pdf');
    expect(lstm.chunkCount).toBe(1);
    expect(index.listDocuments().map(d => d.name)).toEqual(['lstm.pdf', 'transformer.pdf']);
  });

  it('should rank matching chunks and drop weak matches', async () => {
    await index.addDocument('lstm.pdf', 'LSTM networks use gates.');
    await index.addDocument('transformer.pdf', 'Transformer models use attention.');

    const results = await index.search('How does an LSTM work?');

    expect(results).toHaveLength(1);
    expect(results[0].source).toBe('lstm.pdf');
    expect(results[0].text).toBe('LSTM networks use gates.');
    expect(results[0].similarity).toBeCloseTo(1);
  });

  it('should order results by similarity and apply topK', async () => {
    await index.addDocument('mixed.pdf', 'LSTM and Transformer compared.');
    await index.addDocument('lstm.pdf', 'LSTM networks use gates.');

    const results = await index.search('lstm', 5);
    expect(results.map(r => r.source)).toEqual(['lstm.pdf', 'mixed.pdf']);
    expect(results[1].similarity).toBeCloseTo(Math.SQRT1_2);

    const top = await index.search('lstm', 1);
    expect(top.map(r => r.source)).toEqual(['lstm.pdf']);
  });

  it('should replace the chunks of a re-indexed document', async () => {
    await index.addDocument('notes.pdf', 'LSTM networks use gates.');
    await index.addDocument('notes.pdf', 'GRU simplifies the cell.');

    expect(index.listDocuments()).toHaveLength(1);
    expect(await index.search('lstm')).toEqual([]);
    expect((await index.search('gru')).map(r => r.text)).toEqual(['GRU simplifies the cell.']);
  });

  it('should reject documents without text', async () => {
    await expect(index.addDocument('empty.pdf', '   ')).rejects.toBeInstanceOf(AppError);
  });
});
