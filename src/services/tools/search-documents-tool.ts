// Document Search Tool
// Searches the indexed document database; matched document names become citations

import { ToolExecutionError } from '../../utils/errors.js';
import type { DocumentRetriever } from '../retrieval.js';
import { readCount, readString } from './args.js';
import type { ToolDefinition } from './types.js';

export function createSearchDocumentsTool(retriever: DocumentRetriever, defaultResults = 5): ToolDefinition {
  return {
    name: 'search_documents',
    description: 'Search through the PDF document database for relevant information about ML/AI topics. Use this as the primary knowledge base for established concepts.',
    parameters: [
      {
        name: 'query',
        type: 'string',
        description: 'The search query to find relevant document chunks',
        required: true,
      },
      {
        name: 'num_results',
        type: 'integer',
        description: `Number of relevant chunks to retrieve (default: ${defaultResults})`,
        required: false,
        default: defaultResults,
      },
    ],
    execute: async (args) => {
      const query = readString(args, 'query');
      if (!query) {
        throw new ToolExecutionError('Query is required');
      }

      const numResults = readCount(args, 'num_results', defaultResults, 20);
      const matches = await retriever.search(query, numResults);
      const sources = Array.from(new Set(matches.map(m => m.source)));

      return {
        query,
        results: matches.map(m => ({
          content: m.text,
          source: m.source,
          similarity: Number(m.similarity.toFixed(4)),
        })),
        sources,
        total_found: matches.length,
      };
    },
  };
}
