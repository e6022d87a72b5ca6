// Web Search Tool
// Wraps the web search service as a tool; result URLs become web citations

import { ToolExecutionError } from '../../utils/errors.js';
import type { WebSearchFn } from '../web-search.js';
import { readCount, readString } from './args.js';
import type { ToolDefinition } from './types.js';

export function createWebSearchTool(search: WebSearchFn): ToolDefinition {
  return {
    name: 'search_web',
    description: 'Search the web for current information about AI/ML topics, latest research and benchmarks. Use this when the document database lacks recent or detailed information.',
    parameters: [
      {
        name: 'query',
        type: 'string',
        description: 'The search query for current information',
        required: true,
      },
      {
        name: 'num_results',
        type: 'integer',
        description: 'Number of search results to return (1-10, default: 5)',
        required: false,
        default: 5,
      },
    ],
    execute: async (args, context) => {
      const query = readString(args, 'query');
      if (!query) {
        throw new ToolExecutionError('Query is required');
      }

      const numResults = readCount(args, 'num_results', 5, 10);
      const result = await search(query, numResults, context.signal);

      if (!result) {
        throw new ToolExecutionError('Web search is not enabled or API key is missing');
      }

      return {
        query: result.query,
        results: result.hits.map((hit, idx) => ({
          rank: idx + 1,
          title: hit.title,
          url: hit.url,
          snippet: hit.snippet,
        })),
        total_found: result.hits.length,
      };
    },
  };
}
