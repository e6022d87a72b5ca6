import { z } from 'zod';
import { env } from '../env.js';

export interface WebSearchHit {
  title: string;
  url: string;
  snippet: string;
}

export interface WebSearchResult {
  query: string;
  hits: WebSearchHit[];
}

export type WebSearchFn = (
  query: string,
  count?: number,
  signal?: AbortSignal,
) => Promise<WebSearchResult | null>;

const BravePayloadSchema = z.object({
  web: z
    .object({
      results: z
        .array(
          z.object({
            title: z.string().optional(),
            url: z.string().optional(),
            description: z.string().optional(),
          }),
        )
        .optional(),
    })
    .optional(),
});

function normalizeText(value: unknown): string {
  return String(value ?? '').trim();
}

// Brave returns highlighted snippets with <strong> markup
function stripTags(value: string): string {
  return value.replace(/<[^>]+>/g, '');
}

export function isWebSearchAvailable(): boolean {
  return env.WEB_SEARCH_ENABLED && !!env.BRAVE_SEARCH_API_KEY;
}

export const searchWeb: WebSearchFn = async (query, count = 5, signal) => {
  if (!isWebSearchAvailable()) return null;

  const q = normalizeText(query);
  if (!q) return null;

  const limit = Math.max(1, Math.min(count, 10));
  const endpoint = new URL('https://api.search.brave.com/res/v1/web/search');
  endpoint.searchParams.set('q', q);
  endpoint.searchParams.set('count', String(limit));

  const response = await fetch(endpoint.toString(), {
    method: 'GET',
    headers: {
      Accept: 'application/json',
      'X-Subscription-Token': env.BRAVE_SEARCH_API_KEY,
    },
    signal,
  });

  if (!response.ok) {
    throw new Error(`Brave Search error (${response.status})`);
  }

  const payload = BravePayloadSchema.parse(await response.json());

  const hits = (payload.web?.results || [])
    .map((item) => ({
      title: normalizeText(item.title),
      url: normalizeText(item.url),
      snippet: stripTags(normalizeText(item.description)),
    }))
    .filter((item) => item.title && item.url)
    .slice(0, limit);

  return {
    query: q,
    hits,
  };
};
