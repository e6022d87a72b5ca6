// Citation extraction
// Reads the well-known citation fields out of a tool payload

import { z } from 'zod';
import type { ExtractedSources } from './types.js';

const documentSourcesSchema = z.array(z.string().min(1));

const webResultSchema = z.object({ url: z.string().min(1) });

const chartSchema = z.object({
  title: z.string(),
  mimeType: z.literal('image/svg+xml'),
  data: z.string().min(1),
});

export const CHART_PLACEHOLDER = '[chart attached to the answer]';

function webUrl(result: unknown): string[] {
  const parsed = webResultSchema.safeParse(result);
  return parsed.success ? [parsed.data.url] : [];
}

export function extractCitations(payload: Record<string, unknown>): ExtractedSources {
  const documents = documentSourcesSchema.safeParse(payload.sources);
  const chart = chartSchema.safeParse(payload.chart);

  return {
    documents: documents.success ? documents.data : [],
    web: Array.isArray(payload.results) ? payload.results.flatMap(webUrl) : [],
    charts: chart.success ? [chart.data] : [],
  };
}

/** The payload as the model sees it: chart bytes are swapped for a placeholder */
export function redactCharts(payload: Record<string, unknown>): Record<string, unknown> {
  if (!chartSchema.safeParse(payload.chart).success) return payload;
  return { ...payload, chart: CHART_PLACEHOLDER };
}
