// Research Report Tool
// Merges document results, web results and an optional comparison into one markdown report

import { z } from 'zod';
import type { ToolDefinition } from './types.js';

const DocumentResultsSchema = z.object({
  results: z
    .array(z.object({ content: z.string().default(''), source: z.string().default('Unknown') }))
    .default([]),
  sources: z.array(z.string()).default([]),
  total_found: z.number().optional(),
});

const WebResultsSchema = z.object({
  results: z
    .array(z.object({ title: z.string().default(''), url: z.string().default(''), snippet: z.string().default('') }))
    .default([]),
  total_found: z.number().optional(),
});

const ComparisonSchema = z.object({ analysis: z.string().optional() });

const PREVIEW_LENGTH = 200;

function preview(content: string): string {
  return content.length > PREVIEW_LENGTH ? `${content.slice(0, PREVIEW_LENGTH)}...` : content;
}

// Loose input from the model: anything unparseable counts as no results
function parseOr<S extends z.ZodTypeAny>(schema: S, value: unknown, fallback: z.infer<S>): z.infer<S> {
  const parsed = schema.safeParse(value ?? {});
  return parsed.success ? parsed.data : fallback;
}

export function buildResearchReport(
  documentResults: unknown,
  webResults: unknown,
  comparisonData?: unknown,
  now: Date = new Date(),
): { report: string; sourceList: string[] } {
  const docs = parseOr(DocumentResultsSchema, documentResults, { results: [], sources: [] });
  const web = parseOr(WebResultsSchema, webResults, { results: [] });
  const comparison = parseOr(ComparisonSchema, comparisonData, {});

  const sections: string[] = [];
  sections.push('# Research Report');
  sections.push(`*Generated on ${now.toISOString().slice(0, 19).replace('T', ' ')}*\n`);

  if (docs.results.length > 0) {
    sections.push('## Document Database Findings');
    sections.push(`Found ${docs.total_found ?? docs.results.length} relevant documents.`);
    docs.results.slice(0, 3).forEach((result, i) => {
      sections.push(`**${i + 1}. ${result.source}**`);
      sections.push(preview(result.content));
      sections.push('');
    });
  }

  if (web.results.length > 0) {
    sections.push('## Current Web Information');
    sections.push(`Found ${web.total_found ?? web.results.length} current sources.`);
    web.results.slice(0, 3).forEach((result, i) => {
      sections.push(`**${i + 1}. ${result.title}**`);
      sections.push(result.snippet);
      sections.push(`*Source: ${result.url}*`);
      sections.push('');
    });
  }

  if (comparison.analysis) {
    sections.push('## Performance Analysis');
    sections.push(comparison.analysis);
  }

  const sourceList = Array.from(
    new Set([...docs.sources, ...web.results.map(r => r.url).filter(Boolean)]),
  );
  if (sourceList.length > 0) {
    sections.push('## Sources');
    sections.push(...sourceList.map(source => `- ${source}`));
  }

  return { report: sections.join('\n'), sourceList };
}

export const researchReportTool: ToolDefinition = {
  name: 'synthesize_research_report',
  description: 'Create a comprehensive report from document and web search results',
  parameters: [
    {
      name: 'document_results',
      type: 'object',
      description: 'Results from document search',
      required: true,
    },
    {
      name: 'web_results',
      type: 'object',
      description: 'Results from web search',
      required: true,
    },
    {
      name: 'comparison_data',
      type: 'object',
      description: 'Optional comparison analysis data',
      required: false,
    },
  ],
  execute: async (args) => {
    const { report, sourceList } = buildResearchReport(
      args.document_results,
      args.web_results,
      args.comparison_data,
    );
    // Named source_list so the executor does not cite these a second time
    return { report, source_list: sourceList };
  },
};
