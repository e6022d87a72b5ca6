// Tool System Initialization
// Registers the capability tools available to the orchestrator

import { env } from '../../env.js';
import { moduleLogger } from '../../utils/logger.js';
import type { DocumentRetriever } from '../retrieval.js';
import type { WebSearchFn } from '../web-search.js';
import { ToolRegistry } from './registry.js';
import { createSearchDocumentsTool } from './search-documents-tool.js';
import { createWebSearchTool } from './web-search-tool.js';
import { extractMetricsTool } from './extract-metrics-tool.js';
import { performanceComparisonTool } from './performance-comparison-tool.js';
import { performanceChartTool } from './performance-chart-tool.js';
import { researchReportTool } from './research-report-tool.js';

export { ToolRegistry } from './registry.js';
export type { OpenAIFunctionTool } from './registry.js';
export type {
  ChartArtifact,
  ToolArguments,
  ToolContext,
  ToolDefinition,
  ToolParameter,
  ToolPayload,
  ToolSchema,
} from './types.js';

const log = moduleLogger('tools');

export interface ToolDependencies {
  retriever: DocumentRetriever | null;
  searchWeb: WebSearchFn | null;
  documentSearchResults?: number;
}

export function initializeTools(registry: ToolRegistry, deps: ToolDependencies): ToolRegistry {
  if (!env.TOOLS_ENABLED) {
    log.info('Tools disabled - the model will answer without tool calls');
    return registry;
  }

  // Document search needs the embedding-backed index
  if (deps.retriever) {
    registry.register(createSearchDocumentsTool(deps.retriever, deps.documentSearchResults));
  }

  if (deps.searchWeb) {
    registry.register(createWebSearchTool(deps.searchWeb));
  }

  registry.register(extractMetricsTool);
  registry.register(performanceComparisonTool);
  registry.register(performanceChartTool);
  registry.register(researchReportTool);

  const names = registry.getAll().map(t => t.name);
  log.info({ tools: names }, `Tool system initialized with ${names.length} tool(s)`);

  return registry;
}
