// Metric Extraction Tool
// Pulls numeric performance figures (accuracy, speed, memory...) out of free text

import { extractMetrics } from '../metrics.js';
import { readString } from './args.js';
import type { ToolDefinition } from './types.js';

export const extractMetricsTool: ToolDefinition = {
  name: 'extract_performance_metrics',
  description: 'Extract numerical performance metrics (accuracy, speed, memory, etc.) from text when quantitative data is available for analysis.',
  parameters: [
    {
      name: 'text',
      type: 'string',
      description: 'Text containing performance information',
      required: true,
    },
    {
      name: 'technology',
      type: 'string',
      description: 'Name of the technology being analyzed',
      required: true,
    },
  ],
  execute: async (args) => {
    const text = readString(args, 'text');
    const metrics = extractMetrics(text);

    return {
      name: readString(args, 'technology'),
      metrics,
      source_text_length: text.length,
      metrics_found: Object.keys(metrics).length,
    };
  },
};
