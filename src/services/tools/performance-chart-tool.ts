// Performance Chart Tool
// Standalone grouped bar chart over two or more metric sets

import { ToolExecutionError } from '../../utils/errors.js';
import { renderBarChart, toChartArtifact } from '../charts.js';
import { toDataset } from '../metrics.js';
import { readArray, readString } from './args.js';
import type { ToolDefinition } from './types.js';

export const performanceChartTool: ToolDefinition = {
  name: 'create_performance_chart',
  description: 'Create visual charts for performance comparisons when structured metrics data would benefit from visualization.',
  parameters: [
    {
      name: 'metrics_data',
      type: 'array',
      description: 'List of datasets with name and metrics for comparison',
      required: true,
      items: {
        type: 'object',
        properties: {
          name: { type: 'string' },
          metrics: { type: 'object' },
        },
      },
    },
    {
      name: 'title',
      type: 'string',
      description: 'Chart title',
      required: false,
      default: 'Performance Chart',
    },
  ],
  execute: async (args) => {
    const datasets = readArray(args, 'metrics_data').map((item, i) => toDataset(item, `Method ${i + 1}`));
    if (datasets.length < 2) {
      throw new ToolExecutionError('Need at least 2 datasets to create comparison chart');
    }

    const metrics = Array.from(new Set(datasets.flatMap(d => Object.keys(d.metrics)))).sort();
    if (metrics.length === 0) {
      throw new ToolExecutionError('No metrics found in provided data');
    }

    const title = readString(args, 'title', 'Performance Chart') || 'Performance Chart';
    const svg = renderBarChart({
      title,
      labels: metrics,
      series: datasets.map(d => ({
        name: d.name,
        values: metrics.map(m => d.metrics[m] ?? 0),
      })),
    });

    return {
      title,
      metrics_included: metrics,
      datasets_compared: datasets.length,
      chart: toChartArtifact(title, svg),
    };
  },
};
