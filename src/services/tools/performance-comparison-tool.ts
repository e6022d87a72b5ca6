// Performance Comparison Tool
// Compares two metric sets and attaches a grouped bar chart

import { ToolExecutionError } from '../../utils/errors.js';
import { renderBarChart, toChartArtifact } from '../charts.js';
import { compareDatasets, toDataset } from '../metrics.js';
import { readString } from './args.js';
import type { ToolDefinition } from './types.js';

export const performanceComparisonTool: ToolDefinition = {
  name: 'create_performance_comparison',
  description: 'Create a visual performance comparison chart between two technologies when meaningful quantitative metrics are available.',
  parameters: [
    {
      name: 'data1',
      type: 'object',
      description: 'First dataset with metrics and name, e.g. {"name": "LSTM", "metrics": {"accuracy": 88}}',
      required: true,
    },
    {
      name: 'data2',
      type: 'object',
      description: 'Second dataset with metrics and name',
      required: true,
    },
    {
      name: 'title',
      type: 'string',
      description: 'Chart title',
      required: false,
      default: 'Performance Comparison',
    },
  ],
  execute: async (args) => {
    const first = toDataset(args.data1, 'Method 1');
    const second = toDataset(args.data2, 'Method 2');
    const title = readString(args, 'title', 'Performance Comparison') || 'Performance Comparison';

    const comparison = compareDatasets(first, second);
    if (comparison.metrics.length === 0) {
      throw new ToolExecutionError('No common metrics found for comparison');
    }

    const svg = renderBarChart({
      title,
      labels: comparison.metrics,
      series: [
        { name: first.name, values: comparison.values1 },
        { name: second.name, values: comparison.values2 },
      ],
    });

    return {
      title,
      analysis: comparison.analysis.join(' | '),
      metrics_compared: comparison.metrics.length,
      data1_name: first.name,
      data2_name: second.name,
      metrics: comparison.metrics,
      values1: comparison.values1,
      values2: comparison.values2,
      chart: toChartArtifact(title, svg),
    };
  },
};
