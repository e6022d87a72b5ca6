/**
 * Performance metrics
 * Pattern-based metric extraction and pairwise comparison of metric sets
 */

import { isRecord } from './tools/args.js';

export const METRIC_PATTERNS: Record<string, RegExp> = {
  accuracy: /accuracy[:\s]*([0-9]+\.?[0-9]*)%?/,
  speed: /speed[:\s]*([0-9]+\.?[0-9]*)/,
  memory: /memory[:\s]*([0-9]+\.?[0-9]*)/,
  parameters: /parameters?[:\s]*([0-9]+\.?[0-9]*)[mbk]?/,
  training_time: /training[:\s]*([0-9]+\.?[0-9]*)/,
  inference_time: /inference[:\s]*([0-9]+\.?[0-9]*)/,
};

export type MetricValues = Record<string, number>;

export interface MetricsDataset {
  name: string;
  metrics: MetricValues;
}

/**
 * First match of each metric pattern in the lowercased text
 */
export function extractMetrics(text: string): MetricValues {
  const lower = text.toLowerCase();
  const metrics: MetricValues = {};

  for (const [metric, pattern] of Object.entries(METRIC_PATTERNS)) {
    const match = pattern.exec(lower);
    if (!match) continue;

    const value = parseFloat(match[1]);
    if (Number.isFinite(value)) {
      metrics[metric] = value;
    }
  }

  return metrics;
}

/**
 * Read a dataset the model passed as a tool argument. Non-numeric metric values
 * are dropped; numeric strings are accepted.
 */
export function toDataset(value: unknown, fallbackName: string): MetricsDataset {
  if (!isRecord(value)) {
    return { name: fallbackName, metrics: {} };
  }

  const name = typeof value.name === 'string' && value.name.trim() ? value.name.trim() : fallbackName;
  const metrics: MetricValues = {};

  if (isRecord(value.metrics)) {
    for (const [key, raw] of Object.entries(value.metrics)) {
      const num = typeof raw === 'number' ? raw : typeof raw === 'string' ? parseFloat(raw) : NaN;
      if (Number.isFinite(num)) {
        metrics[key] = num;
      }
    }
  }

  return { name, metrics };
}

export interface MetricComparison {
  metrics: string[];
  values1: number[];
  values2: number[];
  analysis: string[];
}

/**
 * Compare the metrics both datasets report; a higher value counts as better.
 * Metric order follows the first dataset.
 */
export function compareDatasets(first: MetricsDataset, second: MetricsDataset): MetricComparison {
  const metrics = Object.keys(first.metrics).filter(m => m in second.metrics);
  const values1 = metrics.map(m => first.metrics[m]);
  const values2 = metrics.map(m => second.metrics[m]);

  const analysis = metrics.map((metric, i) => {
    if (values1[i] > values2[i]) return `${first.name} performs better in ${metric}`;
    if (values2[i] > values1[i]) return `${second.name} performs better in ${metric}`;
    return `Similar performance in ${metric}`;
  });

  return { metrics, values1, values2, analysis };
}
