// Source Aggregator
// Collects the citations produced during one turn and renders them under the answer

import type { ChartArtifact } from '../tools/types.js';
import type { ExtractedSources, SourceSnapshot } from './types.js';

export const DEFAULT_MAX_WEB_SOURCES = 3;

export interface RenderOptions {
  /** Inline chart images as data URIs. Without it a chart is listed by title only. */
  embedCharts?: boolean;
}

export function renderSources(snapshot: SourceSnapshot, options: RenderOptions = {}): string {
  const { embedCharts = true } = options;
  const lines: string[] = [];

  if (snapshot.documents.length > 0) {
    lines.push(`**Sources:** ${snapshot.documents.join(', ')}`);
  }
  if (snapshot.web.length > 0) {
    lines.push(`**Web sources:** ${snapshot.web.join(', ')}`);
  }
  for (const chart of snapshot.charts) {
    lines.push(embedCharts
      ? `![${chart.title}](data:${chart.mimeType};base64,${chart.data})`
      : `**Chart:** ${chart.title}`);
  }

  return lines.join('\n');
}

export class SourceAggregator {
  private documents = new Set<string>();
  private web: string[] = [];
  private charts: ChartArtifact[] = [];
  private maxWebSources: number;

  constructor(maxWebSources: number = DEFAULT_MAX_WEB_SOURCES) {
    this.maxWebSources = maxWebSources;
  }

  /** Fold in everything one tool result cited */
  record(sources: ExtractedSources): void {
    sources.documents.forEach(name => this.recordDocument(name));
    sources.web.forEach(url => this.recordWeb(url));
    sources.charts.forEach(chart => this.recordChart(chart));
  }

  recordDocument(name: string): void {
    if (name) this.documents.add(name);
  }

  /** Keeps the first N distinct URLs in the order they were seen */
  recordWeb(url: string): void {
    if (!url || this.web.includes(url)) return;
    if (this.web.length >= this.maxWebSources) return;
    this.web.push(url);
  }

  // Same image twice is one chart; same title over different data is two
  recordChart(chart: ChartArtifact): void {
    if (this.charts.some(c => c.data === chart.data)) return;
    this.charts.push(chart);
  }

  isEmpty(): boolean {
    return this.documents.size === 0 && this.web.length === 0 && this.charts.length === 0;
  }

  snapshot(): SourceSnapshot {
    return {
      documents: [...this.documents].sort(),
      web: [...this.web],
      charts: [...this.charts],
    };
  }

  render(options?: RenderOptions): string {
    return renderSources(this.snapshot(), options);
  }
}
