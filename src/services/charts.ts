/**
 * Chart rendering
 * Grouped bar charts as standalone SVG, returned as base64 chart artifacts
 */

import type { ChartArtifact } from './tools/types.js';

export interface ChartSeries {
  name: string;
  values: number[];
}

export interface BarChartSpec {
  title: string;
  labels: string[];
  series: ChartSeries[];
}

const COLORS = ['#1f77b4', '#ff7f0e', '#2ca02c', '#d62728', '#9467bd'];

const WIDTH = 720;
const HEIGHT = 420;
const MARGIN = { top: 48, right: 24, bottom: 72, left: 64 };

function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

function formatTick(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(1);
}

export function renderBarChart(spec: BarChartSpec): string {
  const plotWidth = WIDTH - MARGIN.left - MARGIN.right;
  const plotHeight = HEIGHT - MARGIN.top - MARGIN.bottom;
  const allValues = spec.series.flatMap(s => s.values);
  const maxValue = Math.max(0, ...allValues) || 1;

  const groupWidth = plotWidth / Math.max(1, spec.labels.length);
  const barWidth = (groupWidth * 0.8) / Math.max(1, spec.series.length);
  const y = (value: number) => MARGIN.top + plotHeight - (Math.max(0, value) / maxValue) * plotHeight;

  const parts: string[] = [];
  parts.push(`<svg xmlns="http://www.w3.org/2000/svg" width="${WIDTH}" height="${HEIGHT}" viewBox="0 0 ${WIDTH} ${HEIGHT}">`);
  parts.push(`<rect width="${WIDTH}" height="${HEIGHT}" fill="#ffffff"/>`);
  parts.push(`<text x="${WIDTH / 2}" y="28" text-anchor="middle" font-family="sans-serif" font-size="18">${escapeXml(spec.title)}</text>`);

  for (let step = 0; step <= 4; step++) {
    const value = (maxValue * step) / 4;
    const lineY = y(value);
    parts.push(`<line x1="${MARGIN.left}" x2="${WIDTH - MARGIN.right}" y1="${lineY}" y2="${lineY}" stroke="#e0e0e0"/>`);
    parts.push(`<text x="${MARGIN.left - 8}" y="${lineY + 4}" text-anchor="end" font-family="sans-serif" font-size="11">${formatTick(value)}</text>`);
  }

  spec.labels.forEach((label, labelIdx) => {
    const groupX = MARGIN.left + groupWidth * labelIdx + groupWidth * 0.1;
    spec.series.forEach((series, seriesIdx) => {
      const value = series.values[labelIdx] ?? 0;
      const barY = y(value);
      const x = groupX + barWidth * seriesIdx;
      parts.push(
        `<rect x="${x.toFixed(1)}" y="${barY.toFixed(1)}" width="${barWidth.toFixed(1)}" height="${(MARGIN.top + plotHeight - barY).toFixed(1)}" fill="${COLORS[seriesIdx % COLORS.length]}"/>`,
      );
    });
    const labelX = MARGIN.left + groupWidth * (labelIdx + 0.5);
    parts.push(`<text x="${labelX.toFixed(1)}" y="${HEIGHT - MARGIN.bottom + 18}" text-anchor="middle" font-family="sans-serif" font-size="12">${escapeXml(label)}</text>`);
  });

  spec.series.forEach((series, seriesIdx) => {
    const legendX = MARGIN.left + seriesIdx * 160;
    const legendY = HEIGHT - 24;
    parts.push(`<rect x="${legendX}" y="${legendY - 10}" width="12" height="12" fill="${COLORS[seriesIdx % COLORS.length]}"/>`);
    parts.push(`<text x="${legendX + 18}" y="${legendY}" font-family="sans-serif" font-size="12">${escapeXml(series.name)}</text>`);
  });

  parts.push('</svg>');
  return parts.join('');
}

export function toChartArtifact(title: string, svg: string): ChartArtifact {
  return {
    title,
    mimeType: 'image/svg+xml',
    data: Buffer.from(svg, 'utf8').toString('base64'),
  };
}
