import { describe, it, expect } from 'vitest';
import { SourceAggregator } from '../sources.js';

describe('SourceAggregator', () => {
  it('should render an empty aggregator as an empty string', () => {
    const sources = new SourceAggregator();

    expect(sources.isEmpty()).toBe(true);
    expect(sources.render()).toBe('');
  });

  it('should list documents once, in lexicographic order', () => {
    const sources = new SourceAggregator();
    sources.recordDocument('b.pdf');
    sources.recordDocument('a.pdf');
    sources.recordDocument('b.pdf');

    expect(sources.render()).toBe('**Sources:** a.pdf, b.pdf');
  });

  it('should keep the first three distinct web URLs', () => {
    const sources = new SourceAggregator();
    for (const url of ['u1', 'u2', 'u1', 'u3', 'u4', 'u5']) {
      sources.recordWeb(url);
    }

    expect(sources.render()).toBe('**Web sources:** u1, u2, u3');
  });

  it('should honour a custom web cap', () => {
    const sources = new SourceAggregator(1);
    sources.recordWeb('u1');
    sources.recordWeb('u2');

    expect(sources.snapshot().web).toEqual(['u1']);
  });

  it('should render documents, then web sources, then charts', () => {
    const sources = new SourceAggregator();
    const chart = { title: 'Speed', mimeType: 'image/svg+xml' as const, data: 'QUJD' };
    sources.recordChart(chart);
    sources.recordWeb('https://example.com');
    sources.recordDocument('p1.pdf');
    sources.recordChart({ ...chart });

    expect(sources.isEmpty()).toBe(false);
    expect(sources.render()).toBe(
      [
        '**Sources:** p1.pdf',
        '**Web sources:** https://example.com',
        '![Speed](data:image/svg+xml;base64,QUJD)',
      ].join('\n'),
    );
    expect(sources.snapshot().charts).toEqual([chart]);
  });

  it('should keep charts that share a title but not their data', () => {
    const sources = new SourceAggregator();
    const first = { title: 'Performance Comparison', mimeType: 'image/svg+xml' as const, data: 'QUJD' };
    const second = { ...first, data: 'REVG' };
    sources.recordChart(first);
    sources.recordChart(second);

    expect(sources.snapshot().charts).toEqual([first, second]);
  });

  it('should list charts by title when images are not embedded', () => {
    const sources = new SourceAggregator();
    sources.recordDocument('p1.pdf');
    sources.recordChart({ title: 'Speed', mimeType: 'image/svg+xml', data: 'QUJD' });

    expect(sources.render({ embedCharts: false })).toBe('**Sources:** p1.pdf\n**Chart:** Speed');
  });

  it('should fold in every citation of a tool result', () => {
    const sources = new SourceAggregator();
    sources.record({ documents: ['b.pdf', 'a.pdf'], web: ['u1', 'u2', 'u3', 'u4'], charts: [] });

    expect(sources.snapshot()).toEqual({ documents: ['a.pdf', 'b.pdf'], web: ['u1', 'u2', 'u3'], charts: [] });
  });
});
