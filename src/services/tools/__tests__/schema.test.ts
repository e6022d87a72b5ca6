import { describe, it, expect } from 'vitest';
import { validateArguments } from '../schema.js';
import type { ToolParameter } from '../types.js';

const parameters: ToolParameter[] = [
  { name: 'query', type: 'string', description: 'Query', required: true },
  { name: 'num_results', type: 'integer', description: 'Count', required: false, default: 5 },
  { name: 'mode', type: 'string', description: 'Mode', required: false, enum: ['fast', 'full'] },
  { name: 'data', type: 'object', description: 'Data', required: false },
  { name: 'rows', type: 'array', description: 'Rows', required: false },
];

describe('validateArguments', () => {
  it('should accept valid arguments and fill defaults', () => {
    const result = validateArguments(parameters, { query: 'lstm' });

    expect(result).toEqual({ ok: true, args: { query: 'lstm', num_results: 5 } });
  });

  it('should keep provided optional values', () => {
    const result = validateArguments(parameters, {
      query: 'lstm',
      num_results: 3,
      mode: 'full',
      data: { accuracy: 0.9 },
      rows: [1, 2],
    });

    expect(result).toEqual({
      ok: true,
      args: { query: 'lstm', num_results: 3, mode: 'full', data: { accuracy: 0.9 }, rows: [1, 2] },
    });
  });

  it('should drop unknown keys', () => {
    const result = validateArguments(parameters, { query: 'lstm', extra: true });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.args).not.toHaveProperty('extra');
    }
  });

  it('should report a missing required field', () => {
    const result = validateArguments(parameters, {});

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.issues).toEqual(['query: Required']);
    }
  });

  it('should reject wrong value shapes', () => {
    const result = validateArguments(parameters, { query: 42, num_results: 2.5 });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.issues).toHaveLength(2);
      expect(result.issues[0]).toMatch(/^query:/);
      expect(result.issues[1]).toMatch(/^num_results:/);
    }
  });

  it('should reject values outside an enum', () => {
    const result = validateArguments(parameters, { query: 'x', mode: 'slow' });

    expect(result).toEqual({ ok: false, issues: ['mode: Expected one of: fast, full'] });
  });

  it('should check array elements against the advertised items type', () => {
    const datasets: ToolParameter[] = [
      { name: 'metrics_data', type: 'array', description: 'Datasets', required: true, items: { type: 'object' } },
    ];

    expect(validateArguments(datasets, { metrics_data: [{ name: 'A' }, { name: 'B' }] })).toEqual({
      ok: true,
      args: { metrics_data: [{ name: 'A' }, { name: 'B' }] },
    });
    expect(validateArguments(datasets, { metrics_data: ['x', 'y'] })).toEqual({
      ok: false,
      issues: ['metrics_data.0: Expected object, received string', 'metrics_data.1: Expected object, received string'],
    });
  });

  it('should reject undecoded argument text', () => {
    const result = validateArguments(parameters, '{"query": "lstm"');

    expect(result.ok).toBe(false);
  });

  it('should treat missing arguments as an empty object', () => {
    expect(validateArguments([], undefined)).toEqual({ ok: true, args: {} });
  });
});
