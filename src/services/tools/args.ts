// Typed readers for validated tool arguments

import type { ToolArguments } from './types.js';

export function readString(args: ToolArguments, key: string, fallback = ''): string {
  const value = args[key];
  return typeof value === 'string' ? value.trim() : fallback;
}

export function readCount(args: ToolArguments, key: string, fallback: number, max: number): number {
  const value = args[key];
  const count = typeof value === 'number' && Number.isFinite(value) ? Math.floor(value) : fallback;
  return Math.max(1, Math.min(count, max));
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readArray(args: ToolArguments, key: string): unknown[] {
  const value = args[key];
  return Array.isArray(value) ? value : [];
}
