// Argument validation
// Builds a zod schema from a tool's parameter contract

import { z } from 'zod';
import type { ToolArguments, ToolParameter } from './types.js';

// Element schema for an array parameter, read from the `type` of its advertised items
function schemaForItems(items: ToolParameter['items']): z.ZodTypeAny {
  switch (items?.type) {
    case 'string':
      return z.string();
    case 'number':
      return z.number().finite();
    case 'integer':
      return z.number().int();
    case 'boolean':
      return z.boolean();
    case 'array':
      return z.array(z.unknown());
    case 'object':
      return z.record(z.unknown());
    default:
      return z.unknown();
  }
}

function schemaForParameter(param: ToolParameter): z.ZodTypeAny {
  switch (param.type) {
    case 'string': {
      const allowed = param.enum ?? [];
      return allowed.length > 0
        ? z.string().refine(value => allowed.includes(value), {
            message: `Expected one of: ${allowed.join(', ')}`,
          })
        : z.string();
    }
    case 'number':
      return z.number().finite();
    case 'integer':
      return z.number().int();
    case 'boolean':
      return z.boolean();
    case 'array':
      return z.array(schemaForItems(param.items));
    case 'object':
      return z.record(z.unknown());
  }
}

export function buildArgumentSchema(parameters: ToolParameter[]) {
  const shape: Record<string, z.ZodTypeAny> = {};

  for (const param of parameters) {
    const schema = schemaForParameter(param);
    shape[param.name] = param.required ? schema : schema.optional();
  }

  return z.object(shape);
}

export type ArgumentValidation =
  | { ok: true; args: ToolArguments }
  | { ok: false; issues: string[] };

/**
 * Validate raw model arguments. Unknown keys are dropped and declared defaults
 * are filled in for absent optional parameters.
 */
export function validateArguments(parameters: ToolParameter[], raw: unknown): ArgumentValidation {
  const parsed = buildArgumentSchema(parameters).safeParse(raw ?? {});

  if (!parsed.success) {
    return {
      ok: false,
      issues: parsed.error.issues.map(issue =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
      ),
    };
  }

  const args: ToolArguments = { ...parsed.data };
  for (const param of parameters) {
    if (args[param.name] === undefined && param.default !== undefined) {
      args[param.name] = param.default;
    }
  }

  return { ok: true, args };
}
