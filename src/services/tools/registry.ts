// Tool Registry - Central registry for all available tools
// Tools are registered on startup; the registry is read-only while turns run

import { DuplicateToolError, UnknownToolError } from '../../utils/errors.js';
import type { ToolDefinition, ToolParameter, ToolSchema } from './types.js';

export interface OpenAIFunctionTool {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: {
      type: 'object';
      properties: Record<string, Record<string, unknown>>;
      required: string[];
    };
  };
}

export class ToolRegistry {
  private tools: Map<string, ToolDefinition> = new Map();

  register(tool: ToolDefinition): void {
    if (this.tools.has(tool.name)) {
      throw new DuplicateToolError(tool.name);
    }
    this.tools.set(tool.name, tool);
  }

  resolve(name: string): ToolDefinition {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new UnknownToolError(name);
    }
    return tool;
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  getAll(): ToolDefinition[] {
    return Array.from(this.tools.values());
  }

  /** Schemas in registration order, as advertised to the model. */
  schemas(): ToolSchema[] {
    return this.getAll().map(({ name, description, parameters }) => ({ name, description, parameters }));
  }

  select(names: readonly string[]): ToolDefinition[] {
    const wanted = new Set(names);
    return this.getAll().filter(tool => wanted.has(tool.name));
  }

  toOpenAITools(tools: ToolSchema[] = this.getAll()): OpenAIFunctionTool[] {
    return tools.map(tool => ({
      type: 'function',
      function: {
        name: tool.name,
        description: tool.description,
        parameters: {
          type: 'object',
          properties: this.parametersToJsonSchema(tool.parameters),
          required: tool.parameters.filter(p => p.required).map(p => p.name),
        },
      },
    }));
  }

  private parametersToJsonSchema(params: ToolParameter[]): Record<string, Record<string, unknown>> {
    const schema: Record<string, Record<string, unknown>> = {};

    for (const param of params) {
      const paramSchema: Record<string, unknown> = {
        type: param.type,
        description: param.description,
      };

      if (param.enum) {
        paramSchema.enum = param.enum;
      }

      if (param.items) {
        paramSchema.items = param.items;
      }

      if (param.default !== undefined) {
        paramSchema.default = param.default;
      }

      schema[param.name] = paramSchema;
    }

    return schema;
  }
}
