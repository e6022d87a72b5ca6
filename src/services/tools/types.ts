// Tool system types and interfaces
// Every capability the model can call is a ToolDefinition: a parameter contract plus a handler

export type ToolParameterType = 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object';

export interface ToolParameter {
  name: string;
  type: ToolParameterType;
  description: string;
  required: boolean;
  enum?: string[]; // For enum types
  default?: unknown;
  items?: Record<string, unknown>; // JSON Schema for array items, advertised as-is
}

export type ToolArguments = Record<string, unknown>;

/** Structured payload a handler returns. Citation fields are read from it by the executor. */
export type ToolPayload = Record<string, unknown>;

export interface ToolContext {
  signal: AbortSignal;
}

export interface ToolSchema {
  name: string;
  description: string;
  parameters: ToolParameter[];
}

export interface ToolDefinition extends ToolSchema {
  /** Receives arguments already validated against `parameters`, defaults filled in. */
  execute: (args: ToolArguments, context: ToolContext) => Promise<ToolPayload>;
}

export interface ChartArtifact {
  title: string;
  mimeType: 'image/svg+xml';
  data: string; // base64
}
