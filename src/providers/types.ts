// Language model interface
// Common contract every chat provider implements

import type { OpenAIFunctionTool } from '../services/tools/registry.js';

export interface ToolCallRequest {
  id: string;
  name: string;
  /** Decoded JSON arguments; left undecoded when the model sent malformed JSON */
  arguments: unknown;
}

export type ConversationMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string; toolCalls?: ToolCallRequest[] }
  | { role: 'tool'; content: string; toolCallId: string; name: string };

export type ModelDecision =
  | { type: 'final_text'; text: string }
  | { type: 'tool_calls'; content: string; calls: ToolCallRequest[] };

export interface CompleteOptions {
  tools?: OpenAIFunctionTool[];
  signal?: AbortSignal;
}

export interface StreamOptions extends CompleteOptions {
  /** 'none' keeps tools advertised but forbids calling them */
  toolChoice?: 'auto' | 'none';
}

export interface LanguageModel {
  readonly name: string;
  complete(messages: readonly ConversationMessage[], options?: CompleteOptions): Promise<ModelDecision>;
  stream(messages: readonly ConversationMessage[], options?: StreamOptions): AsyncIterable<string>;
}
