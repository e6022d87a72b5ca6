// OpenAI-compatible provider
// Chat completions with native function calling, through the official OpenAI SDK.
// DeepSeek exposes the same API and is served by this class with a different base URL.

import OpenAI from 'openai';
import { ModelServiceError } from '../utils/errors.js';
import type {
  CompleteOptions,
  ConversationMessage,
  LanguageModel,
  ModelDecision,
  StreamOptions,
  ToolCallRequest,
} from './types.js';

export interface OpenAICompatibleConfig {
  name: string;
  apiKey: string;
  model: string;
  baseURL?: string;
  temperature?: number;
  maxRetries?: number;
  timeoutMs?: number;
}

export function decodeArguments(raw: string): unknown {
  if (!raw.trim()) return {};
  try {
    return JSON.parse(raw);
  } catch {
    // Left as text; argument validation reports it back to the model
    return raw;
  }
}

function encodeArguments(args: unknown): string {
  return typeof args === 'string' ? args : JSON.stringify(args ?? {});
}

export function toOpenAIMessages(messages: readonly ConversationMessage[]): OpenAI.Chat.ChatCompletionMessageParam[] {
  return messages.map((m): OpenAI.Chat.ChatCompletionMessageParam => {
    switch (m.role) {
      case 'system':
        return { role: 'system', content: m.content };
      case 'user':
        return { role: 'user', content: m.content };
      case 'assistant':
        if (m.toolCalls && m.toolCalls.length > 0) {
          return {
            role: 'assistant',
            content: m.content || null,
            tool_calls: m.toolCalls.map(call => ({
              id: call.id,
              type: 'function' as const,
              function: { name: call.name, arguments: encodeArguments(call.arguments) },
            })),
          };
        }
        return { role: 'assistant', content: m.content };
      case 'tool':
        return { role: 'tool', tool_call_id: m.toolCallId, content: m.content };
    }
  });
}

export function parseToolCalls(
  toolCalls: OpenAI.Chat.ChatCompletionMessageToolCall[] | undefined,
): ToolCallRequest[] {
  return (toolCalls || []).map((tc, i) => ({
    id: tc.id || `call_${i}`,
    name: tc.function.name,
    arguments: decodeArguments(tc.function.arguments),
  }));
}

/**
 * Translate SDK failures into ModelServiceError. Aborts and unrelated errors pass through.
 */
export function mapProviderError(provider: string, error: unknown): unknown {
  if (error instanceof ModelServiceError) return error;
  if (error instanceof OpenAI.APIUserAbortError) return error;
  if (error instanceof OpenAI.RateLimitError) {
    return ModelServiceError.rateLimited(provider, error.message);
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return ModelServiceError.unavailable(provider, error.message);
  }
  if (error instanceof OpenAI.APIError) {
    return ModelServiceError.unavailable(provider, `${provider} API error: ${error.message}`, error.status);
  }
  return error;
}

export class OpenAICompatibleProvider implements LanguageModel {
  readonly name: string;
  private client: OpenAI;
  private model: string;
  private temperature: number;

  constructor(config: OpenAICompatibleConfig, client?: OpenAI) {
    if (!config.apiKey && !client) {
      throw new Error(`${config.name} API key not configured`);
    }
    this.name = config.name;
    this.model = config.model;
    this.temperature = config.temperature ?? 0;
    this.client = client ?? new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL || undefined,
      maxRetries: config.maxRetries ?? 2,
      timeout: config.timeoutMs ?? 60000,
    });
  }

  async complete(messages: readonly ConversationMessage[], options: CompleteOptions = {}): Promise<ModelDecision> {
    const tools = options.tools && options.tools.length > 0 ? options.tools : undefined;

    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          temperature: this.temperature,
          messages: toOpenAIMessages(messages),
          ...(tools ? { tools, tool_choice: 'auto' as const } : {}),
        },
        { signal: options.signal },
      );

      const message = response.choices[0]?.message;
      if (!message) {
        throw ModelServiceError.unavailable(this.name, `${this.name} returned no choices`);
      }

      const calls = parseToolCalls(message.tool_calls);
      if (calls.length > 0) {
        return { type: 'tool_calls', content: message.content ?? '', calls };
      }
      return { type: 'final_text', text: message.content ?? '' };
    } catch (error) {
      throw mapProviderError(this.name, error);
    }
  }

  async *stream(messages: readonly ConversationMessage[], options: StreamOptions = {}): AsyncIterable<string> {
    const tools = options.tools && options.tools.length > 0 ? options.tools : undefined;

    try {
      const stream = await this.client.chat.completions.create(
        {
          model: this.model,
          temperature: this.temperature,
          messages: toOpenAIMessages(messages),
          stream: true,
          ...(tools ? { tools, tool_choice: options.toolChoice ?? 'auto' } : {}),
        },
        { signal: options.signal },
      );

      for await (const chunk of stream) {
        const text = chunk.choices[0]?.delta?.content;
        if (text) {
          yield text;
        }
      }
    } catch (error) {
      throw mapProviderError(this.name, error);
    }
  }
}
