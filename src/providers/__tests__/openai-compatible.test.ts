import { describe, it, expect } from 'vitest';
import OpenAI from 'openai';
import {
  OpenAICompatibleProvider,
  decodeArguments,
  mapProviderError,
  parseToolCalls,
  toOpenAIMessages,
} from '../openai-compatible.js';
import { ModelServiceError } from '../../utils/errors.js';

describe('decodeArguments', () => {
  it('should decode JSON arguments', () => {
    expect(decodeArguments('{"query":"lstm"}')).toEqual({ query: 'lstm' });
  });

  it('should treat empty arguments as an empty object', () => {
    expect(decodeArguments('  ')).toEqual({});
  });

  it('should pass malformed JSON through as text', () => {
    expect(decodeArguments('{"query": ')).toBe('{"query": ');
  });
});

describe('parseToolCalls', () => {
  it('should map native tool calls', () => {
    const calls = parseToolCalls([
      { id: 'abc', type: 'function', function: { name: 'search_web', arguments: '{"query":"gru"}' } },
      { id: '', type: 'function', function: { name: 'search_documents', arguments: '' } },
    ]);

    expect(calls).toEqual([
      { id: 'abc', name: 'search_web', arguments: { query: 'gru' } },
      { id: 'call_1', name: 'search_documents', arguments: {} },
    ]);
  });

  it('should return no calls when the model sent none', () => {
    expect(parseToolCalls(undefined)).toEqual([]);
  });
});

describe('toOpenAIMessages', () => {
  it('should map every role to the chat completions shape', () => {
    const messages = toOpenAIMessages([
      { role: 'system', content: 'sys' },
      { role: 'user', content: 'q' },
      { role: 'assistant', content: '', toolCalls: [{ id: 'c1', name: 'search_web', arguments: { query: 'q' } }] },
      { role: 'tool', content: '{"ok":true}', toolCallId: 'c1', name: 'search_web' },
      { role: 'assistant', content: 'answer' },
    ]);

    expect(messages).toEqual([
      { role: 'system', content: 'sys' },
      { role: 'user', content: 'q' },
      {
        role: 'assistant',
        content: null,
        tool_calls: [{ id: 'c1', type: 'function', function: { name: 'search_web', arguments: '{"query":"q"}' } }],
      },
      { role: 'tool', tool_call_id: 'c1', content: '{"ok":true}' },
      { role: 'assistant', content: 'answer' },
    ]);
  });

  it('should send undecoded arguments back verbatim', () => {
    const [message] = toOpenAIMessages([
      { role: 'assistant', content: 'x', toolCalls: [{ id: 'c1', name: 't', arguments: '{"broken' }] },
    ]);

    expect(message).toMatchObject({ tool_calls: [{ function: { arguments: '{"broken' } }] });
  });
});

describe('mapProviderError', () => {
  it('should map rate limits', () => {
    const mapped = mapProviderError('openai', new OpenAI.RateLimitError(429, undefined, 'slow down', undefined));

    expect(mapped).toBeInstanceOf(ModelServiceError);
    expect(mapped).toMatchObject({ code: 'rate_limited', provider: 'openai', status: 429 });
  });

  it('should map connection failures and server errors to unavailable', () => {
    const connection = mapProviderError('deepseek', new OpenAI.APIConnectionError({ message: 'refused' }));
    const server = mapProviderError('openai', new OpenAI.InternalServerError(503, undefined, 'down', undefined));

    expect(connection).toMatchObject({ code: 'service_unavailable', provider: 'deepseek', message: 'refused' });
    expect(server).toMatchObject({ code: 'service_unavailable', status: 503 });
  });

  it('should pass aborts and unrelated errors through', () => {
    const abort = new OpenAI.APIUserAbortError();
    const other = new TypeError('bad');

    expect(mapProviderError('openai', abort)).toBe(abort);
    expect(mapProviderError('openai', other)).toBe(other);
  });
});

describe('OpenAICompatibleProvider', () => {
  it('should require an API key', () => {
    expect(() => new OpenAICompatibleProvider({ name: 'openai', apiKey: '', model: 'gpt-4o-mini' })).toThrow(
      'openai API key not configured',
    );
  });

  it('should expose its name', () => {
    const provider = new OpenAICompatibleProvider({ name: 'deepseek', apiKey: 'test-secret', model: 'deepseek-chat' });

    expect(provider.name).toBe('deepseek');
  });
});
