// In-process language model that replays scripted decisions

import type {
  CompleteOptions,
  ConversationMessage,
  LanguageModel,
  ModelDecision,
  StreamOptions,
} from '../../../providers/types.js';
import type { TurnEvent } from '../types.js';

export type ScriptStep = ModelDecision | Error;

export class ScriptedModel implements LanguageModel {
  readonly name = 'scripted';
  completeCalls: Array<{ messages: ConversationMessage[]; options: CompleteOptions }> = [];
  streamCalls: Array<{ messages: ConversationMessage[]; options: StreamOptions }> = [];

  constructor(
    public steps: ScriptStep[],
    public answer: string[] | Error = ['Final answer.'],
  ) {}

  async complete(messages: readonly ConversationMessage[], options: CompleteOptions = {}): Promise<ModelDecision> {
    this.completeCalls.push({ messages: [...messages], options });
    const step = this.steps.shift();
    if (!step) {
      return { type: 'final_text', text: 'done' };
    }
    if (step instanceof Error) {
      throw step;
    }
    return step;
  }

  async *stream(messages: readonly ConversationMessage[], options: StreamOptions = {}): AsyncIterable<string> {
    this.streamCalls.push({ messages: [...messages], options });
    if (this.answer instanceof Error) {
      throw this.answer;
    }
    for (const chunk of this.answer) {
      yield chunk;
    }
  }
}

export function toolCalls(...calls: Array<[id: string, name: string, args: unknown]>): ModelDecision {
  return {
    type: 'tool_calls',
    content: '',
    calls: calls.map(([id, name, args]) => ({ id, name, arguments: args })),
  };
}

export async function collect(events: AsyncIterable<TurnEvent>): Promise<TurnEvent[]> {
  const collected: TurnEvent[] = [];
  for await (const event of events) {
    collected.push(event);
  }
  return collected;
}
