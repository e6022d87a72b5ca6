// Research Orchestrator
// Drives one user turn: model decisions, tool rounds, the streamed answer and its footer

import type { Logger } from 'pino';
import type { ConversationMessage, LanguageModel } from '../../providers/types.js';
import type { ToolRegistry } from '../tools/registry.js';
import { ModelServiceError, errorMessage } from '../../utils/errors.js';
import { moduleLogger } from '../../utils/logger.js';
import { Conversation } from './conversation.js';
import { ToolExecutor, DEFAULT_TOOL_TIMEOUT_MS, formatToolMessage } from './executor.js';
import { selectToolNames } from './policy.js';
import { FALLBACK_ANSWER, SYSTEM_PROMPT } from './prompt.js';
import { SourceAggregator, DEFAULT_MAX_WEB_SOURCES, renderSources } from './sources.js';
import type { RenderOptions } from './sources.js';
import type { HandleOptions, OrchestratorOptions, SourceSnapshot, TurnEvent, TurnState } from './types.js';

export const DEFAULT_MAX_ROUNDS = 6;

interface Turn {
  state: TurnState;
  round: number;
  iterationLimitReached: boolean;
}

export function renderFooter(
  toolsUsed: readonly string[],
  sources: SourceSnapshot,
  options?: RenderOptions,
): string {
  const lines: string[] = [];
  if (toolsUsed.length > 0) {
    lines.push(`**Tools used:** ${toolsUsed.join(', ')}`);
  }
  const rendered = renderSources(sources, options);
  if (rendered) {
    lines.push(rendered);
  }
  return lines.join('\n');
}

export class Orchestrator {
  private model: LanguageModel;
  private registry: ToolRegistry;
  private executor: ToolExecutor;
  private maxRounds: number;
  private maxWebSources: number;
  private systemPrompt: string;
  private log: Logger;

  constructor(model: LanguageModel, registry: ToolRegistry, options: OrchestratorOptions = {}) {
    this.model = model;
    this.registry = registry;
    this.executor = new ToolExecutor(registry, options.toolTimeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS);
    this.maxRounds = options.maxRounds ?? DEFAULT_MAX_ROUNDS;
    this.maxWebSources = options.maxWebSources ?? DEFAULT_MAX_WEB_SOURCES;
    this.systemPrompt = options.systemPrompt ?? SYSTEM_PROMPT;
    this.log = options.logger ?? moduleLogger('orchestrator');
  }

  /**
   * Run one turn. Yields status, tool and token events, then exactly one of
   * `done` or `error`. Closing the generator or aborting the signal stops the
   * turn without a terminal event.
   */
  async *handle(
    query: string,
    history: readonly ConversationMessage[] = [],
    options: HandleOptions = {},
  ): AsyncGenerator<TurnEvent, void, undefined> {
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener('abort', onAbort, { once: true });
    }
    const signal = controller.signal;

    const turn: Turn = { state: 'AWAITING_MODEL', round: 0, iterationLimitReached: false };
    const transition = (state: TurnState): TurnEvent => {
      turn.state = state;
      return { type: 'status', state, round: turn.round };
    };

    const conversation = new Conversation([
      { role: 'system', content: this.systemPrompt },
      ...history,
      { role: 'user', content: query },
    ]);
    const sources = new SourceAggregator(this.maxWebSources);
    const toolsUsed: string[] = [];

    const offered = this.registry.select(selectToolNames(query, this.registry.getAll().map(t => t.name)));
    const tools = this.registry.toOpenAITools(offered);

    try {
      while (true) {
        if (turn.round >= this.maxRounds) {
          turn.iterationLimitReached = true;
          this.log.warn({ rounds: turn.round }, 'Tool round limit reached, answering with the results so far');
          yield transition('ITERATION_LIMIT_REACHED');
          break;
        }

        yield transition('AWAITING_MODEL');
        const decision = await this.model.complete(conversation.messages, { tools, signal });
        turn.round++;
        if (signal.aborted) return;

        yield transition('MODEL_RESPONDED');
        // The decision text is not the answer: the answer is always re-requested
        // below as a stream without tools, at the cost of one more model call.
        if (decision.type === 'final_text') break;

        yield transition('TOOLS_REQUESTED');
        conversation.append({ role: 'assistant', content: decision.content, toolCalls: decision.calls });

        yield transition('EXECUTING');
        for (const call of decision.calls) {
          yield { type: 'tool.start', callId: call.id, name: call.name, arguments: call.arguments };
        }

        const results = await this.executor.executeAll(decision.calls, { signal });
        if (signal.aborted) return;

        for (const result of results) {
          sources.record(result.sources);
          if (!toolsUsed.includes(result.name)) toolsUsed.push(result.name);
          if (result.outcome.status === 'failure') {
            this.log.warn({ tool: result.name, reason: result.outcome.reason }, result.outcome.message);
          }
          conversation.append(formatToolMessage(result));
          yield {
            type: 'tool.end',
            callId: result.callId,
            name: result.name,
            status: result.outcome.status,
            reason: result.outcome.status === 'failure' ? result.outcome.reason : undefined,
            durationMs: result.durationMs,
          };
        }
      }

      yield transition('FINAL_STREAMING');
      let answer = '';
      for await (const text of this.model.stream(conversation.messages, { tools, toolChoice: 'none', signal })) {
        if (signal.aborted) return;
        answer += text;
        yield { type: 'token', text };
      }
      if (signal.aborted) return;

      if (!answer.trim()) {
        answer = FALLBACK_ANSWER;
        yield { type: 'token', text: answer };
      }

      const snapshot = sources.snapshot();
      const footer = renderFooter(toolsUsed, snapshot);
      if (footer) {
        yield { type: 'footer', text: footer };
      }

      turn.state = 'DONE';
      this.log.info({ rounds: turn.round, tools: toolsUsed }, 'Turn complete');
      yield {
        type: 'done',
        summary: {
          answer,
          footer,
          toolsUsed,
          sources: snapshot,
          rounds: turn.round,
          iterationLimitReached: turn.iterationLimitReached,
        },
      };
    } catch (error) {
      if (signal.aborted) return;

      turn.state = 'FATAL';
      this.log.error({ err: error, rounds: turn.round }, 'Turn failed');
      yield {
        type: 'error',
        code: error instanceof ModelServiceError ? error.code : 'internal_error',
        message: errorMessage(error),
      };
    } finally {
      controller.abort();
      options.signal?.removeEventListener('abort', onAbort);
    }
  }
}
