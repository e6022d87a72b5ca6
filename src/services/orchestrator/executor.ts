// Tool Executor
// Runs the tool calls the model requested and turns every outcome into a ToolResult

import type { ConversationMessage, ToolCallRequest } from '../../providers/types.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { ToolArguments, ToolDefinition, ToolPayload } from '../tools/types.js';
import { validateArguments } from '../tools/schema.js';
import { InvalidToolArgumentsError, UnknownToolError, errorMessage } from '../../utils/errors.js';
import { extractCitations, redactCharts } from './citations.js';
import type { ExtractedSources, ToolFailureReason, ToolOutcome, ToolResult } from './types.js';

export const DEFAULT_TOOL_TIMEOUT_MS = 30000;

export interface ExecutionContext {
  signal: AbortSignal;
}

class ToolTimeoutError extends Error {
  constructor(toolName: string, timeoutMs: number) {
    super(`Tool "${toolName}" timed out after ${timeoutMs}ms`);
    this.name = 'ToolTimeoutError';
  }
}

class ToolCancelledError extends Error {
  constructor(toolName: string) {
    super(`Tool "${toolName}" was cancelled`);
    this.name = 'ToolCancelledError';
  }
}

const noSources = (): ExtractedSources => ({ documents: [], web: [], charts: [] });

function failure(reason: ToolFailureReason, message: string): ToolOutcome {
  return { status: 'failure', reason, message };
}

export class ToolExecutor {
  private registry: ToolRegistry;
  private timeoutMs: number;

  constructor(registry: ToolRegistry, timeoutMs: number = DEFAULT_TOOL_TIMEOUT_MS) {
    this.registry = registry;
    this.timeoutMs = timeoutMs;
  }

  async execute(call: ToolCallRequest, context: ExecutionContext): Promise<ToolResult> {
    const startTime = Date.now();
    const finish = (outcome: ToolOutcome, sources: ExtractedSources = noSources()): ToolResult => ({
      callId: call.id,
      name: call.name,
      outcome,
      sources,
      durationMs: Date.now() - startTime,
    });

    let tool: ToolDefinition;
    try {
      tool = this.registry.resolve(call.name);
    } catch (error) {
      if (error instanceof UnknownToolError) {
        return finish(failure('unknown_tool', error.message));
      }
      throw error;
    }

    const validation = validateArguments(tool.parameters, call.arguments);
    if (!validation.ok) {
      const error = new InvalidToolArgumentsError(tool.name, validation.issues);
      return finish(failure('invalid_arguments', error.message));
    }

    if (context.signal.aborted) {
      return finish(failure('cancelled', new ToolCancelledError(tool.name).message));
    }

    try {
      const payload = await this.runWithLimits(tool, validation.args, context.signal);
      return finish({ status: 'success', payload }, extractCitations(payload));
    } catch (error) {
      if (error instanceof ToolTimeoutError) {
        return finish(failure('timeout', error.message));
      }
      if (error instanceof ToolCancelledError || context.signal.aborted) {
        return finish(failure('cancelled', new ToolCancelledError(tool.name).message));
      }
      return finish(failure('execution_failed', errorMessage(error)));
    }
  }

  /** All calls of a round run concurrently; results come back in request order. */
  async executeAll(calls: ToolCallRequest[], context: ExecutionContext): Promise<ToolResult[]> {
    return Promise.all(calls.map(call => this.execute(call, context)));
  }

  private async runWithLimits(tool: ToolDefinition, args: ToolArguments, signal: AbortSignal): Promise<ToolPayload> {
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    signal.addEventListener('abort', onAbort, { once: true });

    let timer: NodeJS.Timeout | undefined;
    const limits = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new ToolTimeoutError(tool.name, this.timeoutMs));
        controller.abort();
      }, this.timeoutMs);
      controller.signal.addEventListener('abort', () => reject(new ToolCancelledError(tool.name)), { once: true });
    });

    const run = (async () => tool.execute(args, { signal: controller.signal }))();

    try {
      return await Promise.race([run, limits]);
    } finally {
      clearTimeout(timer);
      signal.removeEventListener('abort', onAbort);
    }
  }
}

/** The tool message answering one call. Failures are reported to the model as data. */
export function formatToolMessage(result: ToolResult): ConversationMessage {
  const content = result.outcome.status === 'success'
    ? JSON.stringify(redactCharts(result.outcome.payload))
    : JSON.stringify({ error: result.outcome.reason, message: result.outcome.message });

  return {
    role: 'tool',
    toolCallId: result.callId,
    name: result.name,
    content,
  };
}
