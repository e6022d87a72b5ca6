// Orchestrator Module - Main exports

export { Orchestrator, DEFAULT_MAX_ROUNDS, renderFooter } from './orchestrator.js';
export { ToolExecutor, formatToolMessage } from './executor.js';
export { SourceAggregator } from './sources.js';
export { Conversation } from './conversation.js';
export { selectToolNames } from './policy.js';
export type {
  HandleOptions,
  OrchestratorOptions,
  ToolOutcome,
  ToolResult,
  TurnEvent,
  TurnState,
  TurnSummary,
} from './types.js';
