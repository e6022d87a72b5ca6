// Orchestrator Types

import type { Logger } from 'pino';
import type { ChartArtifact } from '../tools/types.js';

export type TurnState =
  | 'AWAITING_MODEL'
  | 'MODEL_RESPONDED'
  | 'TOOLS_REQUESTED'
  | 'EXECUTING'
  | 'ITERATION_LIMIT_REACHED'
  | 'FINAL_STREAMING'
  | 'DONE'
  | 'FATAL';

export type ToolFailureReason =
  | 'unknown_tool'
  | 'invalid_arguments'
  | 'execution_failed'
  | 'timeout'
  | 'cancelled';

export type ToolOutcome =
  | { status: 'success'; payload: Record<string, unknown> }
  | { status: 'failure'; reason: ToolFailureReason; message: string };

export interface ExtractedSources {
  documents: string[];
  web: string[];
  charts: ChartArtifact[];
}

export interface ToolResult {
  callId: string;
  name: string;
  outcome: ToolOutcome;
  sources: ExtractedSources;
  durationMs: number;
}

export interface SourceSnapshot {
  documents: string[];
  web: string[];
  charts: ChartArtifact[];
}

export interface TurnSummary {
  answer: string;
  footer: string;
  toolsUsed: string[];
  sources: SourceSnapshot;
  rounds: number;
  iterationLimitReached: boolean;
}

export type TurnEvent =
  | { type: 'status'; state: TurnState; round: number }
  | { type: 'tool.start'; callId: string; name: string; arguments: unknown }
  | { type: 'tool.end'; callId: string; name: string; status: ToolOutcome['status']; reason?: ToolFailureReason; durationMs: number }
  | { type: 'token'; text: string }
  | { type: 'footer'; text: string }
  | { type: 'done'; summary: TurnSummary }
  | { type: 'error'; code: string; message: string };

export interface OrchestratorOptions {
  maxRounds?: number;
  maxWebSources?: number;
  toolTimeoutMs?: number;
  systemPrompt?: string;
  logger?: Logger;
}

export interface HandleOptions {
  signal?: AbortSignal;
}
