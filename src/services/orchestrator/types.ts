// Orchestrator Types

import type { ToolArguments } from '../tools/types.js';
import type { ErrorCode } from '../../utils/errors.js';

export interface ToolCallRequest {
  tool: string;
  args: ToolArguments;
}

export interface ExecutionResult {
  tool: string;
  success: boolean;
  result: string;
  error?: string;
  durationMs: number;
}

export type RunLogKind = 'instruction' | 'decision' | 'invocation' | 'result' | 'error' | 'completion';

export interface RunLogEntry {
  timestamp: string;
  kind: RunLogKind;
  message: string;
  data?: Record<string, unknown>;
}

export interface AgentDefinition {
  name: string;
  /** Opening line of the system prompt. */
  role: string;
  rules: string[];
  instruction: string;
}

export interface OrchestratorOptions {
  model: string;
  temperature?: number;
  maxTokens?: number;
}

export interface RunOutcome {
  status: 'completed' | 'failed';
  calls: ToolCallRequest[];
  results: ExecutionResult[];
  entries: RunLogEntry[];
  error?: {
    code: ErrorCode;
    message: string;
  };
}
