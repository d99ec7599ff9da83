// Orchestrator Types

import type { RetryStats } from '../tool-calling/types.js';

export interface ExecutionResult {
  toolCallId: string;
  tool: string;
  success: boolean;
  result: string;
  error?: string;
  durationMs: number;
}

/** Anything that can run a tool by name; the session registry in production. */
export interface ToolCaller {
  call(toolName: string, args: Record<string, unknown>): Promise<string>;
}

/** What one processQuery() call did, kept for inspection after it returns. */
export interface TurnSummary {
  query: string;
  iterations: number;
  toolRequests: string[];
  toolResults: ExecutionResult[];
  synthesis: RetryStats[];
  outcome: 'answer' | 'max_iterations' | 'error';
}
