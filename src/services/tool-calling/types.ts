// Tool-call synthesis types

import type { ToolCall } from '../history/types.js';

/** Observability counters for one synthesize() run. */
export interface RetryStats {
  attempts: number;
  success: boolean;
  validCalls: number;
  invalidCalls: number;
  totalCalls: number;
  errors: string[];
}

export interface SynthesisResult {
  calls: ToolCall[];
  stats: RetryStats;
}

export type ValidationResult =
  | { valid: true; call: ToolCall }
  | { valid: false; reason: string };
