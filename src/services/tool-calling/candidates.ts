// Candidate tool selection between synthesis attempts

import { tokenize } from '../../utils/text.js';
import type { FunctionTool } from '../tools/types.js';

const VERBATIM_BONUS = 1000;

/**
 * How many tools to offer once `attemptsMade` attempts have failed:
 * 75%, 50%, then 25% of the full list, never fewer than one.
 */
export function keepCount(toolCount: number, attemptsMade: number): number {
  return Math.max(1, Math.floor(toolCount * (1 - Math.min(0.25 * attemptsMade, 0.75))));
}

export function relevanceScore(instruction: string, tool: FunctionTool): number {
  const { name, description } = tool.function;
  const wanted = new Set(tokenize(instruction));
  const offered = new Set(tokenize(`${name} ${description}`));

  let overlap = 0;
  for (const token of offered) {
    if (wanted.has(token)) overlap++;
  }

  return instruction.toLowerCase().includes(name.toLowerCase()) ? VERBATIM_BONUS + overlap : overlap;
}

/** Most relevant first; equal scores keep their original order. */
export function rankTools(instruction: string, tools: readonly FunctionTool[]): FunctionTool[] {
  return tools
    .map((tool, index) => ({ tool, index, score: relevanceScore(instruction, tool) }))
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .map(entry => entry.tool);
}

export function shrinkCandidates(
  instruction: string,
  candidates: readonly FunctionTool[],
  toolCount: number,
  attemptsMade: number
): FunctionTool[] {
  const count = Math.min(candidates.length, keepCount(toolCount, attemptsMade));
  return rankTools(instruction, candidates).slice(0, count);
}
