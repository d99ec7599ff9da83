// Tool Executor
// Runs synthesized tool calls against the session registry; failures come back as results

import { createLogger, type Logger } from '../../logger.js';
import { errorMessage } from '../../utils/errors.js';
import { preview } from '../../utils/text.js';
import type { ToolCall } from '../history/types.js';
import type { ExecutionResult, ToolCaller } from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseArguments(raw: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(raw);
  if (!isRecord(parsed)) {
    throw new Error('Tool arguments must be a JSON object');
  }
  return parsed;
}

export class ToolExecutor {
  private caller: ToolCaller;
  private log: Logger;

  constructor(caller: ToolCaller, logger?: Logger) {
    this.caller = caller;
    this.log = logger ?? createLogger('tool-executor');
  }

  async execute(toolCall: ToolCall): Promise<ExecutionResult> {
    const startTime = Date.now();
    const tool = toolCall.function.name;

    try {
      const args = parseArguments(toolCall.function.arguments);
      this.log.info({ tool, args: preview(args) }, 'Calling tool');

      const result = await this.caller.call(tool, args);

      this.log.debug({ tool, result: preview(result) }, 'Tool returned');
      return {
        toolCallId: toolCall.id,
        tool,
        success: true,
        result,
        durationMs: Date.now() - startTime,
      };
    } catch (error) {
      this.log.error({ tool, args: preview(toolCall.function.arguments), error: errorMessage(error) }, 'Tool call failed');
      return {
        toolCallId: toolCall.id,
        tool,
        success: false,
        result: '',
        error: errorMessage(error),
        durationMs: Date.now() - startTime,
      };
    }
  }

  /** Sequential and in order; a failed call does not stop the ones after it. */
  async executeAll(toolCalls: readonly ToolCall[]): Promise<ExecutionResult[]> {
    const results: ExecutionResult[] = [];

    for (const toolCall of toolCalls) {
      results.push(await this.execute(toolCall));
    }

    return results;
  }
}
