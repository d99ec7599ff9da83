// Tool-Call Synthesizer
// Turns one free-text tool request into validated tool calls, adapting between retries

import { createLogger, type Logger } from '../../logger.js';
import type { Provider, ProviderMessage, ProviderResponse, ResponseFormat } from '../../providers/types.js';
import { errorMessage, handleError } from '../../utils/errors.js';
import { collapseWhitespace, preview } from '../../utils/text.js';
import { withTimeout } from '../../utils/timeout.js';
import type { ToolCall } from '../history/types.js';
import type { FunctionTool } from '../tools/types.js';
import { shrinkCandidates } from './candidates.js';
import { parseSynthesisResponse } from './parser.js';
import { REWRITE_SYSTEM_PROMPT, buildRewriteRequest, buildSynthesisPrompt } from './prompts.js';
import type { RetryStats, SynthesisResult } from './types.js';
import { validateToolCall } from './validation.js';

export const MAX_FALLBACK_INSTRUCTION_LENGTH = 200;

export interface ToolCallSynthesizerOptions {
  maxRetries: number;
  timeoutMs: number;
  model?: string;
  logger?: Logger;
}

interface AttemptOutcome {
  calls: ToolCall[];
  invalid: number;
  error?: string;
}

/** Whitespace-collapsed, length-capped instruction used when a rewrite is unavailable. */
export function truncateInstruction(instruction: string): string {
  return collapseWhitespace(instruction).slice(0, MAX_FALLBACK_INSTRUCTION_LENGTH);
}

export class ToolCallSynthesizer {
  private provider: Provider;
  private options: ToolCallSynthesizerOptions;
  private log: Logger;

  constructor(provider: Provider, options: ToolCallSynthesizerOptions) {
    this.provider = provider;
    this.options = options;
    this.log = options.logger ?? createLogger('tool-call-synthesizer');
  }

  get model(): string {
    return this.options.model || this.provider.defaultModel;
  }

  /**
   * Never throws. An empty `calls` list after the last attempt is a normal
   * outcome, reported through `stats.success`.
   */
  async synthesize(request: string, tools: readonly FunctionTool[]): Promise<SynthesisResult> {
    const stats: RetryStats = {
      attempts: 0,
      success: false,
      validCalls: 0,
      invalidCalls: 0,
      totalCalls: 0,
      errors: [],
    };

    if (tools.length === 0) {
      stats.errors.push('No tools available');
      this.log.warn({ request: preview(request) }, 'No tools available for tool-call synthesis');
      return { calls: [], stats };
    }

    const liveNames = new Set(tools.map(tool => tool.function.name));
    let candidates: FunctionTool[] = [...tools];
    let instruction = request;

    for (let attempt = 0; attempt < this.options.maxRetries; attempt++) {
      stats.attempts = attempt + 1;
      this.log.debug(
        { attempt: attempt + 1, maxRetries: this.options.maxRetries, candidates: candidates.length },
        'Tool-call synthesis attempt'
      );

      const outcome = await this.attempt(instruction, candidates, liveNames);
      stats.validCalls += outcome.calls.length;
      stats.invalidCalls += outcome.invalid;
      stats.totalCalls += outcome.calls.length + outcome.invalid;

      if (outcome.calls.length > 0) {
        stats.success = true;
        this.log.debug({ attempt: attempt + 1, calls: outcome.calls.length }, 'Generated valid tool calls');
        return { calls: outcome.calls, stats };
      }

      const failure = outcome.error ?? 'No valid tool calls';
      stats.errors.push(failure);
      this.log.warn({ attempt: attempt + 1, request: preview(instruction), error: failure }, 'No valid tool calls');

      if (attempt + 1 >= this.options.maxRetries) {
        break;
      }
      if (attempt > 0) {
        instruction = await this.rewrite(instruction, failure, candidates);
      }
      candidates = shrinkCandidates(request, candidates, tools.length, attempt + 1);
    }

    this.log.error({ request: preview(request), attempts: stats.attempts }, 'Failed to generate valid tool calls');
    return { calls: [], stats };
  }

  private async send(messages: ProviderMessage[], responseFormat: ResponseFormat): Promise<ProviderResponse> {
    const controller = new AbortController();
    const { timeoutMs } = this.options;
    try {
      return await withTimeout(
        this.provider.sendChat(messages, { model: this.model, responseFormat, signal: controller.signal }),
        timeoutMs,
        `Tool-calling model did not respond within ${timeoutMs}ms`
      );
    } catch (error) {
      controller.abort();
      throw error;
    }
  }

  private async attempt(
    instruction: string,
    candidates: readonly FunctionTool[],
    liveNames: ReadonlySet<string>
  ): Promise<AttemptOutcome> {
    let response: ProviderResponse;
    try {
      response = await this.send(
        [
          { role: 'system', content: buildSynthesisPrompt(candidates) },
          { role: 'user', content: instruction },
        ],
        'json_object'
      );
    } catch (error) {
      const normalized = handleError(error, { request: preview(instruction) }, this.log);
      return { calls: [], invalid: 0, error: normalized.message };
    }

    const parsed = parseSynthesisResponse(response.content);
    if (!parsed.ok) {
      return { calls: [], invalid: 0, error: parsed.error };
    }

    const calls: ToolCall[] = [];
    const reasons: string[] = [];
    for (const candidate of parsed.value) {
      const verdict = validateToolCall(candidate, liveNames);
      if (verdict.valid) {
        calls.push(verdict.call);
      } else {
        reasons.push(verdict.reason);
        this.log.warn({ call: preview(candidate), reason: verdict.reason }, 'Discarded invalid tool call');
      }
    }

    return {
      calls,
      invalid: reasons.length,
      error: reasons.length > 0 ? reasons.join('; ') : 'Response contained no tool calls',
    };
  }

  private async rewrite(instruction: string, previousError: string, candidates: readonly FunctionTool[]): Promise<string> {
    try {
      const response = await this.send(
        [
          { role: 'system', content: REWRITE_SYSTEM_PROMPT },
          { role: 'user', content: buildRewriteRequest(instruction, previousError, candidates) },
        ],
        'text'
      );
      const rewritten = response.content.trim();
      if (rewritten) {
        this.log.debug({ rewritten: preview(rewritten) }, 'Rewrote tool request');
        return rewritten;
      }
    } catch (error) {
      this.log.warn({ error: errorMessage(error) }, 'Instruction rewrite failed, truncating instead');
    }
    return truncateInstruction(instruction);
  }
}
