// Query Processor
// The reason-then-act loop: model turn, tool synthesis, tool execution, repeat

import { createLogger, type Logger } from '../../logger.js';
import { handleError } from '../../utils/errors.js';
import { preview } from '../../utils/text.js';
import type { Orchestrator } from './orchestrator.js';
import type { TurnSummary } from './types.js';

export const MAX_ITERATIONS_PREFIX = "I spent too much time processing your request. Here's what I've gathered so far: ";
export const TECHNICAL_ERROR_PREFIX = 'Sorry, there was a technical problem processing your request. Error: ';

export function toolErrorMessage(toolName: string, error: string): string {
  return `Error calling tool ${toolName}: ${error}`;
}

export interface QueryProcessorOptions {
  maxIterations?: number;
  logger?: Logger;
}

export class QueryProcessor {
  private orchestrator: Orchestrator;
  private maxIterations: number;
  private log: Logger;
  private lastSummary: TurnSummary | null = null;

  constructor(orchestrator: Orchestrator, options: QueryProcessorOptions = {}) {
    this.orchestrator = orchestrator;
    this.maxIterations = options.maxIterations ?? orchestrator.maxIterations;
    this.log = options.logger ?? createLogger('query-processor');
  }

  /** Summary of the most recent processQuery() call. */
  lastTurn(): TurnSummary | null {
    return this.lastSummary;
  }

  /**
   * Runs one user query to completion. Never throws: model failures and
   * unexpected errors come back as a single apology string.
   */
  async processQuery(query: string): Promise<string> {
    const summary: TurnSummary = {
      query,
      iterations: 0,
      toolRequests: [],
      toolResults: [],
      synthesis: [],
      outcome: 'answer',
    };
    this.lastSummary = summary;

    try {
      return await this.run(query, summary);
    } catch (error) {
      summary.outcome = 'error';
      const normalized = handleError(error, { query: preview(query), iteration: summary.iterations }, this.log);
      return `${TECHNICAL_ERROR_PREFIX}${normalized.message}`;
    }
  }

  private async run(query: string, summary: TurnSummary): Promise<string> {
    const store = this.orchestrator.getMessageStore();
    const model = this.orchestrator.getModel();
    const synthesizer = this.orchestrator.getSynthesizer();
    const executor = this.orchestrator.getExecutor();

    this.log.info({ query: preview(query) }, 'Processing user query');
    store.addUser(query);
    const tools = this.orchestrator.getAvailableTools();

    let content = '';

    for (let iteration = 0; iteration < this.maxIterations; iteration++) {
      summary.iterations = iteration + 1;
      this.log.debug({ iteration: iteration + 1, maxIterations: this.maxIterations }, 'Starting iteration');

      const result = await model.execute(store.snapshot(), tools);
      if (!result.ok) {
        throw result.error;
      }

      const { text, toolRequests } = result.value;
      content = text;

      if (toolRequests.length === 0) {
        store.addAssistant(text);
        this.log.info({ iterations: summary.iterations, toolCalls: summary.toolResults.length }, 'Returning final answer');
        return text;
      }

      store.addAssistant(text, undefined, toolRequests);
      summary.toolRequests.push(...toolRequests);

      for (const request of toolRequests) {
        const { calls, stats } = await synthesizer.synthesize(request, tools);
        summary.synthesis.push(stats);

        if (calls.length === 0) {
          this.log.warn({ request: preview(request), attempts: stats.attempts }, 'Tool request produced no valid calls');
          continue;
        }

        for (const call of calls) {
          const execution = await executor.execute(call);
          summary.toolResults.push(execution);
          store.addToolResult(
            call.function.name,
            execution.success ? execution.result : toolErrorMessage(call.function.name, execution.error ?? 'unknown error'),
            call.id
          );
        }
      }
    }

    this.log.warn({ maxIterations: this.maxIterations, query: preview(query) }, 'Reached maximum iterations');
    summary.outcome = 'max_iterations';
    const fallback = `${MAX_ITERATIONS_PREFIX}${content}`;
    store.addFallback(fallback);
    return fallback;
  }
}
