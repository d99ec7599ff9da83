// Agent
// Public entry point: register tool servers, ask questions, shut down

import { basename, dirname, resolve } from 'path';
import { resolveConfig, type AgentConfig, type AgentConfigInput } from './config.js';
import { createLogger, logger as rootLogger, type Logger } from './logger.js';
import type { Message } from './services/history/types.js';
import { Orchestrator, type OrchestratorDeps } from './services/orchestrator/orchestrator.js';
import { QueryProcessor } from './services/orchestrator/query-processor.js';
import type { TurnSummary } from './services/orchestrator/types.js';
import type { FunctionTool, LaunchReport, RegisterServerOptions } from './services/tools/types.js';
import { errorMessage } from './utils/errors.js';

export type AgentDeps = OrchestratorDeps;

/** A tool server is named after the directory its script lives in unless told otherwise. */
export function defaultToolName(path: string): string {
  return basename(dirname(resolve(path)));
}

export class Agent {
  readonly config: AgentConfig;
  private orchestrator: Orchestrator;
  private processor: QueryProcessor;
  private log: Logger;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(config: AgentConfig | AgentConfigInput = {}, deps: AgentDeps = {}) {
    this.config = resolveConfig(config);
    this.log = createLogger('agent', deps.logger ?? rootLogger);
    this.orchestrator = new Orchestrator(this.config, deps);
    this.processor = new QueryProcessor(this.orchestrator, {
      logger: createLogger('query-processor', deps.logger ?? rootLogger),
    });
  }

  /** Registers a tool server script and returns the name it was registered under. */
  addTool(path: string, name?: string, options?: RegisterServerOptions): string {
    const toolName = name ?? defaultToolName(path);
    this.orchestrator.registerToolServer(toolName, path, options);
    return toolName;
  }

  async addToolsFromFile(path: string): Promise<string[]> {
    return this.orchestrator.registerToolsFromFile(path);
  }

  async initialize(): Promise<LaunchReport> {
    const report = await this.orchestrator.start();
    this.log.info({ tools: this.orchestrator.getAvailableTools().length }, 'Agent initialized');
    return report;
  }

  get isInitialized(): boolean {
    return this.orchestrator.isStarted();
  }

  /**
   * Starts the agent on first use. Queries share one transcript, so
   * overlapping calls run one after another in call order.
   */
  processQuery(query: string): Promise<string> {
    const run = this.queue.then(() => this.runQuery(query));
    this.queue = run.catch((error: unknown) => {
      this.log.debug({ error: errorMessage(error) }, 'Queued query failed');
    });
    return run;
  }

  private async runQuery(query: string): Promise<string> {
    if (!this.orchestrator.isStarted()) {
      await this.initialize();
    }
    return this.processor.processQuery(query);
  }

  getAvailableTools(): FunctionTool[] {
    return this.orchestrator.getAvailableTools();
  }

  getHistory(): Message[] {
    return this.orchestrator.getHistory();
  }

  clearHistory(): void {
    this.orchestrator.getMessageStore().clear();
  }

  lastTurn(): TurnSummary | null {
    return this.processor.lastTurn();
  }

  formatHistory(label?: string): string {
    return this.orchestrator.getMessageStore().formatDebugOutput(label);
  }

  async shutdown(): Promise<void> {
    await this.orchestrator.shutdown();
    this.log.info('Agent shut down');
  }
}

export { resolveConfig };
export type { AgentConfig, AgentConfigInput };
