// Orchestrator
// Owns the transcript, the models and the tool-server sessions of one agent

import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { z } from 'zod';
import type { AgentConfig } from '../../config.js';
import { createLogger, logger as rootLogger, type Logger } from '../../logger.js';
import { createReasoningProvider, createToolCallingProvider } from '../../providers/index.js';
import type { Provider } from '../../providers/types.js';
import { ConfigurationError, errorMessage } from '../../utils/errors.js';
import { MessageStore } from '../history/message-store.js';
import type { Message } from '../history/types.js';
import { ModelAdapter } from '../model/adapter.js';
import { buildSystemPrompt } from '../model/prompts.js';
import type { ToolRequestDelimiter } from '../model/types.js';
import { ToolCallSynthesizer } from '../tool-calling/synthesizer.js';
import { Launcher } from '../tools/launcher.js';
import { SessionRegistry } from '../tools/registry.js';
import type { SessionConnector } from '../tools/session.js';
import type { FunctionTool, LaunchReport, RegisterServerOptions } from '../tools/types.js';
import { ToolExecutor } from './executor.js';

const ToolsFileSchema = z.object({
  tools: z.record(z.string().min(1)),
});

export interface OrchestratorDeps {
  reasoningProvider?: Provider;
  toolCallingProvider?: Provider;
  connector?: SessionConnector;
  delimiter?: ToolRequestDelimiter;
  logger?: Logger;
}

export class Orchestrator {
  private config: AgentConfig;
  private store: MessageStore;
  private model: ModelAdapter;
  private synthesizer: ToolCallSynthesizer;
  private registry: SessionRegistry;
  private launcher: Launcher;
  private executor: ToolExecutor;
  private started = false;
  private log: Logger;

  constructor(config: AgentConfig, deps: OrchestratorDeps = {}) {
    this.config = config;
    const baseLogger = deps.logger ?? rootLogger;
    this.log = createLogger('orchestrator', baseLogger);

    const reasoningProvider = deps.reasoningProvider ?? createReasoningProvider(config);
    const toolCallingProvider = deps.toolCallingProvider ?? createToolCallingProvider(config);

    this.store = new MessageStore(buildSystemPrompt(config.agent.customSystemPrompt, deps.delimiter));
    this.model = new ModelAdapter(reasoningProvider, {
      timeoutMs: config.requestTimeoutMs,
      model: config.providers[config.provider].model,
      temperature: config.agent.temperature,
      maxTokens: config.agent.maxTokens,
      delimiter: deps.delimiter,
      logger: createLogger('model-adapter', baseLogger),
    });
    this.synthesizer = new ToolCallSynthesizer(toolCallingProvider, {
      maxRetries: config.toolCalling.maxRetries,
      timeoutMs: config.requestTimeoutMs,
      logger: createLogger('tool-call-synthesizer', baseLogger),
    });
    this.registry = new SessionRegistry({
      callTimeoutMs: config.toolCallTimeoutMs,
      logger: createLogger('session-registry', baseLogger),
    });
    this.launcher = new Launcher({
      registry: this.registry,
      connector: deps.connector,
      pythonBin: config.pythonBin,
      shutdownTimeoutMs: config.shutdownTimeoutMs,
      logger: createLogger('launcher', baseLogger),
    });
    this.executor = new ToolExecutor(this.registry, createLogger('tool-executor', baseLogger));
  }

  /**
   * Registers a tool server. The script is checked now; the process is only
   * spawned by the next start().
   */
  registerToolServer(name: string, path: string, options?: RegisterServerOptions): void {
    this.launcher.registerServer(name, path, options);
    if (this.started) {
      this.log.info({ server: name }, 'Tool server registered after start, launching on next start()');
    }
  }

  /** Registers `{name: path}` pairs, skipping paths that do not exist. */
  registerToolsFromConfig(tools: Record<string, string>): string[] {
    const registered: string[] = [];

    for (const [name, path] of Object.entries(tools)) {
      if (!existsSync(resolve(path))) {
        this.log.warn({ server: name, path }, 'Tool server script not found, skipping');
        continue;
      }
      this.registerToolServer(name, path);
      registered.push(name);
    }

    return registered;
  }

  /** Reads a `{"tools": {"name": "path"}}` file; a missing file registers nothing. */
  async registerToolsFromFile(filePath: string): Promise<string[]> {
    const absolutePath = resolve(filePath);
    if (!existsSync(absolutePath)) {
      this.log.error({ path: absolutePath }, 'Tools config file not found');
      return [];
    }

    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(absolutePath, 'utf8'));
    } catch (error) {
      throw new ConfigurationError(`Could not read tools config ${absolutePath}: ${errorMessage(error)}`);
    }

    const parsed = ToolsFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid tools config ${absolutePath}`, parsed.error.flatten());
    }

    return this.registerToolsFromConfig(parsed.data.tools);
  }

  /** Launches servers not running yet and discovers their tools. Safe to call again. */
  async start(): Promise<LaunchReport> {
    const report = await this.launcher.launchAll();
    await this.registry.discoverTools();

    if (!this.started) {
      this.log.info(
        { launched: report.launched, failed: report.failed.map(f => f.name), tools: this.registry.getSchemas().length },
        'Orchestrator started'
      );
    }
    this.started = true;
    return report;
  }

  async shutdown(): Promise<void> {
    if (!this.started && this.registry.size === 0) {
      return;
    }

    try {
      await this.launcher.shutdown();
    } finally {
      this.started = false;
    }
    this.log.info('Orchestrator shut down');
  }

  isStarted(): boolean {
    return this.started;
  }

  getAvailableTools(): FunctionTool[] {
    if (!this.started) {
      throw new ConfigurationError('Orchestrator not started');
    }
    return this.registry.toFunctionTools();
  }

  getModel(): ModelAdapter {
    return this.model;
  }

  getSynthesizer(): ToolCallSynthesizer {
    return this.synthesizer;
  }

  getExecutor(): ToolExecutor {
    return this.executor;
  }

  getMessageStore(): MessageStore {
    return this.store;
  }

  getHistory(): Message[] {
    return this.store.snapshot();
  }

  getLauncher(): Launcher {
    return this.launcher;
  }

  get maxIterations(): number {
    return this.config.agent.maxIterations;
  }
}
