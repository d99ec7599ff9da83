// Session Registry - one live session per tool server
// Tool names resolve to the session that discovered them; the index is built once per session

import { createLogger, type Logger } from '../../logger.js';
import { ConfigurationError, ToolExecutionError, errorMessage, type ShutdownFailure } from '../../utils/errors.js';
import type { NormalizedToolResult, ToolSession } from './session.js';
import type { FunctionTool, ToolSchema } from './types.js';

export interface SessionRegistryOptions {
  callTimeoutMs: number;
  logger?: Logger;
}

export function toFunctionTool(schema: ToolSchema): FunctionTool {
  return {
    type: 'function',
    function: {
      name: schema.name,
      description: schema.description,
      parameters: schema.parameters,
    },
  };
}

export class SessionRegistry {
  private sessions: Map<string, ToolSession> = new Map();
  private toolIndex: Map<string, ToolSession> = new Map();
  private indexed: Set<string> = new Set();
  private callTimeoutMs: number;
  private log: Logger;

  constructor(options: SessionRegistryOptions) {
    this.callTimeoutMs = options.callTimeoutMs;
    this.log = options.logger ?? createLogger('session-registry');
  }

  add(session: ToolSession): void {
    if (this.sessions.has(session.name)) {
      throw new ConfigurationError(`Session "${session.name}" is already registered`);
    }
    this.sessions.set(session.name, session);
  }

  get(name: string): ToolSession | undefined {
    return this.sessions.get(name);
  }

  has(name: string): boolean {
    return this.sessions.has(name);
  }

  names(): string[] {
    return Array.from(this.sessions.keys());
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Lists tools on every session that has not been discovered yet. A failing
   * session is logged and skipped (and retried next time); the others are unaffected.
   */
  async discoverTools(): Promise<Map<string, readonly ToolSchema[]>> {
    const discovered = new Map<string, readonly ToolSchema[]>();

    for (const session of this.sessions.values()) {
      try {
        const schemas = session.tools ?? (await session.listTools());
        if (!this.indexed.has(session.name)) {
          this.indexTools(session, schemas);
          this.indexed.add(session.name);
          this.log.debug({ session: session.name, tools: schemas.length }, 'Discovered tools');
        }
        discovered.set(session.name, schemas);
      } catch (error) {
        this.log.error({ session: session.name, error: errorMessage(error) }, 'Tool discovery failed');
      }
    }

    return discovered;
  }

  private indexTools(session: ToolSession, schemas: readonly ToolSchema[]): void {
    for (const schema of schemas) {
      const owner = this.toolIndex.get(schema.name);
      if (owner && owner !== session) {
        this.log.warn(
          { tool: schema.name, owner: owner.name, ignored: session.name },
          `Tool "${schema.name}" already provided by another session, ignoring duplicate`
        );
        continue;
      }
      this.toolIndex.set(schema.name, session);
    }
  }

  /** Flat, discovery-ordered list of the schemas each tool name resolves to. */
  getSchemas(): ToolSchema[] {
    const schemas: ToolSchema[] = [];
    for (const session of this.sessions.values()) {
      for (const schema of session.tools ?? []) {
        if (this.toolIndex.get(schema.name) === session) {
          schemas.push(schema);
        }
      }
    }
    return schemas;
  }

  toFunctionTools(): FunctionTool[] {
    return this.getSchemas().map(toFunctionTool);
  }

  resolve(toolName: string): ToolSession | undefined {
    return this.toolIndex.get(toolName);
  }

  async call(toolName: string, args: Record<string, unknown>): Promise<string> {
    const session = this.toolIndex.get(toolName);
    if (!session) {
      throw new ToolExecutionError(toolName, `Unknown tool: ${toolName}`);
    }

    let outcome: NormalizedToolResult;
    try {
      outcome = await session.callTool(toolName, args, this.callTimeoutMs);
    } catch (error) {
      throw new ToolExecutionError(toolName, errorMessage(error), { session: session.name }, { cause: error });
    }

    if (outcome.isError) {
      throw new ToolExecutionError(toolName, outcome.text || `Tool ${toolName} reported an error`, {
        session: session.name,
      });
    }

    return outcome.text;
  }

  /** Closes every session, continuing past failures; the registry is empty afterwards. */
  async closeAll(timeoutMs: number): Promise<ShutdownFailure[]> {
    const failures: ShutdownFailure[] = [];

    for (const session of this.sessions.values()) {
      try {
        const { forced } = await session.close(timeoutMs);
        this.log.debug({ session: session.name, forced }, 'Session closed');
      } catch (error) {
        failures.push({ session: session.name, message: errorMessage(error) });
        this.log.error({ session: session.name, error: errorMessage(error) }, 'Failed to close session');
      }
    }

    this.sessions.clear();
    this.toolIndex.clear();
    this.indexed.clear();
    return failures;
  }
}
