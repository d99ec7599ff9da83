// Tool Session
// One live MCP connection to one tool-server process

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport, getDefaultEnvironment } from '@modelcontextprotocol/sdk/client/stdio.js';
import { createLogger, type Logger } from '../../logger.js';
import { withTimeout, TimeoutError } from '../../utils/timeout.js';
import { preview } from '../../utils/text.js';
import type { ToolSchema, ToolServerSpec } from './types.js';

export const CLIENT_INFO = { name: 'relay-agent', version: '0.1.0' };

export interface SessionConnection {
  client: Client;
  pid: number | null;
  close(): Promise<void>;
}

/** Opens a connection (spawn + handshake) for a registered tool server. */
export type SessionConnector = (spec: ToolServerSpec) => Promise<SessionConnection>;

export interface CloseOutcome {
  forced: boolean;
}

/** Spawns the server and performs the MCP initialize handshake over stdio. */
export async function connectStdio(spec: ToolServerSpec, logger: Logger = createLogger('tool-session')): Promise<SessionConnection> {
  const transport = new StdioClientTransport({
    command: spec.command,
    args: spec.args,
    env: spec.env ? { ...getDefaultEnvironment(), ...spec.env } : undefined,
    cwd: spec.cwd,
    stderr: 'pipe',
  });

  transport.stderr?.on('data', (chunk: Buffer) => {
    logger.debug({ session: spec.name, stderr: preview(chunk.toString('utf8')) }, 'Tool server stderr');
  });

  const client = new Client(CLIENT_INFO);
  await client.connect(transport);

  return {
    client,
    pid: transport.pid,
    close: () => client.close(),
  };
}

function isTextPart(part: unknown): part is { type: 'text'; text: string } {
  return (
    typeof part === 'object' &&
    part !== null &&
    'type' in part &&
    part.type === 'text' &&
    'text' in part &&
    typeof part.text === 'string'
  );
}

export interface NormalizedToolResult {
  text: string;
  isError: boolean;
}

/** Flattens an MCP tools/call result to the string the transcript carries. */
export function normalizeToolResult(result: Record<string, unknown>): NormalizedToolResult {
  const isError = result.isError === true;
  const content = result.content;

  if (Array.isArray(content) && content.length > 0) {
    const parts = content.map(part => (isTextPart(part) ? part.text : JSON.stringify(part)));
    return { text: parts.join('\n'), isError };
  }

  if (result.structuredContent !== undefined) {
    return { text: JSON.stringify(result.structuredContent), isError };
  }

  if ('toolResult' in result) {
    const legacy = result.toolResult;
    return { text: typeof legacy === 'string' ? legacy : JSON.stringify(legacy), isError };
  }

  return { text: '', isError };
}

export class ToolSession {
  readonly name: string;
  private connection: SessionConnection;
  private schemas: readonly ToolSchema[] | null = null;
  private closed = false;
  private log: Logger;

  constructor(name: string, connection: SessionConnection, logger?: Logger) {
    this.name = name;
    this.connection = connection;
    this.log = logger ?? createLogger('tool-session');
  }

  get pid(): number | null {
    return this.connection.pid;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Schemas discovered so far, or null before the first successful listing. */
  get tools(): readonly ToolSchema[] | null {
    return this.schemas;
  }

  /** Lists the server's tools once; later calls return the cached, frozen list. */
  async listTools(): Promise<readonly ToolSchema[]> {
    if (this.schemas) {
      return this.schemas;
    }

    const response = await this.connection.client.listTools();
    const schemas = response.tools.map(tool =>
      Object.freeze({
        name: tool.name,
        description: tool.description ?? '',
        parameters: Object.freeze({ ...tool.inputSchema }),
      })
    );

    this.schemas = Object.freeze(schemas);
    return this.schemas;
  }

  async callTool(toolName: string, args: Record<string, unknown>, timeoutMs: number): Promise<NormalizedToolResult> {
    const result = await this.connection.client.callTool(
      { name: toolName, arguments: args },
      undefined,
      { timeout: timeoutMs }
    );
    return normalizeToolResult(result);
  }

  /**
   * Closes the connection, waiting at most `timeoutMs`. Past the deadline the
   * worker process is killed outright.
   */
  async close(timeoutMs: number): Promise<CloseOutcome> {
    if (this.closed) {
      return { forced: false };
    }
    this.closed = true;

    try {
      await withTimeout(this.connection.close(), timeoutMs, `Session "${this.name}" did not close within ${timeoutMs}ms`);
      return { forced: false };
    } catch (error) {
      if (!(error instanceof TimeoutError)) {
        this.forceKill();
        throw error;
      }
      this.log.warn({ session: this.name, pid: this.pid, timeoutMs }, 'Session close timed out, killing worker');
      this.forceKill();
      return { forced: true };
    }
  }

  private forceKill(): void {
    const pid = this.pid;
    if (pid === null) return;

    try {
      process.kill(pid, 'SIGKILL');
    } catch (error) {
      // ESRCH: the worker already exited
      if (error instanceof Error && 'code' in error && error.code === 'ESRCH') {
        this.log.debug({ session: this.name, pid }, 'Worker already exited');
        return;
      }
      throw error;
    }
  }
}
