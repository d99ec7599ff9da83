// Tool Server Launcher
// Registers tool-server scripts, spawns them into sessions and tears them down

import { existsSync } from 'fs';
import { extname, resolve } from 'path';
import { createLogger, type Logger } from '../../logger.js';
import { ConfigurationError, ShutdownError, errorMessage } from '../../utils/errors.js';
import type { SessionRegistry } from './registry.js';
import { ToolSession, connectStdio, type SessionConnection, type SessionConnector } from './session.js';
import type { LaunchReport, RegisterServerOptions, ToolServerSpec } from './types.js';

export interface LauncherOptions {
  registry: SessionRegistry;
  shutdownTimeoutMs: number;
  pythonBin?: string;
  connector?: SessionConnector;
  logger?: Logger;
}

const NODE_EXTENSIONS = new Set(['.js', '.mjs', '.cjs']);

/** Picks the interpreter for a server script from its extension. */
export function resolveCommand(path: string, pythonBin: string = 'python3'): { command: string; args: string[] } {
  const ext = extname(path).toLowerCase();
  if (ext === '.py') {
    return { command: pythonBin, args: [path] };
  }
  if (NODE_EXTENSIONS.has(ext)) {
    return { command: process.execPath, args: [path] };
  }
  return { command: path, args: [] };
}

export class Launcher {
  private servers: Map<string, ToolServerSpec> = new Map();
  private registry: SessionRegistry;
  private connector: SessionConnector;
  private shutdownTimeoutMs: number;
  private pythonBin: string;
  private launching: Promise<LaunchReport> | null = null;
  private log: Logger;

  constructor(options: LauncherOptions) {
    this.registry = options.registry;
    this.shutdownTimeoutMs = options.shutdownTimeoutMs;
    this.pythonBin = options.pythonBin ?? 'python3';
    this.log = options.logger ?? createLogger('launcher');
    this.connector = options.connector ?? (spec => connectStdio(spec, this.log));
  }

  /**
   * Registers a tool server to be launched. Throws on a duplicate name or a
   * script that does not exist.
   */
  registerServer(name: string, path: string, options: RegisterServerOptions = {}): ToolServerSpec {
    if (this.servers.has(name)) {
      throw new ConfigurationError(`Tool server "${name}" is already registered`);
    }

    const scriptPath = resolve(path);
    if (!existsSync(scriptPath)) {
      throw new ConfigurationError(`Server script not found: ${scriptPath}`, { name });
    }

    const inferred = resolveCommand(scriptPath, this.pythonBin);
    const spec: ToolServerSpec = {
      name,
      path: scriptPath,
      command: options.command ?? inferred.command,
      args: options.args ?? (options.command ? [scriptPath] : inferred.args),
      env: options.env,
      cwd: options.cwd,
    };

    this.servers.set(name, spec);
    this.log.debug({ server: name, path: scriptPath }, 'Registered tool server');
    return spec;
  }

  listRegistered(): ToolServerSpec[] {
    return Array.from(this.servers.values());
  }

  isLaunched(name: string): boolean {
    return this.registry.has(name);
  }

  /**
   * Opens a session for every registered server that is not running yet.
   * One server failing to start does not stop the others. Overlapping calls
   * share the launch already in flight.
   */
  launchAll(): Promise<LaunchReport> {
    if (!this.launching) {
      this.launching = this.launchPending().finally(() => {
        this.launching = null;
      });
    }
    return this.launching;
  }

  private async launchPending(): Promise<LaunchReport> {
    const report: LaunchReport = { launched: [], failed: [] };
    const pending = this.listRegistered().filter(spec => !this.registry.has(spec.name));

    this.log.debug({ count: pending.length }, 'Launching tool servers');

    for (const spec of pending) {
      let connection: SessionConnection | null = null;
      try {
        connection = await this.connector(spec);
        this.registry.add(new ToolSession(spec.name, connection, this.log));
        report.launched.push(spec.name);
        this.log.info({ server: spec.name, pid: connection.pid }, 'Tool server launched');
      } catch (error) {
        report.failed.push({ name: spec.name, error: errorMessage(error) });
        this.log.error({ server: spec.name, command: spec.command, error: errorMessage(error) }, 'Failed to launch tool server');
        if (connection) {
          await this.discard(spec.name, connection);
        }
      }
    }

    return report;
  }

  // Not in the registry, so shutdown() would never reach it
  private async discard(name: string, connection: SessionConnection): Promise<void> {
    try {
      await connection.close();
    } catch (error) {
      this.log.warn({ server: name, pid: connection.pid, error: errorMessage(error) }, 'Failed to close orphaned connection');
    }
  }

  /**
   * Closes every session and stops its worker. Keeps going past individual
   * failures and reports them together; calling it again is a no-op.
   */
  async shutdown(): Promise<void> {
    if (this.registry.size === 0) {
      return;
    }

    const failures = await this.registry.closeAll(this.shutdownTimeoutMs);
    if (failures.length > 0) {
      throw new ShutdownError(failures);
    }

    this.log.debug('All tool servers shut down');
  }
}
