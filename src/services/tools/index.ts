// Tool Sessions - Main exports

export { SessionRegistry, toFunctionTool } from './registry.js';
export { Launcher, resolveCommand } from './launcher.js';
export { ToolSession, connectStdio, normalizeToolResult, CLIENT_INFO } from './session.js';
export type { SessionConnection, SessionConnector, NormalizedToolResult } from './session.js';
export type {
  ToolSchema,
  ToolParameters,
  FunctionTool,
  ToolServerSpec,
  RegisterServerOptions,
  LaunchReport,
  LaunchFailure,
} from './types.js';
