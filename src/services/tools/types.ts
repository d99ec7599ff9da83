// Tool system types
// Schemas are discovered from out-of-process tool servers; nothing here is defined locally

export interface ToolParameters {
  type: 'object';
  properties?: Record<string, unknown>;
  required?: string[];
  [key: string]: unknown;
}

/** A callable exposed by one tool server, fixed for the lifetime of its session. */
export interface ToolSchema {
  name: string;
  description: string;
  parameters: ToolParameters;
}

/** Model-facing shape of a tool schema. */
export interface FunctionTool {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: ToolParameters;
  };
}

export interface RegisterServerOptions {
  command?: string;
  args?: string[];
  env?: Record<string, string>;
  cwd?: string;
}

/** How to start one tool server process. */
export interface ToolServerSpec {
  name: string;
  path: string;
  command: string;
  args: string[];
  env?: Record<string, string>;
  cwd?: string;
}

export interface LaunchFailure {
  name: string;
  error: string;
}

export interface LaunchReport {
  launched: string[];
  failed: LaunchFailure[];
}
