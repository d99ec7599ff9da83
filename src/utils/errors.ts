// Error taxonomy for the agent core
// Remote-call failures are values or transcript content; only setup errors are fatal

import type { Logger } from 'pino';

export enum ErrorCode {
  MODEL_ERROR = 'model_error',
  CONFIGURATION_ERROR = 'configuration_error',
  TOOL_EXECUTION_ERROR = 'tool_execution_error',
  SHUTDOWN_ERROR = 'shutdown_error',
  BAD_REQUEST = 'bad_request',
  INTERNAL_ERROR = 'internal_error',
}

export class AgentError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public details?: unknown,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AgentError';
  }

  static badRequest(message: string = 'Bad request', details?: unknown): AgentError {
    return new AgentError(ErrorCode.BAD_REQUEST, message, details);
  }

  static internal(message: string = 'Internal error', details?: unknown): AgentError {
    return new AgentError(ErrorCode.INTERNAL_ERROR, message, details);
  }
}

/** No usable response from the reasoning or synthesis model. */
export class ModelError extends AgentError {
  constructor(message: string, details?: unknown, options?: { cause?: unknown }) {
    super(ErrorCode.MODEL_ERROR, message, details, options);
    this.name = 'ModelError';
  }
}

/** An operation was attempted before its lifecycle step, or setup input is invalid. */
export class ConfigurationError extends AgentError {
  constructor(message: string, details?: unknown) {
    super(ErrorCode.CONFIGURATION_ERROR, message, details);
    this.name = 'ConfigurationError';
  }
}

export class ToolExecutionError extends AgentError {
  constructor(
    public toolName: string,
    message: string,
    details?: unknown,
    options?: { cause?: unknown }
  ) {
    super(ErrorCode.TOOL_EXECUTION_ERROR, message, details, options);
    this.name = 'ToolExecutionError';
  }
}

export interface ShutdownFailure {
  session: string;
  message: string;
}

export class ShutdownError extends AgentError {
  constructor(public failures: ShutdownFailure[]) {
    super(
      ErrorCode.SHUTDOWN_ERROR,
      `Failed to shut down ${failures.length} session(s): ${failures.map(f => `${f.session} (${f.message})`).join(', ')}`,
      { failures }
    );
    this.name = 'ShutdownError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Normalizes any thrown value into an AgentError and logs it together with
 * the caller's context (query, tool name, arguments...).
 */
export function handleError(
  error: unknown,
  context: Record<string, unknown>,
  logger?: Logger
): AgentError {
  const normalized = error instanceof AgentError
    ? error
    : new AgentError(ErrorCode.INTERNAL_ERROR, errorMessage(error), undefined, { cause: error });

  logger?.error({ ...context, code: normalized.code, err: normalized }, normalized.message);
  return normalized;
}

export interface ErrorResponse {
  error: ErrorCode;
  message: string;
  statusCode: number;
  details?: unknown;
}

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  [ErrorCode.MODEL_ERROR]: 502,
  [ErrorCode.CONFIGURATION_ERROR]: 409,
  [ErrorCode.TOOL_EXECUTION_ERROR]: 502,
  [ErrorCode.SHUTDOWN_ERROR]: 500,
  [ErrorCode.BAD_REQUEST]: 400,
  [ErrorCode.INTERNAL_ERROR]: 500,
};

export function formatErrorResponse(error: AgentError, includeDetails: boolean = false): ErrorResponse {
  const response: ErrorResponse = {
    error: error.code,
    message: error.message,
    statusCode: STATUS_BY_CODE[error.code],
  };

  if (includeDetails && error.details) {
    response.details = error.details;
  }

  return response;
}
