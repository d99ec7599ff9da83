// Orchestrator Module - Main exports

export { Orchestrator } from './orchestrator.js';
export type { OrchestratorDeps } from './orchestrator.js';
export { QueryProcessor, MAX_ITERATIONS_PREFIX, TECHNICAL_ERROR_PREFIX, toolErrorMessage } from './query-processor.js';
export type { QueryProcessorOptions } from './query-processor.js';
export { ToolExecutor } from './executor.js';
export type { ExecutionResult, ToolCaller, TurnSummary } from './types.js';
