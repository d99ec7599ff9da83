// Model Adapter - Main exports

export { ModelAdapter } from './adapter.js';
export type { ModelAdapterOptions } from './adapter.js';
export { extractToolRequests, hasToolRequest, splitReasoning } from './parser.js';
export { DEFAULT_PERSONALITY, buildSystemPrompt, formatToolCatalogue, toolRequestInstructions } from './prompts.js';
export { DEFAULT_DELIMITER } from './types.js';
export type { ModelTurn, ToolRequestDelimiter } from './types.js';
