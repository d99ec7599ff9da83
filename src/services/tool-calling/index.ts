// Tool-Call Synthesizer - Main exports

export { ToolCallSynthesizer, truncateInstruction, MAX_FALLBACK_INSTRUCTION_LENGTH } from './synthesizer.js';
export type { ToolCallSynthesizerOptions } from './synthesizer.js';
export { validateToolCall } from './validation.js';
export { parseSynthesisResponse, createCallId } from './parser.js';
export { keepCount, rankTools, relevanceScore, shrinkCandidates } from './candidates.js';
export { buildSynthesisPrompt } from './prompts.js';
export type { RetryStats, SynthesisResult, ValidationResult } from './types.js';
