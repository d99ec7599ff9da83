// Reasoning model prompts

import type { FunctionTool } from '../tools/types.js';
import { DEFAULT_DELIMITER, type ToolRequestDelimiter } from './types.js';

export const DEFAULT_PERSONALITY =
  'You are an intelligent assistant. When users need specific information, you should use available tools to obtain it.';

export function toolRequestInstructions(delimiter: ToolRequestDelimiter = DEFAULT_DELIMITER): string {
  return `Your response should follow one of these formats:

1. If tools are needed:
${delimiter.open}
<describe the tool and parameters you need here>
${delimiter.close}
<your other explanations or responses>

2. If no tools are needed:
Provide answer or explanation directly

You may include several ${delimiter.open} blocks when more than one tool is needed.
Remember: Only use tools when specific information is truly needed. If you can answer directly, do so.`;
}

export function buildSystemPrompt(customPrompt: string = '', delimiter?: ToolRequestDelimiter): string {
  const personality = customPrompt.trim() || DEFAULT_PERSONALITY;
  return `${personality}\n\n${toolRequestInstructions(delimiter)}`;
}

function parameterNames(tool: FunctionTool): string[] {
  return Object.keys(tool.function.parameters.properties ?? {});
}

export function formatToolCatalogue(tools: readonly FunctionTool[]): string {
  const lines = tools.map(tool => {
    const params = parameterNames(tool);
    const suffix = params.length > 0 ? ` (params: ${params.join(', ')})` : '';
    return `- ${tool.function.name}: ${tool.function.description}${suffix}`;
  });
  return `Available tools:\n${lines.join('\n')}`;
}
