// Tool-call synthesis prompts

import type { FunctionTool } from '../tools/types.js';

function describeTool(tool: FunctionTool): string {
  const params = Object.keys(tool.function.parameters.properties ?? {});
  const description = tool.function.description || 'No description available';
  const paramList = params.length > 0 ? params.join(', ') : 'No parameters';
  return `- ${tool.function.name}: ${description}\n  Parameters: ${paramList}`;
}

export function buildSynthesisPrompt(tools: readonly FunctionTool[]): string {
  return `You are a tool calling expert. Your task is to generate correct JSON format tool calls based ONLY on the tools that are available.

AVAILABLE TOOLS (ONLY USE THESE - DO NOT INVENT NEW ONES):
${tools.map(describeTool).join('\n')}

IMPORTANT RULES:
1. ONLY use tool names from the list above - never invent new tool names
2. ONLY use parameter names that are listed for each tool - never invent new parameters
3. If a requested tool doesn't exactly match any available tool, use the closest matching one
4. YOU CAN USE MULTIPLE TOOLS OR THE SAME TOOL MULTIPLE TIMES if the request requires it
5. If only one tool is needed, still use the proper array format with a single element

You must output strictly in the following JSON format:
{
    "tool_calls": [
        {
            "function": {
                "name": "tool_name",
                "arguments": "{\\"parameter_name\\": \\"parameter_value\\"}"
            }
        }
    ]
}

The number of tool calls in the array should match exactly what's needed - don't add unnecessary calls.
Output JSON only, no other text. The arguments must be a valid JSON string (with escaped quotes).`;
}

export const REWRITE_SYSTEM_PROMPT = `You rewrite tool requests so that a tool calling model can turn them into valid calls.
Keep the user's intent. Name the tool to use and give every parameter value explicitly.
Reply with the rewritten request only, as plain text.`;

export function buildRewriteRequest(instruction: string, previousError: string, tools: readonly FunctionTool[]): string {
  return `Original request:
${instruction}

The previous attempt failed with: ${previousError}

Tools that may be used: ${tools.map(tool => tool.function.name).join(', ')}`;
}
