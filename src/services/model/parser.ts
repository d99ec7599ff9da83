// Reasoning Output Parser
// Pulls delimited tool requests and <think> spans out of a reasoning model's reply

import { DEFAULT_DELIMITER, type ToolRequestDelimiter } from './types.js';

const THINK_PATTERN = /<think(?:ing)?>([\s\S]*?)<\/think(?:ing)?>/gi;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function requestPattern(delimiter: ToolRequestDelimiter): RegExp {
  const open = escapeRegExp(delimiter.open);
  const close = escapeRegExp(delimiter.close);
  return new RegExp(`${open}[ \\t]*\\r?\\n([\\s\\S]*?)(?:\\r?\\n)?[ \\t]*${close}`, 'g');
}

/** Every non-empty request span, trimmed, in order of appearance. */
export function extractToolRequests(text: string, delimiter: ToolRequestDelimiter = DEFAULT_DELIMITER): string[] {
  const requests: string[] = [];

  for (const match of text.matchAll(requestPattern(delimiter))) {
    const request = match[1].trim();
    if (request) {
      requests.push(request);
    }
  }

  return requests;
}

export function hasToolRequest(text: string, delimiter: ToolRequestDelimiter = DEFAULT_DELIMITER): boolean {
  return extractToolRequests(text, delimiter).length > 0;
}

/**
 * Splits inline <think>/<thinking> blocks off the visible reply. Models that
 * return reasoning out of band leave the text untouched.
 */
export function splitReasoning(content: string): { text: string; reasoning?: string } {
  const spans: string[] = [];
  const text = content.replace(THINK_PATTERN, (_, inner: string) => {
    spans.push(inner.trim());
    return '';
  });

  if (spans.length === 0) {
    return { text: content };
  }

  return { text: text.trim(), reasoning: spans.filter(Boolean).join('\n\n') };
}
