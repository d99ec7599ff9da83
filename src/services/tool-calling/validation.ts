// Tool-call validation gate
// Pure predicate over one synthesized candidate; failing calls are dropped, never repaired

import { z } from 'zod';
import { createCallId } from './parser.js';
import type { ValidationResult } from './types.js';

const ToolCallShape = z.object({
  id: z.string().min(1).optional(),
  type: z.literal('function'),
  function: z.object({
    name: z.string().min(1),
    arguments: z.string({ invalid_type_error: 'arguments must be a serialized JSON object' }),
  }),
});

function invalid(reason: string): ValidationResult {
  return { valid: false, reason };
}

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  const path = issue.path.join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function validateToolCall(candidate: unknown, liveNames: ReadonlySet<string>): ValidationResult {
  const parsed = ToolCallShape.safeParse(candidate);
  if (!parsed.success) {
    return invalid(describeIssue(parsed.error));
  }

  const { id, function: fn } = parsed.data;
  if (!liveNames.has(fn.name)) {
    return invalid(`Unknown tool "${fn.name}"`);
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(fn.arguments);
  } catch {
    return invalid(`Arguments for "${fn.name}" are not valid JSON`);
  }

  if (!isPlainObject(decoded)) {
    return invalid(`Arguments for "${fn.name}" must be a JSON object`);
  }

  return {
    valid: true,
    call: { id: id ?? createCallId(), type: 'function', function: { name: fn.name, arguments: fn.arguments } },
  };
}
