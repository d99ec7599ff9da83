// Synthesis response parser
// Accepts {"tool_calls": [...]}, a single {"function": {...}} object, or a bare array

import { randomUUID } from 'crypto';
import { ok, err, type Result } from '../../utils/result.js';

export function createCallId(): string {
  return `call_${randomUUID().replace(/-/g, '').slice(0, 8)}`;
}

function stripCodeFence(content: string): string {
  const fenced = content.trim().match(/^```(?:json)?\s*([\s\S]*?)\s*```$/);
  return fenced ? fenced[1] : content.trim();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Gives every candidate an id and a default type; anything else is left for the gate. */
function normalizeCandidate(candidate: unknown): unknown {
  if (!isRecord(candidate)) {
    return candidate;
  }
  return {
    ...candidate,
    id: createCallId(),
    type: 'type' in candidate ? candidate.type : 'function',
  };
}

export function parseSynthesisResponse(content: string): Result<unknown[], string> {
  let body: unknown;
  try {
    body = JSON.parse(stripCodeFence(content));
  } catch {
    return err('Response is not valid JSON');
  }

  let candidates: unknown[];
  if (Array.isArray(body)) {
    candidates = body;
  } else if (isRecord(body) && Array.isArray(body.tool_calls)) {
    candidates = body.tool_calls;
  } else if (isRecord(body) && 'function' in body) {
    candidates = [body];
  } else {
    return err('Response has no tool_calls array');
  }

  return ok(candidates.map(normalizeCandidate));
}
