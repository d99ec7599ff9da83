// Model Adapter types

import type { ProviderUsage } from '../../providers/types.js';

/** Marker lines the reasoning model wraps each free-text tool request in. */
export interface ToolRequestDelimiter {
  open: string;
  close: string;
}

export const DEFAULT_DELIMITER: ToolRequestDelimiter = {
  open: 'TOOL_INSTRUCTION',
  close: 'END_INSTRUCTION',
};

/** One reasoning-model reply, split into answer text and embedded tool requests. */
export interface ModelTurn {
  text: string;
  reasoningText?: string;
  toolRequests: string[];
  finishReason?: string;
  usage?: ProviderUsage;
}
