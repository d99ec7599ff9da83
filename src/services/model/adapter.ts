// Model Adapter
// One reasoning-model call per turn: transcript in, answer text and tool requests out

import { createLogger, type Logger } from '../../logger.js';
import type { Provider, ProviderMessage, ProviderResponse } from '../../providers/types.js';
import { ModelError, errorMessage } from '../../utils/errors.js';
import { ok, err, type Result } from '../../utils/result.js';
import { preview } from '../../utils/text.js';
import { withTimeout } from '../../utils/timeout.js';
import type { Message } from '../history/types.js';
import type { FunctionTool } from '../tools/types.js';
import { extractToolRequests, splitReasoning } from './parser.js';
import { formatToolCatalogue } from './prompts.js';
import { DEFAULT_DELIMITER, type ModelTurn, type ToolRequestDelimiter } from './types.js';

export interface ModelAdapterOptions {
  timeoutMs: number;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  delimiter?: ToolRequestDelimiter;
  logger?: Logger;
}

function renderToolResult(message: Message): string {
  const call = message.toolCallId ? ` (call ${message.toolCallId})` : '';
  return `Tool "${message.toolName ?? 'unknown'}" result${call}:\n${message.content}`;
}

export class ModelAdapter {
  private provider: Provider;
  private options: ModelAdapterOptions;
  private delimiter: ToolRequestDelimiter;
  private log: Logger;

  constructor(provider: Provider, options: ModelAdapterOptions) {
    this.provider = provider;
    this.options = options;
    this.delimiter = options.delimiter ?? DEFAULT_DELIMITER;
    this.log = options.logger ?? createLogger('model-adapter');
  }

  get providerName(): string {
    return this.provider.name;
  }

  get model(): string {
    return this.options.model || this.provider.defaultModel;
  }

  /**
   * Renders the transcript as plain chat messages. Tool results become user
   * turns, adjacent user turns are merged, and the tool catalogue rides on the
   * first system message of this request only.
   */
  formatTranscript(transcript: readonly Message[], tools: readonly FunctionTool[] | null): ProviderMessage[] {
    const messages: ProviderMessage[] = [];

    for (const message of transcript) {
      const role = message.role === 'tool_result' ? 'user' : message.role;
      const content = message.role === 'tool_result' ? renderToolResult(message) : message.content;

      const previous = messages[messages.length - 1];
      if (role === 'user' && previous?.role === 'user') {
        previous.content = `${previous.content}\n\n${content}`;
        continue;
      }
      messages.push({ role, content });
    }

    if (tools && tools.length > 0) {
      const catalogue = formatToolCatalogue(tools);
      const system = messages.find(m => m.role === 'system');
      if (system) {
        system.content = `${system.content}\n\n${catalogue}`;
      } else {
        messages.unshift({ role: 'system', content: catalogue });
      }
    }

    return messages;
  }

  async execute(
    transcript: readonly Message[],
    tools: readonly FunctionTool[] | null
  ): Promise<Result<ModelTurn, ModelError>> {
    const messages = this.formatTranscript(transcript, tools);
    const controller = new AbortController();
    const { timeoutMs } = this.options;

    this.log.debug({ model: this.model, messages: messages.length, tools: tools?.length ?? 0 }, 'Calling reasoning model');

    let response: ProviderResponse;
    try {
      response = await withTimeout(
        this.provider.sendChat(messages, {
          model: this.model,
          temperature: this.options.temperature,
          maxTokens: this.options.maxTokens,
          signal: controller.signal,
        }),
        timeoutMs,
        `Reasoning model did not respond within ${timeoutMs}ms`
      );
    } catch (error) {
      controller.abort();
      this.log.error({ model: this.model, error: errorMessage(error) }, 'Reasoning model call failed');
      return err(
        error instanceof ModelError
          ? error
          : new ModelError(errorMessage(error), { provider: this.provider.name, model: this.model }, { cause: error })
      );
    }

    const { text, reasoning } = splitReasoning(response.content);
    const reasoningText = response.reasoning || reasoning;
    const toolRequests = extractToolRequests(text, this.delimiter);

    if (reasoningText) {
      this.log.debug({ reasoning: preview(reasoningText, 500) }, 'Model reasoning');
    }
    this.log.debug({ content: preview(text), toolRequests: toolRequests.length }, 'Reasoning model replied');

    const turn: ModelTurn = {
      text,
      toolRequests,
      finishReason: response.finishReason,
      usage: response.usage,
    };
    if (reasoningText) {
      turn.reasoningText = reasoningText;
    }

    return ok(turn);
  }
}
