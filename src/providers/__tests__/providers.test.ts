import { describe, it, expect, vi } from 'vitest';
import type OpenAI from 'openai';
import { resolveConfig } from '../../config.js';
import { ConfigurationError, ModelError } from '../../utils/errors.js';
import {
  DeepSeekProvider,
  OpenAICompatibleProvider,
  OpenRouterProvider,
  PROVIDER_PRESETS,
  createProvider,
  createReasoningProvider,
  createToolCallingProvider,
  type ChatCompletionsClient,
} from '../index.js';

function completion(content: string | null, extra: Record<string, unknown> = {}): OpenAI.ChatCompletion {
  const message: OpenAI.ChatCompletionMessage = Object.assign(
    { role: 'assistant' as const, content, refusal: null },
    extra
  );
  return {
    id: 'chatcmpl-test',
    object: 'chat.completion',
    created: 0,
    model: 'test-model',
    choices: [{ index: 0, message, finish_reason: 'stop', logprobs: null }],
    usage: { prompt_tokens: 12, completion_tokens: 3, total_tokens: 15 },
  };
}

function createFakeClient(result: OpenAI.ChatCompletion) {
  const create = vi.fn(
    async (_body: OpenAI.ChatCompletionCreateParamsNonStreaming, _options?: { signal?: AbortSignal }) => result
  );
  const client: ChatCompletionsClient = { create };
  return { client, create };
}

describe('OpenAICompatibleProvider', () => {
  it('maps messages and options onto a chat completion request', async () => {
    const { client, create } = createFakeClient(completion('Hello!'));
    const provider = new OpenAICompatibleProvider('openai', {
      apiKey: 'test-secret',
      baseUrl: 'http://localhost',
      defaultModel: 'gpt-test',
      client,
    });

    const response = await provider.sendChat(
      [
        { role: 'system', content: 'sys' },
        { role: 'user', content: 'hi' },
      ],
      { model: '', maxTokens: 64, temperature: 0.1, responseFormat: 'json_object' }
    );

    expect(create.mock.calls[0][0]).toEqual({
      model: 'gpt-test',
      messages: [
        { role: 'system', content: 'sys' },
        { role: 'user', content: 'hi' },
      ],
      stream: false,
      max_tokens: 64,
      temperature: 0.1,
      response_format: { type: 'json_object' },
    });
    expect(response).toEqual({
      content: 'Hello!',
      finishReason: 'stop',
      usage: { promptTokens: 12, completionTokens: 3, totalTokens: 15 },
    });
  });

  it('reads reasoning from reasoning_content or reasoning', async () => {
    const deepseek = new OpenAICompatibleProvider('a', {
      apiKey: '',
      baseUrl: '',
      defaultModel: 'm',
      client: createFakeClient(completion('answer', { reasoning_content: 'step by step' })).client,
    });
    const openrouter = new OpenAICompatibleProvider('b', {
      apiKey: '',
      baseUrl: '',
      defaultModel: 'm',
      client: createFakeClient(completion('answer', { reasoning: 'thinking out loud' })).client,
    });

    await expect(deepseek.sendChat([], { model: 'm' })).resolves.toMatchObject({ reasoning: 'step by step' });
    await expect(openrouter.sendChat([], { model: 'm' })).resolves.toMatchObject({ reasoning: 'thinking out loud' });
  });

  it('treats null content as empty text', async () => {
    const provider = new OpenAICompatibleProvider('openai', {
      apiKey: '',
      baseUrl: '',
      defaultModel: 'm',
      client: createFakeClient(completion(null)).client,
    });
    await expect(provider.sendChat([], { model: 'm' })).resolves.toMatchObject({ content: '' });
  });

  it('raises ModelError when there are no choices', async () => {
    const empty: OpenAI.ChatCompletion = { ...completion('x'), choices: [] };
    const provider = new OpenAICompatibleProvider('qwen', {
      apiKey: '',
      baseUrl: '',
      defaultModel: 'qwen-plus',
      client: createFakeClient(empty).client,
    });

    await expect(provider.sendChat([], { model: 'qwen-plus' })).rejects.toThrow(ModelError);
    await expect(provider.sendChat([], { model: 'qwen-plus' })).rejects.toThrow('qwen returned no choices');
  });

  it('requires an API key without an injected client', () => {
    expect(() => new OpenAICompatibleProvider('openai', { apiKey: '', baseUrl: '', defaultModel: 'm' })).toThrow(
      ConfigurationError
    );
  });
});

describe('DeepSeekProvider', () => {
  it('drops sampling and JSON mode for the reasoner', async () => {
    const { client, create } = createFakeClient(completion('ok'));
    const provider = new DeepSeekProvider({ apiKey: 'test-secret', client });

    await provider.sendChat([{ role: 'user', content: 'hi' }], {
      model: 'deepseek-reasoner',
      temperature: 0.5,
      responseFormat: 'json_object',
    });

    const body = create.mock.calls[0][0];
    expect(body.model).toBe('deepseek-reasoner');
    expect(body.temperature).toBeUndefined();
    expect(body.response_format).toBeUndefined();
  });

  it('defaults to deepseek-chat', () => {
    const provider = new DeepSeekProvider({ apiKey: 'test-secret', client: createFakeClient(completion('')).client });
    expect(provider.defaultModel).toBe('deepseek-chat');
    expect(provider.name).toBe('deepseek');
  });
});

describe('provider registry', () => {
  it('builds providers from presets', () => {
    const { client } = createFakeClient(completion(''));
    expect(createProvider('openrouter', { apiKey: 'test-secret', client })).toBeInstanceOf(OpenRouterProvider);
    expect(createProvider('qwen', { apiKey: 'test-secret', client }).defaultModel).toBe(PROVIDER_PRESETS.qwen.model);
    expect(createProvider('openai', { apiKey: 'test-secret', model: 'gpt-custom', client }).defaultModel).toBe(
      'gpt-custom'
    );
  });

  it('refuses a reasoning provider without an API key', () => {
    expect(() => createReasoningProvider(resolveConfig({ provider: 'qwen' }))).toThrow(ConfigurationError);
  });

  it('lets tool calling borrow the reasoning credentials and preset model', () => {
    const config = resolveConfig({ providers: { deepseek: { apiKey: 'test-secret' } } });

    const reasoning = createReasoningProvider(config);
    const toolCalling = createToolCallingProvider(config);

    expect(reasoning.defaultModel).toBe('deepseek-chat');
    expect(toolCalling.name).toBe('deepseek');
    expect(toolCalling.defaultModel).toBe(PROVIDER_PRESETS.deepseek.toolCallingModel);
  });

  it('uses a dedicated tool-calling provider when configured', () => {
    const config = resolveConfig({
      provider: 'openrouter',
      providers: { openrouter: { apiKey: 'test-secret' }, openai: { apiKey: 'test-secret-2' } },
      toolCalling: { provider: 'openai', model: 'gpt-tools' },
    });

    const toolCalling = createToolCallingProvider(config);

    expect(toolCalling.name).toBe('openai');
    expect(toolCalling.defaultModel).toBe('gpt-tools');
  });
});
