import { describe, it, expect } from 'vitest';
import { resolveConfig } from '../config.js';
import { configFromEnv, env, listConfiguredProviders } from '../env.js';
import { ConfigurationError } from '../utils/errors.js';

describe('resolveConfig', () => {
  it('fills in defaults', () => {
    const config = resolveConfig();

    expect(config.provider).toBe('deepseek');
    expect(config.agent.maxIterations).toBe(10);
    expect(config.agent.customSystemPrompt).toBe('');
    expect(config.toolCalling.maxRetries).toBe(5);
    expect(config.requestTimeoutMs).toBe(60000);
    expect(config.toolCallTimeoutMs).toBe(60000);
    expect(config.shutdownTimeoutMs).toBe(5000);
    expect(config.pythonBin).toBe('python3');
    expect(config.providers.qwen.apiKey).toBe('');
  });

  it('returns a frozen object', () => {
    const config = resolveConfig({ agent: { maxIterations: 3 } });

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.agent)).toBe(true);
    expect(Object.isFrozen(config.providers.deepseek)).toBe(true);
  });

  it('rejects invalid values', () => {
    expect(() => resolveConfig({ agent: { maxIterations: 0 } })).toThrow(ConfigurationError);
    expect(() => resolveConfig({ toolCalling: { maxRetries: 1.5 } })).toThrow('Invalid agent configuration');
  });
});

describe('configFromEnv', () => {
  it('maps an environment snapshot onto the config', () => {
    const config = configFromEnv({
      ...env,
      AGENT_PROVIDER: 'openrouter',
      AGENT_MAX_ITERATIONS: 3,
      OPENROUTER_API_KEY: 'test-secret',
      TOOL_CALLING_MODEL: 'deepseek/deepseek-chat',
      TOOL_CALLING_MAX_RETRIES: 2,
      PYTHON_BIN: 'python3.12',
    });

    expect(config.provider).toBe('openrouter');
    expect(config.providers.openrouter.apiKey).toBe('test-secret');
    expect(config.agent.maxIterations).toBe(3);
    expect(config.toolCalling.model).toBe('deepseek/deepseek-chat');
    expect(config.toolCalling.maxRetries).toBe(2);
    expect(config.pythonBin).toBe('python3.12');
  });

  it('lists providers that have keys', () => {
    const snapshot = {
      ...env,
      DEEPSEEK_API_KEY: '',
      QWEN_API_KEY: 'test-secret',
      OPENAI_API_KEY: '',
      OPENROUTER_API_KEY: 'test-secret',
    };

    expect(listConfiguredProviders(snapshot)).toEqual(['qwen', 'openrouter']);
  });
});
