// Environment configuration for the agent server
// Reads process.env once and maps it onto AgentConfig; the core never touches process.env

import { resolveConfig, PROVIDER_NAMES, type AgentConfig, type AgentConfigInput, type ProviderName } from './config.js';
import { createLogger } from './logger.js';

const log = createLogger('env');

const strEnv = (value: string | undefined, fallback = '') => (value ?? fallback).trim();

function parsePort(value: string | undefined, defaultPort: number): number {
  if (!value) return defaultPort;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1 || parsed > 65535) {
    log.error(`Invalid PORT "${value}", using default ${defaultPort}`);
    return defaultPort;
  }
  return parsed;
}

function parsePositiveInt(value: string | undefined, name: string): number | undefined {
  if (!value) return undefined;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed <= 0) {
    log.error(`Invalid ${name} "${value}", using default`);
    return undefined;
  }
  return parsed;
}

function parseProvider(value: string | undefined, name: string): ProviderName | undefined {
  const normalized = strEnv(value).toLowerCase();
  if (!normalized) return undefined;
  const match = PROVIDER_NAMES.find(p => p === normalized);
  if (!match) {
    log.error(`Unknown ${name} "${value}", expected one of ${PROVIDER_NAMES.join(', ')}`);
  }
  return match;
}

const optional = (value: string | undefined) => strEnv(value) || undefined;

export const env = {
  // Server
  PORT: parsePort(process.env.PORT, 3737),
  HOST: process.env.HOST || '127.0.0.1',
  NODE_ENV: process.env.NODE_ENV || 'development',
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
  TOOLS_CONFIG_FILE: strEnv(process.env.TOOLS_CONFIG_FILE),

  // Agent
  AGENT_PROVIDER: parseProvider(process.env.AGENT_PROVIDER, 'AGENT_PROVIDER'),
  AGENT_MAX_ITERATIONS: parsePositiveInt(process.env.AGENT_MAX_ITERATIONS, 'AGENT_MAX_ITERATIONS'),
  AGENT_CUSTOM_SYSTEM_PROMPT: strEnv(process.env.AGENT_CUSTOM_SYSTEM_PROMPT),

  // DeepSeek
  DEEPSEEK_API_KEY: strEnv(process.env.DEEPSEEK_API_KEY),
  DEEPSEEK_BASE_URL: optional(process.env.DEEPSEEK_BASE_URL),
  DEEPSEEK_MODEL: optional(process.env.DEEPSEEK_MODEL),

  // Qwen (DashScope compatible mode)
  QWEN_API_KEY: strEnv(process.env.QWEN_API_KEY),
  QWEN_BASE_URL: optional(process.env.QWEN_BASE_URL),
  QWEN_MODEL: optional(process.env.QWEN_MODEL),

  // OpenAI
  OPENAI_API_KEY: strEnv(process.env.OPENAI_API_KEY),
  OPENAI_BASE_URL: optional(process.env.OPENAI_BASE_URL),
  OPENAI_MODEL: optional(process.env.OPENAI_MODEL),

  // OpenRouter
  OPENROUTER_API_KEY: strEnv(process.env.OPENROUTER_API_KEY),
  OPENROUTER_BASE_URL: optional(process.env.OPENROUTER_BASE_URL),
  OPENROUTER_MODEL: optional(process.env.OPENROUTER_MODEL),

  // Tool-call synthesis
  TOOL_CALLING_PROVIDER: parseProvider(process.env.TOOL_CALLING_PROVIDER, 'TOOL_CALLING_PROVIDER'),
  TOOL_CALLING_API_KEY: optional(process.env.TOOL_CALLING_API_KEY),
  TOOL_CALLING_BASE_URL: optional(process.env.TOOL_CALLING_BASE_URL),
  TOOL_CALLING_MODEL: optional(process.env.TOOL_CALLING_MODEL),
  TOOL_CALLING_MAX_RETRIES: parsePositiveInt(process.env.TOOL_CALLING_MAX_RETRIES, 'TOOL_CALLING_MAX_RETRIES'),

  // Timeouts
  REQUEST_TIMEOUT_MS: parsePositiveInt(process.env.REQUEST_TIMEOUT_MS, 'REQUEST_TIMEOUT_MS'),
  TOOL_CALL_TIMEOUT_MS: parsePositiveInt(process.env.TOOL_CALL_TIMEOUT_MS, 'TOOL_CALL_TIMEOUT_MS'),
  SHUTDOWN_TIMEOUT_MS: parsePositiveInt(process.env.SHUTDOWN_TIMEOUT_MS, 'SHUTDOWN_TIMEOUT_MS'),

  PYTHON_BIN: optional(process.env.PYTHON_BIN),
};

type EnvSnapshot = typeof env;

export function isProviderConfigured(provider: ProviderName, source: EnvSnapshot = env): boolean {
  switch (provider) {
    case 'deepseek':
      return !!source.DEEPSEEK_API_KEY;
    case 'qwen':
      return !!source.QWEN_API_KEY;
    case 'openai':
      return !!source.OPENAI_API_KEY;
    case 'openrouter':
      return !!source.OPENROUTER_API_KEY;
  }
}

export function listConfiguredProviders(source: EnvSnapshot = env): ProviderName[] {
  return PROVIDER_NAMES.filter(p => isProviderConfigured(p, source));
}

/** Maps the environment snapshot onto a resolved AgentConfig. */
export function configFromEnv(source: EnvSnapshot = env): AgentConfig {
  const input: AgentConfigInput = {
    provider: source.AGENT_PROVIDER,
    providers: {
      deepseek: { apiKey: source.DEEPSEEK_API_KEY, baseUrl: source.DEEPSEEK_BASE_URL, model: source.DEEPSEEK_MODEL },
      qwen: { apiKey: source.QWEN_API_KEY, baseUrl: source.QWEN_BASE_URL, model: source.QWEN_MODEL },
      openai: { apiKey: source.OPENAI_API_KEY, baseUrl: source.OPENAI_BASE_URL, model: source.OPENAI_MODEL },
      openrouter: { apiKey: source.OPENROUTER_API_KEY, baseUrl: source.OPENROUTER_BASE_URL, model: source.OPENROUTER_MODEL },
    },
    agent: {
      maxIterations: source.AGENT_MAX_ITERATIONS,
      customSystemPrompt: source.AGENT_CUSTOM_SYSTEM_PROMPT,
    },
    toolCalling: {
      provider: source.TOOL_CALLING_PROVIDER,
      apiKey: source.TOOL_CALLING_API_KEY,
      baseUrl: source.TOOL_CALLING_BASE_URL,
      model: source.TOOL_CALLING_MODEL,
      maxRetries: source.TOOL_CALLING_MAX_RETRIES,
    },
    requestTimeoutMs: source.REQUEST_TIMEOUT_MS,
    toolCallTimeoutMs: source.TOOL_CALL_TIMEOUT_MS,
    shutdownTimeoutMs: source.SHUTDOWN_TIMEOUT_MS,
    pythonBin: source.PYTHON_BIN,
  };

  return resolveConfig(input);
}

// Log configuration on startup (secrets stay out of the log)
export function logConfiguration(config: AgentConfig): void {
  const configured = listConfiguredProviders();
  log.info(
    {
      environment: env.NODE_ENV,
      server: `${env.HOST}:${env.PORT}`,
      configuredProviders: configured,
      provider: config.provider,
      toolCallingProvider: config.toolCalling.provider ?? config.provider,
      toolCallingModel: config.toolCalling.model,
      maxIterations: config.agent.maxIterations,
      maxRetries: config.toolCalling.maxRetries,
      toolsConfigFile: env.TOOLS_CONFIG_FILE || null,
    },
    'Agent configuration'
  );
}
