// Provider adapter factory

import type { Logger } from 'pino';
import type { Config, ProviderSelection } from '../config.js';
import { AnthropicAdapter } from './anthropicAdapter.js';
import { OllamaAdapter } from './ollamaAdapter.js';
import { OPENAI_COMPATIBLE_BASE_URLS, OpenAIAdapter } from './openaiAdapter.js';
import { OpencodeAdapter, OpencodeSdkTransport, type OpencodeTransport } from './opencodeAdapter.js';
import type { ProviderAdapter, SleepFn } from './providerAdapter.js';

export type { CompletionRequest, ProviderAdapter } from './providerAdapter.js';

export interface AdapterOverrides {
  sleep?: SleepFn;
  opencodeTransport?: OpencodeTransport;
}

export class ProviderConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProviderConfigError';
  }
}

const OPENROUTER_HEADERS = { 'X-Title': 'ha-chat-gateway' };

export function createProviderAdapter(
  selection: ProviderSelection,
  config: Config,
  logger: Logger,
  overrides: AdapterOverrides = {},
): ProviderAdapter {
  const base = {
    retry: config.retry,
    requestTimeoutMs: config.requestTimeoutMs,
    logger,
    ...(overrides.sleep ? { sleep: overrides.sleep } : {}),
  };
  const { provider } = selection;

  switch (provider) {
    case 'openai':
    case 'groq':
    case 'mistral':
    case 'deepseek':
    case 'nvidia':
      return new OpenAIAdapter(provider, {
        ...base,
        baseUrl: OPENAI_COMPATIBLE_BASE_URLS[provider],
        apiKey: config.apiKeys[provider],
        language: config.language,
      });
    case 'openrouter':
      return new OpenAIAdapter(provider, {
        ...base,
        baseUrl: OPENAI_COMPATIBLE_BASE_URLS.openrouter,
        apiKey: config.apiKeys.openrouter,
        language: config.language,
        extraHeaders: OPENROUTER_HEADERS,
      });
    case 'custom':
      if (!config.customBaseUrl) {
        throw new ProviderConfigError('CUSTOM_BASE_URL is required for the custom provider');
      }
      return new OpenAIAdapter(provider, {
        ...base,
        baseUrl: config.customBaseUrl.replace(/\/+$/, ''),
        apiKey: config.apiKeys.custom,
        language: config.language,
      });
    case 'anthropic':
      return new AnthropicAdapter({ ...base, apiKey: config.apiKeys.anthropic, language: config.language });
    case 'ollama':
      return new OllamaAdapter({ ...base, baseUrl: config.ollamaUrl.replace(/\/+$/, ''), language: config.language });
    case 'opencode':
      return new OpencodeAdapter({
        ...base,
        providerID: config.opencodeProvider,
        transport:
          overrides.opencodeTransport ??
          new OpencodeSdkTransport(`${config.opencodeUrl}:${config.opencodePort}`, logger.child({ provider })),
      });
  }
}

/**
 * Providers that can serve a request with the current configuration.
 */
export function availableProviders(config: Config): Array<{ name: ProviderSelection['provider']; configured: boolean }> {
  return [
    ...(['openai', 'groq', 'mistral', 'deepseek', 'openrouter', 'nvidia', 'anthropic'] as const).map((name) => ({
      name,
      configured: config.apiKeys[name] !== undefined,
    })),
    { name: 'custom' as const, configured: config.customBaseUrl !== undefined },
    { name: 'ollama' as const, configured: true },
    { name: 'opencode' as const, configured: true },
  ];
}
