// Application configuration

import { isLanguage, type Language } from './i18n.js';

export const PROVIDER_NAMES = [
  'openai',
  'groq',
  'mistral',
  'deepseek',
  'openrouter',
  'nvidia',
  'custom',
  'anthropic',
  'ollama',
  'opencode',
] as const;
export type ProviderName = (typeof PROVIDER_NAMES)[number];

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const;
type LogLevel = (typeof LOG_LEVELS)[number];

export interface ProviderSelection {
  provider: ProviderName;
  model: string;
}

export interface RetryPolicy {
  rateLimitMaxRetries: number;
  timeoutMaxRetries: number;
  // 5xx and network failures get a single retry
  transientMaxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface Config {
  // Server settings
  port: number;
  host: string;

  // Logging
  logLevel: LogLevel;

  // Conversation settings
  language: Language;
  readOnlyDefault: boolean;
  maxHistoryMessages: number;

  // Storage
  dataDir: string;
  maxSnapshotsPerFile: number;
  maxConversations: number;

  // Home Assistant settings
  haUrl: string;
  haToken: string | undefined;
  haConfigDir: string;

  // Default model selection (overridden by the persisted selection)
  selection: ProviderSelection;

  // Provider credentials and endpoints
  apiKeys: Partial<Record<ProviderName, string>>;
  customBaseUrl: string | undefined;
  ollamaUrl: string;
  opencodeUrl: string;
  opencodePort: number;
  opencodeProvider: string;

  // Orchestration policy
  maxRounds: number;
  toolResultLimit: number;
  toolResultLargeLimit: number;
  requestTimeoutMs: number;
  retry: RetryPolicy;
}

function getEnv(key: string, defaultValue?: string): string {
  const value = process.env[key];
  if (value === undefined || value === '') {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getOptionalEnv(key: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value === '' ? undefined : value;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  const num = parseInt(value, 10);
  if (isNaN(num)) {
    throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
  }
  return num;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  if (['1', 'true', 'yes', 'on'].includes(value.toLowerCase())) return true;
  if (['0', 'false', 'no', 'off'].includes(value.toLowerCase())) return false;
  throw new Error(`Environment variable ${key} must be a boolean, got: ${value}`);
}

function getEnvChoice<T extends string>(key: string, choices: readonly T[], defaultValue: T): T {
  const value = getEnv(key, defaultValue);
  const match = choices.find((choice) => choice === value);
  if (match === undefined) {
    throw new Error(`Environment variable ${key} must be one of ${choices.join(', ')}, got: ${value}`);
  }
  return match;
}

function getLanguage(): Language {
  const value = getEnv('LANGUAGE', 'en');
  if (!isLanguage(value)) {
    throw new Error(`Environment variable LANGUAGE must be one of en, it, es, fr, got: ${value}`);
  }
  return value;
}

const DEFAULT_MODELS: Record<ProviderName, string> = {
  openai: 'gpt-4o-mini',
  groq: 'llama-3.3-70b-versatile',
  mistral: 'mistral-large-latest',
  deepseek: 'deepseek-chat',
  openrouter: 'openai/gpt-4o-mini',
  nvidia: 'meta/llama-3.1-70b-instruct',
  custom: 'default',
  anthropic: 'claude-sonnet-4-5',
  ollama: 'llama3.1',
  opencode: 'gpt-4o',
};

export function defaultModelFor(provider: ProviderName): string {
  return DEFAULT_MODELS[provider];
}

export function isProviderName(value: string): value is ProviderName {
  return PROVIDER_NAMES.some((name) => name === value);
}

export function loadConfig(): Config {
  const provider = getEnvChoice('PROVIDER', PROVIDER_NAMES, 'anthropic');

  const apiKeys: Partial<Record<ProviderName, string>> = {};
  const keyVariables: Array<[ProviderName, string]> = [
    ['openai', 'OPENAI_API_KEY'],
    ['groq', 'GROQ_API_KEY'],
    ['mistral', 'MISTRAL_API_KEY'],
    ['deepseek', 'DEEPSEEK_API_KEY'],
    ['openrouter', 'OPENROUTER_API_KEY'],
    ['nvidia', 'NVIDIA_API_KEY'],
    ['custom', 'CUSTOM_API_KEY'],
    ['anthropic', 'ANTHROPIC_API_KEY'],
  ];
  for (const [name, variable] of keyVariables) {
    const key = getOptionalEnv(variable);
    if (key) apiKeys[name] = key;
  }

  return {
    // Server settings
    port: getEnvNumber('PORT', 5010),
    host: getEnv('HOST', '0.0.0.0'),

    // Logging
    logLevel: getEnvChoice('LOG_LEVEL', LOG_LEVELS, 'info'),

    // Conversation settings
    language: getLanguage(),
    readOnlyDefault: getEnvBoolean('READ_ONLY', false),
    maxHistoryMessages: getEnvNumber('MAX_HISTORY_MESSAGES', 20),

    // Storage
    dataDir: getEnv('DATA_DIR', 'data/runtime'),
    maxSnapshotsPerFile: getEnvNumber('MAX_SNAPSHOTS_PER_FILE', 10),
    maxConversations: getEnvNumber('MAX_CONVERSATIONS', 50),

    // Home Assistant settings (Supervisor proxy by default)
    haUrl: getEnv('HA_URL', 'http://supervisor/core'),
    haToken: getOptionalEnv('HA_TOKEN') ?? getOptionalEnv('SUPERVISOR_TOKEN'),
    haConfigDir: getEnv('HA_CONFIG_DIR', '/config'),

    selection: {
      provider,
      model: getEnv('MODEL', defaultModelFor(provider)),
    },

    apiKeys,
    customBaseUrl: getOptionalEnv('CUSTOM_BASE_URL'),
    ollamaUrl: getEnv('OLLAMA_URL', 'http://localhost:11434'),
    opencodeUrl: getEnv('OPENCODE_URL', 'http://localhost'),
    opencodePort: getEnvNumber('OPENCODE_PORT', 7272),
    opencodeProvider: getEnv('OPENCODE_PROVIDER', 'github-copilot'),

    // Orchestration policy
    maxRounds: getEnvNumber('MAX_ROUNDS', 10),
    toolResultLimit: getEnvNumber('TOOL_RESULT_LIMIT', 8000),
    toolResultLargeLimit: getEnvNumber('TOOL_RESULT_LARGE_LIMIT', 20000),
    requestTimeoutMs: getEnvNumber('REQUEST_TIMEOUT_MS', 30000),
    retry: {
      rateLimitMaxRetries: getEnvNumber('RATE_LIMIT_MAX_RETRIES', 3),
      timeoutMaxRetries: getEnvNumber('TIMEOUT_MAX_RETRIES', 2),
      transientMaxRetries: 1,
      baseDelayMs: getEnvNumber('RETRY_BASE_DELAY_MS', 2000),
      maxDelayMs: getEnvNumber('RETRY_MAX_DELAY_MS', 30000),
    },
  };
}
