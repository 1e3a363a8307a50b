import { describe, it, expect, afterEach, vi } from 'vitest';
import { defaultModelFor, isProviderName, loadConfig } from '../../src/config.js';

const VARIABLES = [
  'PROVIDER', 'MODEL', 'PORT', 'LANGUAGE', 'READ_ONLY', 'OPENAI_API_KEY', 'GROQ_API_KEY', 'MISTRAL_API_KEY',
  'DEEPSEEK_API_KEY', 'OPENROUTER_API_KEY', 'NVIDIA_API_KEY', 'CUSTOM_API_KEY', 'ANTHROPIC_API_KEY',
  'CUSTOM_BASE_URL', 'HA_TOKEN', 'SUPERVISOR_TOKEN', 'MAX_ROUNDS', 'RATE_LIMIT_MAX_RETRIES',
];

function clearEnv(): void {
  // an empty value reads as unset
  for (const name of VARIABLES) {
    vi.stubEnv(name, '');
  }
}

describe('loadConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should fall back to defaults', () => {
    clearEnv();
    const config = loadConfig();

    expect(config.port).toBe(5010);
    expect(config.language).toBe('en');
    expect(config.readOnlyDefault).toBe(false);
    expect(config.selection).toEqual({ provider: 'anthropic', model: 'claude-sonnet-4-5' });
    expect(config.apiKeys).toEqual({});
    expect(config.haToken).toBeUndefined();
    expect(config.maxRounds).toBe(10);
    expect(config.retry.transientMaxRetries).toBe(1);
  });

  it('should read provider, keys and flags from the environment', () => {
    clearEnv();
    vi.stubEnv('PROVIDER', 'groq');
    vi.stubEnv('GROQ_API_KEY', 'test-secret');
    vi.stubEnv('READ_ONLY', 'yes');
    vi.stubEnv('LANGUAGE', 'it');
    vi.stubEnv('SUPERVISOR_TOKEN', 'test-token');

    const config = loadConfig();

    expect(config.selection).toEqual({ provider: 'groq', model: defaultModelFor('groq') });
    expect(config.apiKeys).toEqual({ groq: 'test-secret' });
    expect(config.readOnlyDefault).toBe(true);
    expect(config.language).toBe('it');
    expect(config.haToken).toBe('test-token');
  });

  it('should let MODEL override the default model', () => {
    clearEnv();
    vi.stubEnv('PROVIDER', 'ollama');
    vi.stubEnv('MODEL', 'qwen2.5');

    expect(loadConfig().selection).toEqual({ provider: 'ollama', model: 'qwen2.5' });
  });

  it('should reject invalid values', () => {
    clearEnv();
    vi.stubEnv('PROVIDER', 'skynet');
    expect(() => loadConfig()).toThrow(
      'Environment variable PROVIDER must be one of openai, groq, mistral, deepseek, openrouter, nvidia, custom, anthropic, ollama, opencode, got: skynet',
    );

    clearEnv();
    vi.stubEnv('PORT', 'eighty');
    expect(() => loadConfig()).toThrow('Environment variable PORT must be a number, got: eighty');

    clearEnv();
    vi.stubEnv('READ_ONLY', 'maybe');
    expect(() => loadConfig()).toThrow('Environment variable READ_ONLY must be a boolean, got: maybe');

    clearEnv();
    vi.stubEnv('LANGUAGE', 'de');
    expect(() => loadConfig()).toThrow('Environment variable LANGUAGE must be one of en, it, es, fr, got: de');
  });

  it('should recognise provider names', () => {
    expect(isProviderName('opencode')).toBe(true);
    expect(isProviderName('bard')).toBe(false);
  });
});
