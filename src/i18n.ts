// Localized user-facing strings, loaded from data/i18n.json

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { ProviderError } from './errors.js';

export const LANGUAGES = ['en', 'it', 'es', 'fr'] as const;
export type Language = (typeof LANGUAGES)[number];

const messagesSchema = z.object({
  error_rate_limited: z.string(),
  error_timeout: z.string(),
  error_server: z.string(),
  error_network: z.string(),
  error_auth: z.string(),
  error_quota: z.string(),
  error_invalid_request: z.string(),
  error_unknown: z.string(),
  error_aborted: z.string(),
  error_internal: z.string(),
  status_rate_limited: z.string(),
  status_timeout_retry: z.string(),
  status_retrying: z.string(),
  status_executing_tool: z.string(),
  status_auto_stop: z.string(),
  status_round_limit: z.string(),
  status_cancelled: z.string(),
  read_only_blocked: z.string(),
  read_only_prompt: z.string(),
  destructive_needs_confirmation: z.string(),
  entity_not_found: z.string(),
  entity_suggestions: z.string(),
  proceed_instruction: z.string(),
  cancel_instruction: z.string(),
  respond_instruction: z.string(),
  narration_instruction: z.string(),
  round_limit_fallback: z.string(),
  continue_instruction: z.string(),
});

export type MessageKey = keyof z.infer<typeof messagesSchema>;

const catalogSchema = z.object({
  en: messagesSchema,
  it: messagesSchema,
  es: messagesSchema,
  fr: messagesSchema,
});

type Catalog = z.infer<typeof catalogSchema>;

let catalog: Catalog | null = null;

function loadCatalog(): Catalog {
  if (!catalog) {
    const raw: unknown = JSON.parse(readFileSync(new URL('../data/i18n.json', import.meta.url), 'utf8'));
    catalog = catalogSchema.parse(raw);
  }
  return catalog;
}

export function isLanguage(value: string): value is Language {
  return LANGUAGES.some((language) => language === value);
}

/**
 * Look up a message and fill `{placeholders}`. Unknown placeholders are left as is.
 */
export function t(language: Language, key: MessageKey, params: Record<string, string | number> = {}): string {
  const template = loadCatalog()[language][key];
  return template.replace(/\{(\w+)\}/g, (match, name: string) => {
    const value = params[name];
    return value === undefined ? match : String(value);
  });
}

export function humanizeProviderError(error: Pick<ProviderError, 'kind' | 'provider' | 'message'>, language: Language): string {
  const params = { provider: error.provider, detail: error.message };
  switch (error.kind) {
    case 'rate_limited':
      return t(language, 'error_rate_limited', params);
    case 'timeout':
      return t(language, 'error_timeout', params);
    case 'server':
      return t(language, 'error_server', params);
    case 'network':
      return t(language, 'error_network', params);
    case 'auth':
      return t(language, 'error_auth', params);
    case 'quota':
      return t(language, 'error_quota', params);
    case 'invalid_request':
      return t(language, 'error_invalid_request', params);
    case 'aborted':
      return t(language, 'error_aborted', params);
    case 'unknown':
      return t(language, 'error_unknown', params);
  }
}
