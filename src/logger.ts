// Pino logger factory shared by the HTTP layer and the orchestration engine

import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger } from 'pino';

// Reads LOG_LEVEL directly so it can be called at module scope before config loads
export function makeLogger(bindings?: Record<string, unknown>): Logger {
  const isTestTooling = process.env.VITEST === 'true' || process.env.NODE_ENV === 'test';

  return pino({
    level: process.env.LOG_LEVEL ?? 'info',
    enabled: !isTestTooling,
    base: { ...bindings, service: 'ha-chat-gateway' },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: {
      paths: ['apiKey', 'token', 'headers.authorization', '*.apiKey', '*.token'],
      censor: '[REDACTED]',
    },
  });
}

export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}
