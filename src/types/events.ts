/**
 * Event types flowing between adapters, the orchestration loop and callers.
 */

import type { ProviderErrorKind } from '../errors.js';

export type StatusCode =
  | 'rate_limited'
  | 'timeout_retry'
  | 'retrying'
  | 'executing_tool'
  | 'auto_stop'
  | 'round_limit'
  | 'cancelled';

export interface StreamError {
  kind: ProviderErrorKind;
  message: string;
  provider: string;
  status?: number;
}

/**
 * Unified event emitted by provider adapters for one round.
 *
 * `round_reset` tells the consumer to drop every delta it accumulated for the
 * current round; the adapter is about to re-stream it after a retry.
 */
export type StreamEvent =
  | { type: 'text_delta'; text: string }
  | { type: 'tool_call_start'; index: number; id: string; name: string }
  | { type: 'tool_call_delta'; index: number; argumentsDelta: string }
  | { type: 'tool_call_end'; index: number }
  | { type: 'status'; code: StatusCode; waitMs?: number; attempt?: number }
  | { type: 'round_reset' }
  | { type: 'error'; error: StreamError }
  | { type: 'round_complete'; finishReason: 'stop' | 'tool_calls' | 'length' | 'unknown' };

/**
 * Events delivered to callers of the chat service (web UI, messaging bridges).
 */
export type ChatEvent =
  | { type: 'text_delta'; text: string }
  | { type: 'clear' }
  | { type: 'tool_badge'; name: string; description: string }
  | { type: 'status'; code: StatusCode; message: string }
  | { type: 'final'; text: string; intent: string; rounds: number; autoStopped: boolean }
  | { type: 'error'; kind: ProviderErrorKind | 'internal'; message: string };
