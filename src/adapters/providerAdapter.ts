/**
 * Provider adapter contract and the retry state machine every backend shares.
 *
 * One round: awaiting-request -> streaming -> tool calls | text complete | error.
 * Rate limits, timeouts and transient failures loop back to awaiting-request
 * after a backoff, each with its own retry budget.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { createParser, type EventSourceMessage } from 'eventsource-parser';
import type { Logger } from 'pino';
import type { RetryPolicy } from '../config.js';
import {
  classifyProviderErrorFromMessage,
  classifyProviderErrorFromStatus,
  errorMessage,
  parseRetryAfter,
  ProviderError,
} from '../errors.js';
import type { Message } from '../types/conversation.js';
import type { StatusCode, StreamEvent } from '../types/events.js';
import type { ToolDefinition } from '../types/tools.js';

export interface CompletionRequest {
  /** Unified history, already checked for tool-call pairing */
  messages: readonly Message[];
  tools: readonly ToolDefinition[];
  /**
   * `none` keeps the tools declared (a history with tool traffic needs them on
   * some backends) but asks for a plain-text answer.
   */
  toolChoice?: 'auto' | 'none';
  systemPrompt: string;
  model: string;
  signal: AbortSignal;
}

export interface ProviderAdapter {
  readonly name: string;
  supportsNativeToolCalls(): boolean;
  streamCompletion(request: CompletionRequest): AsyncGenerator<StreamEvent>;
}

export type SleepFn = (ms: number, signal: AbortSignal) => Promise<void>;

export interface AdapterOptions {
  retry: RetryPolicy;
  /** Longest silence allowed before the first byte and between chunks */
  requestTimeoutMs: number;
  logger: Logger;
  sleep?: SleepFn;
}

const abortableSleep: SleepFn = async (ms, signal) => {
  await sleep(ms, undefined, { signal });
};

/**
 * Per-attempt abort signal: follows the caller's signal and fires on its own
 * after `timeoutMs` without progress. `touch()` restarts the timer.
 */
export class AttemptTimer {
  private readonly controller = new AbortController();
  private timer: NodeJS.Timeout | undefined;
  private readonly onParentAbort = (): void => this.controller.abort();
  timedOut = false;

  constructor(
    private readonly parent: AbortSignal,
    private readonly timeoutMs: number,
  ) {
    if (parent.aborted) {
      this.controller.abort();
    } else {
      parent.addEventListener('abort', this.onParentAbort, { once: true });
    }
    this.touch();
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  touch(): void {
    clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timedOut = true;
      this.controller.abort();
    }, this.timeoutMs);
  }

  dispose(): void {
    clearTimeout(this.timer);
    this.parent.removeEventListener('abort', this.onParentAbort);
  }
}

interface RetryCounters {
  rateLimited: number;
  timeout: number;
  transient: number;
}

interface RetryStep {
  code: StatusCode;
  waitMs: number;
  attempt: number;
}

export abstract class BaseProviderAdapter implements ProviderAdapter {
  protected readonly logger: Logger;
  private readonly sleep: SleepFn;

  constructor(
    readonly name: string,
    protected readonly options: AdapterOptions,
  ) {
    this.logger = options.logger.child({ provider: name });
    this.sleep = options.sleep ?? abortableSleep;
  }

  supportsNativeToolCalls(): boolean {
    return true;
  }

  /**
   * One attempt. Throws ProviderError on failure; the caller decides on retries.
   */
  protected abstract streamOnce(request: CompletionRequest, attempt: AttemptTimer): AsyncGenerator<StreamEvent>;

  async *streamCompletion(request: CompletionRequest): AsyncGenerator<StreamEvent> {
    const counters: RetryCounters = { rateLimited: 0, timeout: 0, transient: 0 };

    for (;;) {
      if (request.signal.aborted) {
        yield this.errorEvent(new ProviderError('Request cancelled', 'aborted', this.name));
        return;
      }

      const attempt = new AttemptTimer(request.signal, this.options.requestTimeoutMs);
      let emitted = false;
      let failure: ProviderError | null = null;
      try {
        for await (const event of this.streamOnce(request, attempt)) {
          emitted = true;
          yield event;
        }
      } catch (err) {
        failure = this.toProviderError(err, request.signal, attempt);
      } finally {
        attempt.dispose();
      }
      if (!failure) return;

      const step = failure.kind === 'aborted' ? null : this.nextRetry(failure, counters);
      if (!step) {
        this.logger.warn({ kind: failure.kind, status: failure.status, err: failure }, 'Provider call failed');
        yield this.errorEvent(failure);
        return;
      }

      this.logger.info({ kind: failure.kind, waitMs: step.waitMs, attempt: step.attempt }, 'Retrying provider call');
      if (emitted) {
        yield { type: 'round_reset' };
      }
      yield { type: 'status', code: step.code, waitMs: step.waitMs, attempt: step.attempt };
      try {
        await this.sleep(step.waitMs, request.signal);
      } catch {
        yield this.errorEvent(new ProviderError('Request cancelled', 'aborted', this.name));
        return;
      }
    }
  }

  private nextRetry(error: ProviderError, counters: RetryCounters): RetryStep | null {
    const { retry } = this.options;
    switch (error.kind) {
      case 'rate_limited': {
        if (counters.rateLimited >= retry.rateLimitMaxRetries) return null;
        counters.rateLimited++;
        const backoff = Math.min(retry.baseDelayMs * 2 ** (counters.rateLimited - 1), retry.maxDelayMs);
        const waitMs = Math.min(error.retryAfterMs ?? backoff, retry.maxDelayMs);
        return { code: 'rate_limited', waitMs, attempt: counters.rateLimited };
      }
      case 'timeout':
        if (counters.timeout >= retry.timeoutMaxRetries) return null;
        counters.timeout++;
        return { code: 'timeout_retry', waitMs: retry.baseDelayMs, attempt: counters.timeout };
      case 'server':
      case 'network':
        if (counters.transient >= retry.transientMaxRetries) return null;
        counters.transient++;
        return { code: 'retrying', waitMs: retry.baseDelayMs, attempt: counters.transient };
      default:
        return null;
    }
  }

  private toProviderError(err: unknown, signal: AbortSignal, attempt: AttemptTimer): ProviderError {
    if (signal.aborted) {
      return new ProviderError('Request cancelled', 'aborted', this.name, { cause: err });
    }
    if (attempt.timedOut) {
      return new ProviderError(
        `No response from ${this.name} within ${this.options.requestTimeoutMs}ms`,
        'timeout',
        this.name,
        { cause: err },
      );
    }
    if (err instanceof ProviderError) {
      return err;
    }
    if (err instanceof TypeError && /fetch failed/i.test(err.message)) {
      return new ProviderError(`Cannot reach ${this.name}: ${errorMessage(err.cause ?? err)}`, 'network', this.name, {
        cause: err,
      });
    }
    const message = errorMessage(err);
    return new ProviderError(message, classifyProviderErrorFromMessage(message), this.name, { cause: err });
  }

  private errorEvent(error: ProviderError): StreamEvent {
    return {
      type: 'error',
      error: {
        kind: error.kind,
        message: error.message,
        provider: error.provider,
        ...(error.status !== undefined ? { status: error.status } : {}),
      },
    };
  }

  /**
   * POST JSON and return the streaming response; non-2xx answers become ProviderErrors.
   */
  protected async postJson(
    url: string,
    body: unknown,
    headers: Record<string, string>,
    attempt: AttemptTimer,
  ): Promise<Response> {
    const response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: JSON.stringify(body),
      signal: attempt.signal,
    });
    attempt.touch();
    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new ProviderError(
        `${this.name} returned ${response.status}: ${extractErrorMessage(text) || response.statusText}`,
        classifyProviderErrorFromStatus(response.status, text),
        this.name,
        { status: response.status, retryAfterMs: parseRetryAfter(response.headers.get('retry-after')) },
      );
    }
    return response;
  }

  /**
   * Decoded text chunks of a response body, restarting the idle timer on each.
   */
  protected async *readText(response: Response, attempt: AttemptTimer): AsyncGenerator<string> {
    const body = response.body;
    if (!body) {
      throw new ProviderError(`${this.name} returned an empty body`, 'server', this.name);
    }
    const reader = body.getReader();
    const decoder = new TextDecoder();
    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;
        attempt.touch();
        yield decoder.decode(value, { stream: true });
      }
      const rest = decoder.decode();
      if (rest) yield rest;
    } finally {
      reader.releaseLock();
    }
  }

  protected async *readServerSentEvents(response: Response, attempt: AttemptTimer): AsyncGenerator<EventSourceMessage> {
    const queue: EventSourceMessage[] = [];
    const parser = createParser({
      onEvent(event) {
        queue.push(event);
      },
    });
    for await (const chunk of this.readText(response, attempt)) {
      parser.feed(chunk);
      yield* queue.splice(0);
    }
  }

  protected async *readLines(response: Response, attempt: AttemptTimer): AsyncGenerator<string> {
    let buffer = '';
    for await (const chunk of this.readText(response, attempt)) {
      buffer += chunk;
      const lines = buffer.split('\n');
      buffer = lines.pop() ?? '';
      for (const line of lines) {
        if (line.trim()) yield line;
      }
    }
    if (buffer.trim()) yield buffer;
  }

  /**
   * Parse streamed JSON, logging and skipping frames that are not JSON.
   */
  protected parseFrame(data: string): unknown {
    try {
      return JSON.parse(data);
    } catch (err) {
      this.logger.warn({ dataLength: data.length, err }, 'Malformed stream frame');
      return undefined;
    }
  }
}

function extractErrorMessage(body: string): string {
  try {
    const parsed: unknown = JSON.parse(body);
    if (parsed && typeof parsed === 'object' && 'error' in parsed) {
      const { error } = parsed;
      if (typeof error === 'string') return error;
      if (error && typeof error === 'object' && 'message' in error && typeof error.message === 'string') {
        return error.message;
      }
    }
  } catch {
    // not JSON: fall through to the raw text
  }
  return body.slice(0, 300);
}
