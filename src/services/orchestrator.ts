/**
 * Orchestration loop: provider rounds, sequential tool execution, auto-stop
 * and cancellation.
 *
 * The loop never looks at which provider it talks to; every quirk lives in
 * the adapter. History is appended in place, so after a run the caller's
 * array holds the assistant and tool turns produced by it.
 */

import type { Logger } from 'pino';
import type { CompletionRequest, ProviderAdapter } from '../adapters/providerAdapter.js';
import { t, humanizeProviderError, type Language } from '../i18n.js';
import type { Message, ToolCall } from '../types/conversation.js';
import type { ChatEvent, StatusCode, StreamError, StreamEvent } from '../types/events.js';
import type { IntentDecision } from '../types/intent.js';
import type { ToolResult } from '../types/tools.js';
import { ConversationHelper, stableStringify } from './conversationHelper.js';
import type { ExecutionContext, ToolExecutor } from './toolExecutor.js';
import type { ToolRegistry } from './toolRegistry.js';

export interface OrchestratorOptions {
  registry: ToolRegistry;
  executor: ToolExecutor;
  maxRounds: number;
  logger: Logger;
}

export interface RunRequest {
  history: Message[];
  decision: IntentDecision;
  systemPrompt: string;
  adapter: ProviderAdapter;
  model: string;
  signal: AbortSignal;
  execution: ExecutionContext;
}

export type RunStatus = 'completed' | 'auto_stopped' | 'round_limit' | 'cancelled' | 'failed';

export interface RunOutcome {
  status: RunStatus;
  text: string;
  rounds: number;
}

interface RoundResult {
  text: string;
  calls: ToolCall[];
  error: StreamError | null;
}

interface PendingCall {
  id: string;
  name: string;
  args: string;
}

const NOT_EXECUTED = JSON.stringify({ status: 'cancelled', error: 'Not executed: the request was cancelled' });

/**
 * Turn streamed argument text into an argument object. Empty means no
 * arguments; anything that is not a JSON object is kept as a parse error so
 * the executor can answer it.
 */
export function parseToolArguments(raw: string): { arguments: Record<string, unknown>; parseError?: string } {
  if (raw.trim() === '') {
    return { arguments: {} };
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)) {
      return { arguments: Object.fromEntries(Object.entries(parsed)) };
    }
    return { arguments: {}, parseError: 'arguments must be a JSON object' };
  } catch (err) {
    return { arguments: {}, parseError: err instanceof Error ? err.message : String(err) };
  }
}

export class Orchestrator {
  private readonly logger: Logger;

  constructor(private readonly options: OrchestratorOptions) {
    this.logger = options.logger.child({ component: 'orchestrator' });
  }

  async *run(request: RunRequest): AsyncGenerator<ChatEvent, RunOutcome> {
    const { decision, history, adapter, signal, execution } = request;
    const language = execution.language;
    const log = this.logger.child({ sessionId: execution.sessionId, intent: decision.intent, provider: adapter.name });
    const maxRounds = decision.maxRounds ?? this.options.maxRounds;
    const autoStopTools = this.options.registry.autoStopTools(decision.intent);
    // read results of this run, keyed by tool name and canonical arguments
    const readCache = new Map<string, ToolResult>();

    let rounds = 0;
    let narrating = false;
    let lastText = '';

    const finish = (status: RunStatus, text: string): RunOutcome => ({ status, text, rounds });

    for (;;) {
      if (signal.aborted) {
        yield this.status('cancelled', language, adapter.name);
        return finish('cancelled', lastText);
      }
      if (rounds >= maxRounds && !narrating) {
        log.warn({ rounds }, 'Round limit reached');
        yield this.status('round_limit', language, adapter.name, { rounds });
        const text = lastText || t(language, 'round_limit_fallback');
        yield { type: 'final', text, intent: decision.intent, rounds, autoStopped: false };
        return finish('round_limit', text);
      }

      ConversationHelper.assertToolPairing(history);
      rounds++;
      const completion: CompletionRequest = {
        messages: history,
        tools: decision.tools,
        ...(narrating ? { toolChoice: 'none' as const } : {}),
        systemPrompt: narrating
          ? `${request.systemPrompt}\n\n${t(language, 'narration_instruction')}`
          : request.systemPrompt,
        model: request.model,
        signal,
      };
      log.debug({ round: rounds, tools: completion.tools.length, messages: history.length }, 'Starting round');

      const round = yield* this.streamRound(adapter, completion, language);

      if (round.error) {
        // a half-streamed round keeps its text but never an unanswered tool call
        if (round.text) {
          history.push({ role: 'assistant', content: round.text });
        }
        if (round.error.kind === 'aborted') {
          yield this.status('cancelled', language, adapter.name);
          return finish('cancelled', round.text || lastText);
        }
        yield {
          type: 'error',
          kind: round.error.kind,
          message: humanizeProviderError(round.error, language),
        };
        return finish('failed', round.text || lastText);
      }

      if (signal.aborted) {
        // the provider finished the round anyway; its tool calls are not recorded
        if (round.text) {
          history.push({ role: 'assistant', content: round.text });
        }
        yield this.status('cancelled', language, adapter.name);
        return finish('cancelled', round.text || lastText);
      }

      const calls = narrating ? [] : round.calls;
      history.push({
        role: 'assistant',
        content: round.text || null,
        ...(calls.length > 0 ? { toolCalls: calls } : {}),
      });
      if (round.text) {
        lastText = round.text;
      }

      if (narrating) {
        yield this.status('auto_stop', language, adapter.name);
        yield { type: 'final', text: lastText, intent: decision.intent, rounds, autoStopped: true };
        return finish('auto_stopped', lastText);
      }
      if (calls.length === 0) {
        yield { type: 'final', text: round.text, intent: decision.intent, rounds, autoStopped: false };
        return finish('completed', round.text);
      }

      let stopAfterNarration = false;
      for (const [position, call] of calls.entries()) {
        if (signal.aborted) {
          // no new side effects after an abort; unanswered calls still get a result
          for (const skipped of calls.slice(position)) {
            history.push({ role: 'tool', toolCallId: skipped.id, toolName: skipped.name, content: NOT_EXECUTED });
          }
          break;
        }

        yield { type: 'tool_badge', name: call.name, description: this.describeTool(call.name) };
        yield this.status('executing_tool', language, adapter.name, { tool: call.name });

        const result = await this.execute(call, execution, readCache);
        history.push({ role: 'tool', toolCallId: call.id, toolName: call.name, content: result.text });

        if (
          autoStopTools.has(call.name) &&
          result.success &&
          result.write &&
          !result.partial &&
          !result.empty &&
          result.rejected === undefined
        ) {
          stopAfterNarration = true;
        }
      }

      if (signal.aborted) {
        yield this.status('cancelled', language, adapter.name);
        return finish('cancelled', lastText);
      }
      if (stopAfterNarration) {
        log.info({ round: rounds }, 'Write succeeded, narrating and stopping');
        narrating = true;
      }
    }
  }

  /**
   * Forward one round's text as it streams and collect its tool calls.
   * A `round_reset` from a retried attempt clears everything gathered so far.
   */
  private async *streamRound(
    adapter: ProviderAdapter,
    request: CompletionRequest,
    language: Language,
  ): AsyncGenerator<ChatEvent, RoundResult> {
    let text = '';
    let pending = new Map<number, PendingCall>();
    let order: number[] = [];
    let error: StreamError | null = null;

    const events: AsyncGenerator<StreamEvent> = adapter.streamCompletion(request);
    for await (const event of events) {
      switch (event.type) {
        case 'text_delta':
          if (request.signal.aborted) break;
          text += event.text;
          yield { type: 'text_delta', text: event.text };
          break;
        case 'tool_call_start':
          pending.set(event.index, { id: event.id, name: event.name, args: '' });
          order.push(event.index);
          break;
        case 'tool_call_delta': {
          const call = pending.get(event.index);
          if (call) call.args += event.argumentsDelta;
          break;
        }
        case 'tool_call_end':
          break;
        case 'round_reset':
          text = '';
          pending = new Map();
          order = [];
          yield { type: 'clear' };
          break;
        case 'status':
          yield this.status(event.code, language, adapter.name, {
            seconds: Math.ceil((event.waitMs ?? 0) / 1000),
            attempt: event.attempt ?? 1,
          });
          break;
        case 'error':
          error = event.error;
          break;
        case 'round_complete':
          break;
      }
    }

    const calls = order.flatMap((index): ToolCall[] => {
      const call = pending.get(index);
      if (!call) return [];
      const parsed = parseToolArguments(call.args);
      return [{ id: call.id, name: call.name, ...parsed }];
    });
    return { text, calls, error };
  }

  private async execute(call: ToolCall, ctx: ExecutionContext, readCache: Map<string, ToolResult>): Promise<ToolResult> {
    const handler = this.options.registry.getHandler(call.name);
    const cacheable = handler !== undefined && call.parseError === undefined && !handler.isWrite(call.arguments);
    const key = `${call.name}:${stableStringify(call.arguments)}`;

    if (cacheable) {
      const cached = readCache.get(key);
      if (cached) {
        this.logger.debug({ tool: call.name }, 'Reusing result of an identical read');
        return { ...cached, toolCallId: call.id };
      }
    }

    const result = await this.options.executor.execute(call, ctx);
    if (result.write && result.success && result.rejected === undefined) {
      // anything read before this write may be stale now
      readCache.clear();
    } else if (cacheable && result.success && result.rejected === undefined) {
      readCache.set(key, result);
    }
    return result;
  }

  private describeTool(name: string): string {
    const description = this.options.registry.getHandler(name)?.description ?? name;
    const firstSentence = /^[^.\n]*\.?/.exec(description)?.[0] ?? description;
    return firstSentence.trim();
  }

  private status(
    code: StatusCode,
    language: Language,
    provider: string,
    params: Record<string, string | number> = {},
  ): ChatEvent {
    return { type: 'status', code, message: t(language, `status_${code}`, { provider, ...params }) };
  }
}
