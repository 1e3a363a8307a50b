/**
 * OpenCode adapter.
 *
 * OpenCode runs a whole agent session per prompt and answers with plain text,
 * so tool calls are simulated: the tool protocol goes into the system prompt
 * and `<tool_call>` markers are parsed back out of the reply.
 *
 * Session-based API pattern:
 * 1. Create session
 * 2. Send prompt
 * 3. Poll for the assistant reply
 * 4. Delete session (cleanup)
 */

import { randomUUID } from 'node:crypto';
import { setTimeout as sleep } from 'node:timers/promises';
import { createOpencodeClient } from '@opencode-ai/sdk';
import { z } from 'zod';
import type { Logger } from 'pino';
import { classifyProviderErrorFromMessage, errorMessage, ProviderError } from '../errors.js';
import type { StreamEvent } from '../types/events.js';
import { BaseProviderAdapter, type AdapterOptions, type AttemptTimer, type CompletionRequest } from './providerAdapter.js';
import { buildToolProtocolPrompt, formatTranscript, parseSimulatedToolCalls } from './toolSimulator.js';

const POLL_INTERVAL_MS = 300;
const DELETE_TIMEOUT_MS = 5000;
const SESSION_TITLE = 'ha-chat-gateway';

export interface OpencodeModel {
  providerID: string;
  modelID: string;
}

/**
 * One prompt/reply exchange with an OpenCode server.
 */
export interface OpencodeTransport {
  complete(systemPrompt: string, prompt: string, model: OpencodeModel, signal: AbortSignal): Promise<string>;
}

const messageWithPartsSchema = z.object({
  info: z.object({ role: z.string() }).passthrough(),
  parts: z.array(z.object({ type: z.string(), text: z.string().optional() }).passthrough()).default([]),
});

/**
 * Text of the last assistant message in a session listing (or a single prompt reply).
 */
export function lastAssistantText(data: unknown): string | null {
  const list = z.array(messageWithPartsSchema).safeParse(data);
  const single = messageWithPartsSchema.safeParse(data);
  const messages = list.success ? list.data : single.success ? [single.data] : [];
  const lastAssistant = messages.filter((m) => m.info.role === 'assistant').at(-1);
  const text = lastAssistant?.parts
    .filter((p) => p.type === 'text' && p.text)
    .map((p) => p.text)
    .join('');
  return text ? text : null;
}

// SDK calls resolve with `{ data, error }`; the error is a plain JSON body
function describeSdkError(error: unknown): string {
  if (error instanceof Error || typeof error !== 'object' || error === null) {
    return errorMessage(error);
  }
  return JSON.stringify(error);
}

function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(new Error('Request aborted'));
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new Error('Request aborted'));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

export class OpencodeSdkTransport implements OpencodeTransport {
  private readonly client: ReturnType<typeof createOpencodeClient>;

  constructor(
    baseUrl: string,
    private readonly logger: Logger,
  ) {
    // Connect to an existing OpenCode server (don't start a new one)
    this.client = createOpencodeClient({ baseUrl });
  }

  async complete(systemPrompt: string, prompt: string, model: OpencodeModel, signal: AbortSignal): Promise<string> {
    const created = await abortable(this.client.session.create({ body: { title: SESSION_TITLE } }), signal);
    const sessionId = created.data?.id;
    if (!sessionId) {
      throw new ProviderError(`Failed to create OpenCode session: ${describeSdkError(created.error)}`, 'server', 'opencode');
    }

    try {
      const reply = await abortable(
        this.client.session.prompt({
          path: { id: sessionId },
          body: { model, system: systemPrompt, parts: [{ type: 'text', text: prompt }] },
        }),
        signal,
      );
      if (reply.error) {
        const message = describeSdkError(reply.error);
        throw new ProviderError(message, classifyProviderErrorFromMessage(message), 'opencode');
      }
      const direct = lastAssistantText(reply.data);
      if (direct) return direct;

      // Poll until the session shows an assistant reply; the attempt signal bounds the wait
      for (;;) {
        const listing = await abortable(this.client.session.messages({ path: { id: sessionId } }), signal);
        const text = lastAssistantText(listing.data);
        if (text) return text;
        await sleep(POLL_INTERVAL_MS, undefined, { signal });
      }
    } finally {
      await this.deleteSession(sessionId);
    }
  }

  private async deleteSession(sessionId: string): Promise<void> {
    try {
      await abortable(this.client.session.delete({ path: { id: sessionId } }), AbortSignal.timeout(DELETE_TIMEOUT_MS));
    } catch (err) {
      this.logger.warn({ err, sessionId }, 'Failed to delete OpenCode session');
    }
  }
}

export interface OpencodeAdapterOptions extends AdapterOptions {
  providerID: string;
  transport: OpencodeTransport;
}

export class OpencodeAdapter extends BaseProviderAdapter {
  constructor(private readonly settings: OpencodeAdapterOptions) {
    super('opencode', settings);
  }

  override supportsNativeToolCalls(): boolean {
    return false;
  }

  protected async *streamOnce(request: CompletionRequest, attempt: AttemptTimer): AsyncGenerator<StreamEvent> {
    const offered = request.toolChoice === 'none' ? [] : request.tools;
    const system = `${request.systemPrompt}\n\n${buildToolProtocolPrompt(offered)}`;
    const prompt = formatTranscript(request.messages);

    const reply = await this.settings.transport.complete(
      system,
      prompt,
      { providerID: this.settings.providerID, modelID: request.model },
      attempt.signal,
    );
    attempt.touch();

    const { text, calls } = parseSimulatedToolCalls(reply);
    if (text) {
      yield { type: 'text_delta', text };
    }
    for (const [index, call] of calls.entries()) {
      yield { type: 'tool_call_start', index, id: `call_${randomUUID()}`, name: call.name };
      // a lone '{' fails to parse downstream, so the call is answered with an arguments error
      yield {
        type: 'tool_call_delta',
        index,
        argumentsDelta: call.parseError !== undefined ? '{' : JSON.stringify(call.arguments),
      };
      yield { type: 'tool_call_end', index };
    }
    yield { type: 'round_complete', finishReason: calls.length > 0 ? 'tool_calls' : 'stop' };
  }
}
