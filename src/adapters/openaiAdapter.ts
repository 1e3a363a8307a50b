/**
 * OpenAI-compatible Chat Completions adapter.
 *
 * Serves OpenAI itself and the providers exposing the same API
 * (Groq, Mistral, DeepSeek, OpenRouter, NVIDIA, custom endpoints).
 */

import { randomUUID } from 'node:crypto';
import { classifyProviderErrorFromMessage, classifyProviderErrorFromStatus, ProviderError } from '../errors.js';
import { t, type Language } from '../i18n.js';
import type { Message } from '../types/conversation.js';
import type { StreamEvent } from '../types/events.js';
import { chatCompletionChunkSchema, type ChatCompletionRequest, type ChatMessage, type Tool } from '../types/openai.js';
import type { ToolDefinition } from '../types/tools.js';
import { renderUserContent } from './messageText.js';
import { BaseProviderAdapter, type AdapterOptions, type AttemptTimer, type CompletionRequest } from './providerAdapter.js';

export const OPENAI_COMPATIBLE_BASE_URLS = {
  openai: 'https://api.openai.com/v1',
  groq: 'https://api.groq.com/openai/v1',
  mistral: 'https://api.mistral.ai/v1',
  deepseek: 'https://api.deepseek.com/v1',
  openrouter: 'https://openrouter.ai/api/v1',
  nvidia: 'https://integrate.api.nvidia.com/v1',
} as const;

export interface OpenAIAdapterOptions extends AdapterOptions {
  baseUrl: string;
  apiKey: string | undefined;
  language: Language;
  extraHeaders?: Record<string, string>;
}

export function toOpenAITools(tools: readonly ToolDefinition[]): Tool[] {
  return tools.map((tool) => ({
    type: 'function' as const,
    function: { name: tool.name, description: tool.description, parameters: tool.parameters },
  }));
}

/**
 * Unified history -> Chat Completions messages.
 *
 * Tool-call-only assistant turns get an empty string instead of null, and a
 * history ending on an assistant turn gets a continuation user turn.
 */
export function toOpenAIMessages(systemPrompt: string, messages: readonly Message[], language: Language): ChatMessage[] {
  const out: ChatMessage[] = [{ role: 'system', content: systemPrompt }];
  for (const msg of messages) {
    if (msg.role === 'user') {
      out.push({ role: 'user', content: renderUserContent(msg) });
    } else if (msg.role === 'assistant') {
      const toolCalls = msg.toolCalls ?? [];
      out.push({
        role: 'assistant',
        content: msg.content ?? '',
        ...(toolCalls.length > 0
          ? {
              tool_calls: toolCalls.map((call) => ({
                id: call.id,
                type: 'function' as const,
                function: { name: call.name, arguments: JSON.stringify(call.arguments) },
              })),
            }
          : {}),
      });
    } else {
      out.push({ role: 'tool', tool_call_id: msg.toolCallId, name: msg.toolName, content: msg.content });
    }
  }
  if (out[out.length - 1]?.role === 'assistant') {
    out.push({ role: 'user', content: t(language, 'continue_instruction') });
  }
  return out;
}

function mapFinishReason(reason: string | null | undefined): 'stop' | 'tool_calls' | 'length' | 'unknown' {
  switch (reason) {
    case 'stop':
      return 'stop';
    case 'tool_calls':
    case 'function_call':
      return 'tool_calls';
    case 'length':
      return 'length';
    default:
      return 'unknown';
  }
}

interface PendingCall {
  id: string;
  name: string;
  started: boolean;
  bufferedArguments: string;
}

export class OpenAIAdapter extends BaseProviderAdapter {
  constructor(
    name: string,
    private readonly settings: OpenAIAdapterOptions,
  ) {
    super(name, settings);
  }

  protected async *streamOnce(request: CompletionRequest, attempt: AttemptTimer): AsyncGenerator<StreamEvent> {
    const body: ChatCompletionRequest = {
      model: request.model,
      messages: toOpenAIMessages(request.systemPrompt, request.messages, this.settings.language),
      stream: true,
      ...(request.tools.length > 0
        ? { tools: toOpenAITools(request.tools), tool_choice: request.toolChoice ?? 'auto' }
        : {}),
    };
    const headers: Record<string, string> = { ...this.settings.extraHeaders };
    if (this.settings.apiKey) {
      headers.Authorization = `Bearer ${this.settings.apiKey}`;
    }

    const response = await this.postJson(`${this.settings.baseUrl}/chat/completions`, body, headers, attempt);

    const calls = new Map<number, PendingCall>();
    let finishReason: string | null | undefined;

    for await (const event of this.readServerSentEvents(response, attempt)) {
      if (event.data === '[DONE]') break;
      const parsed = chatCompletionChunkSchema.safeParse(this.parseFrame(event.data));
      if (!parsed.success) continue;
      const chunk = parsed.data;

      if (chunk.error) {
        const { message, code } = chunk.error;
        const kind =
          typeof code === 'number' ? classifyProviderErrorFromStatus(code, message) : classifyProviderErrorFromMessage(message);
        throw new ProviderError(message, kind, this.name, typeof code === 'number' ? { status: code } : {});
      }

      const choice = chunk.choices[0];
      if (!choice) continue;
      if (choice.delta.content) {
        yield { type: 'text_delta', text: choice.delta.content };
      }
      for (const fragment of choice.delta.tool_calls ?? []) {
        let pending = calls.get(fragment.index);
        if (!pending) {
          pending = { id: fragment.id || `call_${randomUUID()}`, name: '', started: false, bufferedArguments: '' };
          calls.set(fragment.index, pending);
        }
        if (fragment.function?.name) {
          pending.name = fragment.function.name;
        }
        const argumentsDelta = fragment.function?.arguments ?? '';
        if (!pending.started && pending.name) {
          pending.started = true;
          yield { type: 'tool_call_start', index: fragment.index, id: pending.id, name: pending.name };
          if (pending.bufferedArguments) {
            yield { type: 'tool_call_delta', index: fragment.index, argumentsDelta: pending.bufferedArguments };
          }
        }
        if (!argumentsDelta) continue;
        if (pending.started) {
          yield { type: 'tool_call_delta', index: fragment.index, argumentsDelta };
        } else {
          pending.bufferedArguments += argumentsDelta;
        }
      }
      if (choice.finish_reason) {
        finishReason = choice.finish_reason;
      }
    }

    for (const [index, pending] of calls) {
      if (pending.started) {
        yield { type: 'tool_call_end', index };
      }
    }
    const startedCalls = [...calls.values()].some((c) => c.started);
    yield { type: 'round_complete', finishReason: startedCalls ? 'tool_calls' : mapFinishReason(finishReason) };
  }
}
