// Anthropic Messages API adapter (SSE with tool_use content blocks)

import { ProviderError, type ProviderErrorKind } from '../errors.js';
import { t, type Language } from '../i18n.js';
import type { Message } from '../types/conversation.js';
import {
  anthropicStreamEventSchema,
  type AnthropicContentBlock,
  type AnthropicMessage,
  type AnthropicRequest,
  type AnthropicTool,
} from '../types/anthropic.js';
import type { StreamEvent } from '../types/events.js';
import type { ToolDefinition } from '../types/tools.js';
import { renderUserContent } from './messageText.js';
import { BaseProviderAdapter, type AdapterOptions, type AttemptTimer, type CompletionRequest } from './providerAdapter.js';

const API_URL = 'https://api.anthropic.com/v1/messages';
const API_VERSION = '2023-06-01';
const MAX_TOKENS = 8192;
const EMPTY_TURN_PLACEHOLDER = '...';

export interface AnthropicAdapterOptions extends AdapterOptions {
  apiKey: string | undefined;
  language: Language;
  baseUrl?: string;
}

export function toAnthropicTools(tools: readonly ToolDefinition[]): AnthropicTool[] {
  return tools.map((tool) => ({ name: tool.name, description: tool.description, input_schema: tool.parameters }));
}

function toBlocks(content: AnthropicMessage['content']): AnthropicContentBlock[] {
  return typeof content === 'string' ? [{ type: 'text', text: content }] : content;
}

/**
 * Unified history -> Messages API turns. Tool results become `tool_result`
 * blocks of a user turn; consecutive turns of one role are merged.
 */
export function toAnthropicMessages(messages: readonly Message[], language: Language): AnthropicMessage[] {
  const out: AnthropicMessage[] = [];

  const append = (role: AnthropicMessage['role'], blocks: AnthropicContentBlock[]): void => {
    const last = out[out.length - 1];
    if (last && last.role === role) {
      last.content = [...toBlocks(last.content), ...blocks];
    } else {
      out.push({ role, content: blocks });
    }
  };

  for (const msg of messages) {
    if (msg.role === 'user') {
      append('user', [{ type: 'text', text: renderUserContent(msg) }]);
    } else if (msg.role === 'assistant') {
      const blocks: AnthropicContentBlock[] = [];
      if (msg.content) {
        blocks.push({ type: 'text', text: msg.content });
      }
      for (const call of msg.toolCalls ?? []) {
        blocks.push({ type: 'tool_use', id: call.id, name: call.name, input: call.arguments });
      }
      append('assistant', blocks.length > 0 ? blocks : [{ type: 'text', text: EMPTY_TURN_PLACEHOLDER }]);
    } else {
      append('user', [{ type: 'tool_result', tool_use_id: msg.toolCallId, content: msg.content }]);
    }
  }

  if (out[out.length - 1]?.role === 'assistant') {
    out.push({ role: 'user', content: t(language, 'continue_instruction') });
  }
  return out;
}

function errorKind(type: string): ProviderErrorKind {
  switch (type) {
    case 'rate_limit_error':
      return 'rate_limited';
    case 'overloaded_error':
    case 'api_error':
      return 'server';
    case 'authentication_error':
    case 'permission_error':
      return 'auth';
    case 'invalid_request_error':
    case 'not_found_error':
    case 'request_too_large':
      return 'invalid_request';
    default:
      return 'unknown';
  }
}

function mapStopReason(reason: string | null | undefined): 'stop' | 'tool_calls' | 'length' | 'unknown' {
  switch (reason) {
    case 'end_turn':
    case 'stop_sequence':
      return 'stop';
    case 'tool_use':
      return 'tool_calls';
    case 'max_tokens':
      return 'length';
    default:
      return 'unknown';
  }
}

export class AnthropicAdapter extends BaseProviderAdapter {
  constructor(private readonly settings: AnthropicAdapterOptions) {
    super('anthropic', settings);
  }

  protected async *streamOnce(request: CompletionRequest, attempt: AttemptTimer): AsyncGenerator<StreamEvent> {
    const body: AnthropicRequest = {
      model: request.model,
      max_tokens: MAX_TOKENS,
      system: request.systemPrompt,
      messages: toAnthropicMessages(request.messages, this.settings.language),
      stream: true,
      ...(request.tools.length > 0 ? { tools: toAnthropicTools(request.tools) } : {}),
      // tool_choice is only accepted alongside tools
      ...(request.tools.length > 0 && request.toolChoice === 'none' ? { tool_choice: { type: 'none' as const } } : {}),
    };
    const response = await this.postJson(
      this.settings.baseUrl ?? API_URL,
      body,
      { 'x-api-key': this.settings.apiKey ?? '', 'anthropic-version': API_VERSION },
      attempt,
    );

    const toolBlocks = new Set<number>();
    let stopReason: string | null | undefined;

    for await (const frame of this.readServerSentEvents(response, attempt)) {
      const parsed = anthropicStreamEventSchema.safeParse(this.parseFrame(frame.data));
      if (!parsed.success) continue;
      const event = parsed.data;

      switch (event.type) {
        case 'content_block_start':
          if (event.content_block.type === 'tool_use' && event.content_block.id && event.content_block.name) {
            toolBlocks.add(event.index);
            yield { type: 'tool_call_start', index: event.index, id: event.content_block.id, name: event.content_block.name };
          }
          break;
        case 'content_block_delta':
          if (event.delta.type === 'text_delta' && event.delta.text) {
            yield { type: 'text_delta', text: event.delta.text };
          } else if (event.delta.type === 'input_json_delta' && event.delta.partial_json && toolBlocks.has(event.index)) {
            yield { type: 'tool_call_delta', index: event.index, argumentsDelta: event.delta.partial_json };
          }
          break;
        case 'content_block_stop':
          if (toolBlocks.has(event.index)) {
            yield { type: 'tool_call_end', index: event.index };
          }
          break;
        case 'message_delta':
          stopReason = event.delta.stop_reason;
          break;
        case 'error':
          throw new ProviderError(event.error.message, errorKind(event.error.type), this.name);
      }
    }

    yield { type: 'round_complete', finishReason: toolBlocks.size > 0 ? 'tool_calls' : mapStopReason(stopReason) };
  }
}
