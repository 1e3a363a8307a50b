/**
 * Ollama Adapter
 * Converts between the unified conversation and Ollama's /api/chat format.
 *
 * Key differences from OpenAI:
 * - tool_calls.arguments is an Object, not a JSON string
 * - No tool_calls.id field
 * - Responses stream as NDJSON, one complete tool call per chunk
 * - Message text passes through the model's prompt template, so braces must be neutralized
 */

import { randomUUID } from 'node:crypto';
import { classifyProviderErrorFromMessage, ProviderError } from '../errors.js';
import { t, type Language } from '../i18n.js';
import type { Message } from '../types/conversation.js';
import type { StreamEvent } from '../types/events.js';
import { ollamaChatChunkSchema, type OllamaChatRequest, type OllamaMessage, type OllamaTool } from '../types/ollama.js';
import type { ToolDefinition } from '../types/tools.js';
import { renderUserContent } from './messageText.js';
import { BaseProviderAdapter, type AdapterOptions, type AttemptTimer, type CompletionRequest } from './providerAdapter.js';

const ZERO_WIDTH_SPACE = '\u200B';
const TEMPLATE_ERROR = /can't find closing|template:|unexpected "}"|does not support tools/i;

export interface OllamaAdapterOptions extends AdapterOptions {
  baseUrl: string;
  language: Language;
}

/**
 * Break up `{{`/`}}` so JSON embedded in message text is never read as template syntax.
 */
export function escapeTemplateBraces(text: string): string {
  return text.replace(/\{/g, `{${ZERO_WIDTH_SPACE}`).replace(/\}/g, `${ZERO_WIDTH_SPACE}}`);
}

export function toOllamaTools(tools: readonly ToolDefinition[]): OllamaTool[] {
  return tools.map((tool) => ({
    type: 'function' as const,
    function: { name: tool.name, description: tool.description, parameters: tool.parameters },
  }));
}

export function toOllamaMessages(systemPrompt: string, messages: readonly Message[], language: Language): OllamaMessage[] {
  const out: OllamaMessage[] = [{ role: 'system', content: escapeTemplateBraces(systemPrompt) }];
  for (const msg of messages) {
    if (msg.role === 'user') {
      out.push({ role: 'user', content: escapeTemplateBraces(renderUserContent(msg)) });
    } else if (msg.role === 'assistant') {
      const toolCalls = msg.toolCalls ?? [];
      out.push({
        role: 'assistant',
        content: escapeTemplateBraces(msg.content ?? ''),
        ...(toolCalls.length > 0
          ? { tool_calls: toolCalls.map((call) => ({ function: { name: call.name, arguments: call.arguments } })) }
          : {}),
      });
    } else {
      out.push({ role: 'tool', content: escapeTemplateBraces(msg.content), tool_name: msg.toolName });
    }
  }
  if (out[out.length - 1]?.role === 'assistant') {
    out.push({ role: 'user', content: t(language, 'continue_instruction') });
  }
  return out;
}

export class OllamaAdapter extends BaseProviderAdapter {
  constructor(private readonly settings: OllamaAdapterOptions) {
    super('ollama', settings);
  }

  protected async *streamOnce(request: CompletionRequest, attempt: AttemptTimer): AsyncGenerator<StreamEvent> {
    // no tool_choice on this API: a plain-text round simply offers no tools
    const offered = request.toolChoice === 'none' ? [] : request.tools;
    const chatRequest: OllamaChatRequest = {
      model: request.model,
      messages: toOllamaMessages(request.systemPrompt, request.messages, this.settings.language),
      stream: true,
      ...(offered.length > 0 ? { tools: toOllamaTools(offered) } : {}),
    };

    let response: Response;
    try {
      response = await this.postJson(`${this.settings.baseUrl}/api/chat`, chatRequest, {}, attempt);
    } catch (err) {
      if (!(err instanceof ProviderError) || !chatRequest.tools || !TEMPLATE_ERROR.test(err.message)) {
        throw err;
      }
      this.logger.warn({ err: err.message }, 'Template rejected the request, retrying without tools');
      const { tools: _dropped, ...withoutTools } = chatRequest;
      response = await this.postJson(`${this.settings.baseUrl}/api/chat`, withoutTools, {}, attempt);
    }

    let index = 0;
    let sawToolCalls = false;
    let doneReason: string | undefined;

    for await (const line of this.readLines(response, attempt)) {
      const parsed = ollamaChatChunkSchema.safeParse(this.parseFrame(line));
      if (!parsed.success) continue;
      const chunk = parsed.data;

      if (chunk.error) {
        throw new ProviderError(chunk.error, classifyProviderErrorFromMessage(chunk.error), this.name);
      }
      if (chunk.message?.content) {
        yield { type: 'text_delta', text: chunk.message.content };
      }
      for (const call of chunk.message?.tool_calls ?? []) {
        sawToolCalls = true;
        yield { type: 'tool_call_start', index, id: `call_${randomUUID()}`, name: call.function.name };
        yield { type: 'tool_call_delta', index, argumentsDelta: JSON.stringify(call.function.arguments) };
        yield { type: 'tool_call_end', index };
        index++;
      }
      if (chunk.done) {
        doneReason = chunk.done_reason;
        break;
      }
    }

    yield {
      type: 'round_complete',
      finishReason: sawToolCalls ? 'tool_calls' : doneReason === 'length' ? 'length' : doneReason === 'stop' ? 'stop' : 'unknown',
    };
  }
}
