/**
 * Simulated tool calling for backends without structured tool calls.
 *
 * The model is told to answer with `<tool_call>{"name": ..., "arguments": {...}}</tool_call>`
 * markers; the adapter parses them back into tool calls. History is flattened
 * to plain user/assistant turns, with tool results labelled by tool name.
 */

import { z } from 'zod';
import type { AssistantMessage, Message, UserMessage } from '../types/conversation.js';
import type { ToolDefinition } from '../types/tools.js';
import { renderUserContent } from './messageText.js';

const TOOL_CALL_PATTERN = /<tool_call>\s*([\s\S]*?)\s*<\/tool_call>/g;

const simulatedCallSchema = z.object({
  name: z.string().min(1),
  arguments: z.record(z.unknown()).default({}),
});

const propertySchema = z
  .object({
    type: z.union([z.string(), z.array(z.string())]).optional(),
    description: z.string().optional(),
    items: z.object({ type: z.string().optional() }).passthrough().optional(),
    enum: z.array(z.unknown()).optional(),
  })
  .passthrough();

const parametersSchema = z
  .object({
    properties: z.record(propertySchema).default({}),
    required: z.array(z.string()).default([]),
  })
  .passthrough();

export interface SimulatedToolCall {
  name: string;
  arguments: Record<string, unknown>;
  parseError?: string;
}

export interface SimulatedResponse {
  /** Text with every marker removed */
  text: string;
  calls: SimulatedToolCall[];
}

/**
 * Format tools into LLM-friendly text description
 */
export function formatToolsForPrompt(tools: readonly ToolDefinition[]): string {
  return tools
    .map((tool, index) => {
      const params = parametersSchema.catch({ properties: {}, required: [] }).parse(tool.parameters);
      const paramsText = Object.entries(params.properties)
        .map(([key, schema]) => {
          const required = params.required.includes(key) ? ' (required)' : '';
          const desc = schema.description ? ` - ${schema.description}` : '';
          const type = Array.isArray(schema.type) ? schema.type.join('|') : (schema.type ?? 'any');
          const itemsType = schema.items?.type ? `<${schema.items.type}>` : '';
          const choices = schema.enum ? ` one of ${schema.enum.map((v) => JSON.stringify(v)).join(', ')}` : '';
          return `  - ${key}${required}: ${type}${itemsType}${choices}${desc}`;
        })
        .join('\n');

      return `${index + 1}. ${tool.name}
   Description: ${tool.description}
   Parameters:
${paramsText || '   (no parameters)'}`;
    })
    .join('\n\n');
}

export function buildToolProtocolPrompt(tools: readonly ToolDefinition[]): string {
  if (tools.length === 0) {
    return 'Do not call any tool. Answer in plain text.';
  }
  return `TOOLS
You can call the tools below. To call one, write exactly one block per call:
<tool_call>{"name": "tool_name", "arguments": {"param": "value"}}</tool_call>
The arguments must be valid JSON. Write nothing after your last tool call; the results will be sent back to you as [TOOL RESULT: name] blocks.
When no tool is needed, answer in plain text without any <tool_call> block.

${formatToolsForPrompt(tools)}`;
}

function stripFence(body: string): string {
  return body.replace(/^```(?:json)?\s*/i, '').replace(/\s*```$/, '');
}

export function parseSimulatedToolCalls(text: string): SimulatedResponse {
  const calls: SimulatedToolCall[] = [];
  for (const match of text.matchAll(TOOL_CALL_PATTERN)) {
    const body = stripFence(match[1] ?? '');
    let raw: unknown;
    try {
      raw = JSON.parse(body);
    } catch (err) {
      const name = /"name"\s*:\s*"([^"]+)"/.exec(body)?.[1];
      if (name) {
        calls.push({ name, arguments: {}, parseError: err instanceof Error ? err.message : String(err) });
      }
      continue;
    }
    const parsed = simulatedCallSchema.safeParse(raw);
    if (parsed.success) {
      calls.push({ name: parsed.data.name, arguments: parsed.data.arguments });
    }
  }
  const visible = text.replace(TOOL_CALL_PATTERN, '').replace(/\n{3,}/g, '\n\n').trim();
  return { text: visible, calls };
}

/**
 * Plain user/assistant turns for a backend that knows nothing about tools.
 * Consecutive turns of the same role are merged.
 */
export function flattenHistory(messages: readonly Message[]): Array<UserMessage | AssistantMessage> {
  const flat: Array<UserMessage | AssistantMessage> = [];

  const push = (role: 'user' | 'assistant', content: string): void => {
    if (!content) return;
    const last = flat[flat.length - 1];
    if (last && last.role === role) {
      last.content = `${last.content ?? ''}\n\n${content}`;
      return;
    }
    flat.push(role === 'user' ? { role, content } : { role, content });
  };

  for (const msg of messages) {
    if (msg.role === 'user') {
      push('user', renderUserContent(msg));
    } else if (msg.role === 'assistant') {
      const names = (msg.toolCalls ?? []).map((call) => call.name);
      const called = names.length > 0 ? `[Called tools: ${names.join(', ')}]` : '';
      push('assistant', [msg.content ?? '', called].filter(Boolean).join('\n'));
    } else {
      push('user', `[TOOL RESULT: ${msg.toolName}]\n${msg.content}\n[/TOOL RESULT]`);
    }
  }
  return flat;
}

/**
 * Flattened history as a `User:` / `Assistant:` transcript, the single
 * prompt a turn-based backend receives.
 */
export function formatTranscript(messages: readonly Message[]): string {
  return flattenHistory(messages)
    .map((msg) => `${msg.role === 'user' ? 'User' : 'Assistant'}: ${msg.content ?? ''}`)
    .join('\n');
}
