// OpenAI Chat Completions API types (also spoken by Groq, Mistral, DeepSeek, OpenRouter, NVIDIA)
// Reference: https://platform.openai.com/docs/api-reference/chat

import { z } from 'zod';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant' | 'tool';
  content: string | null;
  name?: string | undefined;
  tool_calls?: ToolCall[] | undefined;
  tool_call_id?: string | undefined;
}

export interface ToolCall {
  id: string;
  type: 'function';
  function: {
    name: string;
    arguments: string; // JSON string
  };
}

export interface Tool {
  type: 'function';
  function: {
    name: string;
    description?: string | undefined;
    parameters?: Record<string, unknown> | undefined;
  };
}

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  tools?: Tool[] | undefined;
  tool_choice?: 'none' | 'auto' | 'required' | { type: 'function'; function: { name: string } } | undefined;
  temperature?: number | undefined;
  max_tokens?: number | undefined;
  stream?: boolean | undefined;
}

/**
 * One `data:` frame of a streamed completion.
 * Tool call fragments are keyed by `index`; `id` and `name` arrive only on the first fragment.
 */
export const chatCompletionChunkSchema = z.object({
  id: z.string().optional(),
  choices: z
    .array(
      z.object({
        index: z.number().default(0),
        delta: z
          .object({
            content: z.string().nullish(),
            tool_calls: z
              .array(
                z.object({
                  index: z.number(),
                  id: z.string().nullish(),
                  function: z.object({ name: z.string().nullish(), arguments: z.string().nullish() }).optional(),
                }),
              )
              .nullish(),
          })
          .default({}),
        finish_reason: z.string().nullish(),
      }),
    )
    .default([]),
  error: z.object({ message: z.string(), code: z.union([z.string(), z.number()]).nullish() }).optional(),
});

export type ChatCompletionChunk = z.infer<typeof chatCompletionChunkSchema>;
