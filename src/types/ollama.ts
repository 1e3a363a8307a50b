// Ollama /api/chat wire types (streaming, native tool calls)

import { z } from 'zod';

export interface OllamaMessage {
  role: 'system' | 'user' | 'assistant' | 'tool';
  content: string;
  // arguments arrive as an object here, not as a JSON string like OpenAI
  tool_calls?: Array<{ function: { name: string; arguments: Record<string, unknown> } }>;
  tool_name?: string;
}

export interface OllamaTool {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
}

export interface OllamaChatRequest {
  model: string;
  messages: OllamaMessage[];
  stream: boolean;
  tools?: OllamaTool[];
}

/**
 * One NDJSON line of a streamed reply. A tool call is always complete within
 * the line that carries it; `error` replaces everything else on failure.
 */
export const ollamaChatChunkSchema = z.object({
  message: z
    .object({
      content: z.string().default(''),
      tool_calls: z
        .array(z.object({ function: z.object({ name: z.string(), arguments: z.record(z.unknown()).default({}) }) }))
        .optional(),
    })
    .optional(),
  done: z.boolean().default(false),
  done_reason: z.string().optional(),
  error: z.string().optional(),
});
