// Fastify server: streaming chat, abort, conversation history and provider selection

import { randomUUID } from 'node:crypto';
import { Readable } from 'node:stream';
import Fastify, { type FastifyReply } from 'fastify';
import cors from '@fastify/cors';
import { z } from 'zod';
import type { Logger } from 'pino';
import { availableProviders, ProviderConfigError } from './adapters/index.js';
import type { ProviderAdapter } from './adapters/providerAdapter.js';
import { defaultModelFor, type Config, type ProviderSelection } from './config.js';
import type { ChatService } from './services/chatService.js';
import type { ConversationStore } from './services/conversationStore.js';
import { selectionSchema, type SelectionStore } from './services/selectionStore.js';
import type { ChatEvent } from './types/events.js';

const PACKAGE_VERSION = '0.1.0';

const chatBodySchema = z.object({
  sessionId: z.string().min(1).max(200).optional(),
  message: z.string().trim().min(1),
  context: z.object({ kind: z.enum(['html', 'yaml', 'text']), content: z.string() }).optional(),
  readOnly: z.boolean().optional(),
});

const abortBodySchema = z.object({ sessionId: z.string().min(1) });

const idParamsSchema = z.object({ id: z.string().min(1) });

export interface ServerDeps {
  config: Config;
  chat: ChatService;
  conversations: ConversationStore;
  selection: SelectionStore;
  createAdapter(selection: ProviderSelection): ProviderAdapter;
  logger: Logger;
}

function badRequest(reply: FastifyReply, error: z.ZodError): FastifyReply {
  return reply.code(400).send({
    error: 'Invalid request',
    issues: error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
  });
}

async function* toNdjson(events: AsyncIterable<ChatEvent>): AsyncGenerator<string> {
  for await (const event of events) {
    yield `${JSON.stringify(event)}\n`;
  }
}

export async function createServer(deps: ServerDeps) {
  const { chat, conversations, selection, config } = deps;
  const fastify = Fastify({ loggerInstance: deps.logger });

  await fastify.register(cors, {
    origin: true,
  });

  fastify.get('/health', async () => {
    const current = await selection.get();
    return { status: 'ok', version: PACKAGE_VERSION, provider: current.provider, model: current.model };
  });

  // NDJSON stream of ChatEvents; closing the connection aborts the run
  fastify.post('/api/chat/stream', async (request, reply) => {
    const parsed = chatBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return badRequest(reply, parsed.error);
    }
    const { message, context, readOnly } = parsed.data;
    const sessionId = parsed.data.sessionId ?? randomUUID();

    request.log.info({ sessionId, messageLength: message.length, hasContext: context !== undefined }, 'Chat request');

    let finished = false;
    const events = chat.chat({
      sessionId,
      message,
      ...(context ? { context } : {}),
      ...(readOnly !== undefined ? { readOnly } : {}),
    });
    const stream = Readable.from(
      (async function* () {
        try {
          yield* toNdjson(events);
        } finally {
          finished = true;
        }
      })(),
    );
    reply.raw.on('close', () => {
      if (!finished) {
        chat.abort(sessionId);
      }
    });

    return reply
      .header('Content-Type', 'application/x-ndjson; charset=utf-8')
      .header('Cache-Control', 'no-cache')
      .header('X-Session-Id', sessionId)
      .send(stream);
  });

  fastify.post('/api/chat/abort', async (request, reply) => {
    const parsed = abortBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return badRequest(reply, parsed.error);
    }
    return { aborted: chat.abort(parsed.data.sessionId) };
  });

  fastify.get('/api/conversations', async () => {
    return { conversations: await conversations.list() };
  });

  fastify.get('/api/conversations/:id', async (request, reply) => {
    const parsed = idParamsSchema.safeParse(request.params);
    if (!parsed.success) {
      return badRequest(reply, parsed.error);
    }
    const conversation = await conversations.get(parsed.data.id);
    if (!conversation) {
      return reply.code(404).send({ error: 'Conversation not found' });
    }
    return conversation;
  });

  fastify.delete('/api/conversations/:id', async (request, reply) => {
    const parsed = idParamsSchema.safeParse(request.params);
    if (!parsed.success) {
      return badRequest(reply, parsed.error);
    }
    if (!(await conversations.delete(parsed.data.id))) {
      return reply.code(404).send({ error: 'Conversation not found' });
    }
    return reply.code(204).send();
  });

  fastify.get('/api/selection', async () => {
    return selection.get();
  });

  fastify.put('/api/selection', async (request, reply) => {
    const parsed = selectionSchema.safeParse(request.body);
    if (!parsed.success) {
      return badRequest(reply, parsed.error);
    }
    try {
      deps.createAdapter(parsed.data);
    } catch (err) {
      if (err instanceof ProviderConfigError) {
        return reply.code(400).send({ error: err.message });
      }
      throw err;
    }
    return selection.set(parsed.data);
  });

  fastify.get('/api/providers', async () => {
    return {
      providers: availableProviders(config).map((provider) => ({
        ...provider,
        defaultModel: defaultModelFor(provider.name),
      })),
    };
  });

  return fastify;
}
