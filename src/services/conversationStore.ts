// Conversation store: one JSON file, most recent first, capped with oldest eviction

import { join } from 'node:path';
import { z } from 'zod';
import type { Logger } from 'pino';
import type { ContinuityState, Conversation, ConversationSummary, Message } from '../types/conversation.js';
import { readFileIfExists, SerialQueue, writeFileAtomic } from './fileUtils.js';

const toolCallSchema = z.object({
  id: z.string(),
  name: z.string(),
  arguments: z.record(z.unknown()),
  parseError: z.string().optional(),
});

const messageSchema = z.discriminatedUnion('role', [
  z.object({
    role: z.literal('user'),
    content: z.string(),
    context: z.object({ kind: z.enum(['html', 'yaml', 'text']), content: z.string() }).optional(),
  }),
  z.object({
    role: z.literal('assistant'),
    content: z.string().nullable(),
    toolCalls: z.array(toolCallSchema).optional(),
  }),
  z.object({
    role: z.literal('tool'),
    toolCallId: z.string(),
    toolName: z.string(),
    content: z.string(),
  }),
]);

const conversationSchema = z.object({
  id: z.string(),
  title: z.string(),
  messages: z.array(messageSchema),
  continuity: z.object({ lastIntent: z.string().nullable(), awaitingConfirmation: z.boolean() }),
  createdAt: z.string(),
  updatedAt: z.string(),
});

const fileSchema = z.object({ conversations: z.array(conversationSchema) });

export interface ConversationExchange {
  /** Used only when the conversation has no title yet */
  title: string;
  messages: Message[];
  /** Omitted: the stored continuity stays as it is */
  continuity?: ContinuityState;
}

export class ConversationStore {
  private readonly path: string;
  private readonly queue = new SerialQueue();

  constructor(
    dataDir: string,
    private readonly maxConversations: number,
    private readonly logger: Logger,
  ) {
    this.path = join(dataDir, 'conversations.json');
  }

  async list(): Promise<ConversationSummary[]> {
    const conversations = await this.queue.run(() => this.read());
    return conversations.map((c) => ({
      id: c.id,
      title: c.title,
      messageCount: c.messages.length,
      updatedAt: c.updatedAt,
    }));
  }

  async get(id: string): Promise<Conversation | null> {
    const conversations = await this.queue.run(() => this.read());
    return conversations.find((c) => c.id === id) ?? null;
  }

  /**
   * Append one exchange to a conversation, creating it if needed, and move it
   * to the front. The stored copy is read inside the queue, so exchanges that
   * finish concurrently on the same id are all kept.
   */
  appendExchange(id: string, exchange: ConversationExchange): Promise<Conversation> {
    return this.queue.run(async () => {
      const conversations = await this.read();
      const existing = conversations.find((c) => c.id === id);
      const now = new Date().toISOString();
      const updated: Conversation = {
        id,
        title: existing?.title || exchange.title,
        messages: [...(existing?.messages ?? []), ...exchange.messages],
        continuity: exchange.continuity ?? existing?.continuity ?? { lastIntent: null, awaitingConfirmation: false },
        createdAt: existing?.createdAt ?? now,
        updatedAt: now,
      };

      const others = conversations.filter((c) => c.id !== id);
      const kept = [updated, ...others].slice(0, this.maxConversations);
      await this.write(kept);
      this.logger.debug(
        { conversationId: id, appended: exchange.messages.length, evicted: others.length + 1 - kept.length },
        'Conversation saved',
      );
      return updated;
    });
  }

  delete(id: string): Promise<boolean> {
    return this.queue.run(async () => {
      const conversations = await this.read();
      const remaining = conversations.filter((c) => c.id !== id);
      if (remaining.length === conversations.length) return false;
      await this.write(remaining);
      return true;
    });
  }

  private async read(): Promise<Conversation[]> {
    const raw = await readFileIfExists(this.path);
    if (raw === null) return [];
    const parsed = fileSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      this.logger.error({ issues: parsed.error.issues.slice(0, 5) }, 'Conversation store is corrupt, starting empty');
      return [];
    }
    return parsed.data.conversations;
  }

  private async write(conversations: Conversation[]): Promise<void> {
    await writeFileAtomic(this.path, JSON.stringify({ conversations }, null, 2));
  }
}
